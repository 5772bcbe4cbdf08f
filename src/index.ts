// Public SDK surface for programmatic use
// Re-export core types
export type {
  TransitionInfo,
  StateInfo,
  FsmInfo,
  StateChangedInfo,
  CommandName,
  MachineCommand,
  CommandEnvelope,
  IssueCode,
  PayloadIssue,
} from './core/types.js';
export { hasChildren, normalStates } from './core/types.js';

// Payload validation and errors
export {
  FsmInfoSchema,
  StateInfoSchema,
  TransitionInfoSchema,
  StateChangedInfoSchema,
  MachineCommandSchema,
  CommandEnvelopeSchema,
  normalizeKeys,
  checkStructure,
  parseFsmInfo,
  parseStateChangedInfo,
  parseMachineCommand,
  parseCommandEnvelope,
} from './core/schema.js';
export { PayloadError } from './core/errorBuilder.js';
export { textReport, toJsonResult } from './core/format.js';
export type { Logger } from './core/logger.js';
export { consoleLogger, silentLogger } from './core/logger.js';
export { splitMessages, parseMessages } from './core/messages.js';
export { SET_FSM, UPDATE_STATE, REMOVE_CLIENT, GET_STATES, RECEIVED_FSM } from './core/commands.js';
export type { InputKind } from './core/router.js';
export { detectInputKind, check, replay } from './core/router.js';

// Layout and rendering
export type { Point, Anchor } from './renderer/geometry.js';
export { distance, isOutside } from './renderer/geometry.js';
export type { SvgElement, NodeKind, Appearance } from './renderer/types.js';
export type { DiagramNode, PlainStateNode, CompositeStateNode, PseudoStateNode } from './renderer/nodes.js';
export { anchorsIn, anchorsOut, highlight, reset, nodeStyle, isComposite } from './renderer/nodes.js';
export { createNode, nodeKindOf } from './renderer/node-factory.js';
export type { Connection, Segment } from './renderer/connections.js';
export { MIN_DISTANCE, selectConnection } from './renderer/connections.js';
export type { Transition, NestedPanel, NestedPlacement } from './renderer/diagram.js';
export { Diagram, BORDER, STATE_SPACE, SPECIAL_NODE_OFFSET } from './renderer/diagram.js';
export type { NodeMatch } from './renderer/search.js';
export { findNode, findNodeById } from './renderer/search.js';
export type { IRenderer } from './renderer/interfaces.js';
export { SVGRenderer, renderSvg } from './renderer/svg-generator.js';
export type { RenderOptions, RenderResult } from './renderer/index.js';
export { FsmRenderer, renderFsm } from './renderer/index.js';
export type { Style, TextStyle } from './renderer/styles.js';
export { styleString } from './renderer/styles.js';

// Sessions
export type { StateMachineOptions } from './session/state-machine.js';
export { StateMachine, buildKey } from './session/state-machine.js';
export type { SessionEvent, SessionListener, SessionRegistryOptions } from './session/registry.js';
export { SessionRegistry } from './session/registry.js';
