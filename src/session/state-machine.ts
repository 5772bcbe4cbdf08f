import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { parseFsmInfo, parseStateChangedInfo } from '../core/schema.js';
import type { StateChangedInfo } from '../core/types.js';
import { Diagram } from '../renderer/diagram.js';
import { highlight, reset } from '../renderer/nodes.js';
import { findNodeById } from '../renderer/search.js';
import type { NodeMatch } from '../renderer/search.js';
import { SVGRenderer } from '../renderer/svg-generator.js';
import type { SvgElement } from '../renderer/types.js';

export interface StateMachineOptions {
  logger?: Logger;
}

export function buildKey(clientId: string, fsmName: string): string {
  return `${clientId} - ${fsmName}`;
}

/**
 * The diagram of one machine of one connected client. Holds no diagram
 * until the first machine description arrives.
 */
export class StateMachine {
  readonly clientId: string;
  readonly fsmName: string;
  readonly key: string;
  private diagram: Diagram | null = null;
  private readonly logger: Logger;

  constructor(clientId: string, fsmName: string, options: StateMachineOptions = {}) {
    this.clientId = clientId;
    this.fsmName = fsmName;
    this.key = buildKey(clientId, fsmName);
    this.logger = options.logger ?? silentLogger;
  }

  get currentDiagram(): Diagram | null {
    return this.diagram;
  }

  /** Current vector document, or null before the first machine description. */
  get document(): SvgElement | null {
    return this.diagram ? this.diagram.toDocument() : null;
  }

  toSvg(): string | undefined {
    return this.diagram ? new SVGRenderer().render(this.diagram) : undefined;
  }

  /**
   * Replaces the diagram with a fresh layout of the described machine.
   * Throws PayloadError for a malformed description and keeps the old diagram.
   */
  onSetMachine(payload: unknown): this {
    let next: Diagram;
    try {
      next = new Diagram(parseFsmInfo(payload));
    } catch (e) {
      this.logger.error(`${this.key}: ${e instanceof Error ? e.message : String(e)}`);
      throw e;
    }
    this.diagram = next;
    return this;
  }

  /**
   * Clears the previously active node and highlights the new one. Either
   * side may be missing from the diagram; that side is skipped.
   */
  onStateChanged(payload: unknown): this {
    let info: StateChangedInfo;
    try {
      info = parseStateChangedInfo(payload);
    } catch (e) {
      this.logger.error(`${this.key}: ${e instanceof Error ? e.message : String(e)}`);
      throw e;
    }
    const diagram = this.diagram;
    if (!diagram) return this;

    this.logger.info(`${info.machineName}: ${info.oldStateName} ==> ${info.newStateName}`);
    resetNodeOrAll(findNodeById(diagram, info.oldStateId), info);
    const next = findNodeById(diagram, info.newStateId);
    if (next) highlight(next.node);
    return this;
  }
}

// Leaving an initial state restarts the owning chart, so every node there is cleared
function resetNodeOrAll(match: NodeMatch | undefined, info: StateChangedInfo): void {
  if (!match) return;
  if (info.oldStateName.toLowerCase().startsWith('initial')) {
    for (const node of match.diagram.nodes()) reset(node);
  } else {
    reset(match.node);
  }
}
