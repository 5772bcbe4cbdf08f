// Wire model for machine descriptions and state change notices

export interface TransitionInfo {
  endPointId: string;
  isHistory: boolean;
  isDeepHistory: boolean;
  isToFinal: boolean;
}

export interface StateInfo {
  name: string;
  id: string;
  transitions: TransitionInfo[];
  children: FsmInfo[]; // one nested machine per region
  isInitial: boolean;
  isFinal: boolean;
  hasHistory: boolean;
  hasDeepHistory: boolean;
}

export interface FsmInfo {
  name: string;
  states: StateInfo[];
}

export interface StateChangedInfo {
  machineName: string;
  oldStateName: string;
  oldStateId: string;
  newStateName: string;
  newStateId: string;
}

export type CommandName = 'set-fsm' | 'update-state' | 'remove-client' | 'get-states' | 'received-fsm';

export interface MachineCommand {
  fsm: string;
  command: string;
  payload: string;
}

export interface CommandEnvelope {
  clientId: string;
  command: MachineCommand;
}

export type IssueCode =
  | 'PAYLOAD-JSON-INVALID'
  | 'PAYLOAD-SHAPE-INVALID'
  | 'FSM-NO-INITIAL'
  | 'FSM-MULTIPLE-INITIAL'
  | 'FSM-MULTIPLE-FINAL'
  | 'COMMAND-UNKNOWN';

export interface PayloadIssue {
  path: string; // dotted path into the payload, '' for the root
  message: string;
  code: IssueCode;
  hint?: string;
}

export function hasChildren(state: StateInfo): boolean {
  return state.children.length > 0;
}

/** States that are neither the initial nor the final pseudo-state, in declaration order. */
export function normalStates(fsm: FsmInfo): StateInfo[] {
  return fsm.states.filter(s => !s.isInitial && !s.isFinal);
}
