import type { CommandName } from './types.js';

export const SET_FSM: CommandName = 'set-fsm';
export const UPDATE_STATE: CommandName = 'update-state';
export const REMOVE_CLIENT: CommandName = 'remove-client';
// Replies sent back towards the machine after a description arrived
export const GET_STATES: CommandName = 'get-states';
export const RECEIVED_FSM: CommandName = 'received-fsm';

export const COMMAND_NAMES: readonly CommandName[] = [SET_FSM, UPDATE_STATE, REMOVE_CLIENT, GET_STATES, RECEIVED_FSM];

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some(name => name === value);
}
