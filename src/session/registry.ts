import { GET_STATES, RECEIVED_FSM, REMOVE_CLIENT, SET_FSM, UPDATE_STATE } from '../core/commands.js';
import { PayloadError, issueAt } from '../core/errorBuilder.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { parseMessages } from '../core/messages.js';
import type { CommandEnvelope, CommandName } from '../core/types.js';
import { StateMachine, buildKey } from './state-machine.js';

export type SessionEvent = 'fsm-received' | 'state-updated' | 'fsm-removed';
export type SessionListener = (machine: StateMachine) => void;

export interface SessionRegistryOptions {
  logger?: Logger;
  /** Outgoing replies towards the connected machine; dropped when absent. */
  send?: (envelope: CommandEnvelope) => void;
}

/**
 * Owns one StateMachine per (client, machine name) and routes incoming
 * commands to it. Commands for one key are applied one at a time, in order.
 */
export class SessionRegistry {
  private readonly machines = new Map<string, StateMachine>();
  private readonly listeners: Record<SessionEvent, Set<SessionListener>> = {
    'fsm-received': new Set(),
    'state-updated': new Set(),
    'fsm-removed': new Set(),
  };
  private readonly logger: Logger;
  private readonly send?: (envelope: CommandEnvelope) => void;

  constructor(options: SessionRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.send = options.send;
  }

  on(event: SessionEvent, listener: SessionListener): () => void {
    this.listeners[event].add(listener);
    return () => {
      this.listeners[event].delete(listener);
    };
  }

  get(clientId: string, fsmName: string): StateMachine | undefined {
    return this.machines.get(buildKey(clientId, fsmName));
  }

  getOrCreate(clientId: string, fsmName: string): StateMachine {
    const key = buildKey(clientId, fsmName);
    const existing = this.machines.get(key);
    if (existing) return existing;
    const machine = new StateMachine(clientId, fsmName, { logger: this.logger });
    this.machines.set(key, machine);
    return machine;
  }

  sessions(): StateMachine[] {
    return [...this.machines.values()];
  }

  removeClient(clientId: string): StateMachine[] {
    const removed = this.sessions().filter(m => m.clientId === clientId);
    for (const machine of removed) {
      this.emit('fsm-removed', machine);
      this.machines.delete(machine.key);
    }
    return removed;
  }

  /** Applies one command and returns the sessions it touched. */
  dispatch(envelope: CommandEnvelope): StateMachine[] {
    const { clientId, command } = envelope;
    switch (command.command) {
      case SET_FSM: {
        const machine = this.getOrCreate(clientId, command.fsm).onSetMachine(command.payload);
        this.emit('fsm-received', machine);
        this.reply(clientId, command.fsm, RECEIVED_FSM);
        this.reply(clientId, command.fsm, GET_STATES);
        return [machine];
      }
      case UPDATE_STATE: {
        const machine = this.getOrCreate(clientId, command.fsm).onStateChanged(command.payload);
        this.emit('state-updated', machine);
        return [machine];
      }
      case REMOVE_CLIENT:
        return this.removeClient(command.payload.trim() || clientId);
      case GET_STATES:
      case RECEIVED_FSM:
        return [];
      default:
        throw new PayloadError('command', [
          issueAt(['command'], 'COMMAND-UNKNOWN', `Unknown command '${command.command}'`, {
            hint: `Expected one of: ${SET_FSM}, ${UPDATE_STATE}, ${REMOVE_CLIENT}.`,
          }),
        ]);
    }
  }

  /** Splits a frame of back-to-back JSON commands and dispatches each in order. */
  dispatchMessage(clientId: string, text: string): StateMachine[] {
    return parseMessages(text).flatMap(command => this.dispatch({ clientId, command }));
  }

  private reply(clientId: string, fsm: string, name: CommandName): void {
    this.send?.({ clientId, command: { fsm, command: name, payload: '' } });
  }

  private emit(event: SessionEvent, machine: StateMachine): void {
    for (const listener of this.listeners[event]) listener(machine);
  }
}
