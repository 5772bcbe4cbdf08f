import type { PayloadIssue } from './types.js';
import { PayloadError, issueAt } from './errorBuilder.js';
import { parseFsmInfo, parseMachineCommand, parseStateChangedInfo } from './schema.js';
import { splitMessages } from './messages.js';
import { SET_FSM, UPDATE_STATE, isCommandName } from './commands.js';
import type { SessionRegistry } from '../session/registry.js';
import type { StateMachine } from '../session/state-machine.js';

export type InputKind = 'machine' | 'commands' | 'unknown';

function firstObject(text: string): Record<string, unknown> | undefined {
  const first = splitMessages(text)[0];
  if (!first) return undefined;
  try {
    const value: unknown = JSON.parse(first);
    return value !== null && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : undefined;
  } catch {
    return undefined;
  }
}

/** A single machine description, or a log of back-to-back commands. */
export function detectInputKind(text: string): InputKind {
  const obj = firstObject(text);
  if (!obj) return 'unknown';
  if ('states' in obj || 'States' in obj) return 'machine';
  if ('command' in obj || 'Command' in obj) return 'commands';
  return 'unknown';
}

function collect(issues: PayloadIssue[], prefix: string, run: () => void): void {
  try {
    run();
  } catch (e) {
    if (!(e instanceof PayloadError)) throw e;
    for (const issue of e.issues) {
      issues.push({ ...issue, path: [prefix, issue.path].filter(Boolean).join('.') });
    }
  }
}

/** Validates an input without laying anything out. */
export function check(text: string): { kind: InputKind; issues: PayloadIssue[] } {
  const kind = detectInputKind(text);
  const issues: PayloadIssue[] = [];
  switch (kind) {
    case 'machine':
      collect(issues, '', () => parseFsmInfo(text));
      break;
    case 'commands':
      // Messages are checked one by one; a bad envelope does not stop the rest
      splitMessages(text).forEach((raw, i) => {
        const at = `messages.${i}`;
        collect(issues, at, () => {
          const cmd = parseMachineCommand(raw);
          if (!isCommandName(cmd.command)) {
            issues.push(issueAt([at, 'command'], 'COMMAND-UNKNOWN', `Unknown command '${cmd.command}'`));
          } else if (cmd.command === SET_FSM) {
            collect(issues, `${at}.payload`, () => parseFsmInfo(cmd.payload));
          } else if (cmd.command === UPDATE_STATE) {
            collect(issues, `${at}.payload`, () => parseStateChangedInfo(cmd.payload));
          }
        });
      });
      break;
    default:
      issues.push(
        issueAt([], 'PAYLOAD-SHAPE-INVALID', 'Input is neither a machine description nor a command log', {
          hint: 'Expected a JSON object with "states", or JSON objects with "fsm", "command" and "payload".',
        })
      );
  }
  return { kind, issues };
}

/** Feeds an input through the registry as the given client. */
export function replay(text: string, clientId: string, registry: SessionRegistry): StateMachine[] {
  const kind = detectInputKind(text);
  switch (kind) {
    case 'machine': {
      const fsm = parseFsmInfo(text);
      return registry.dispatch({ clientId, command: { fsm: fsm.name, command: SET_FSM, payload: text } });
    }
    case 'commands':
      return registry.dispatchMessage(clientId, text);
    default:
      throw new PayloadError('input', check(text).issues);
  }
}
