import { z } from 'zod';
import type { CommandEnvelope, FsmInfo, MachineCommand, PayloadIssue, StateChangedInfo, StateInfo, TransitionInfo } from './types.js';
import { PayloadError, fromZodError, issueAt } from './errorBuilder.js';

// Input schemas using Zod. Missing fields take the defaults of the wire format.

export const TransitionInfoSchema: z.ZodType<TransitionInfo, z.ZodTypeDef, unknown> = z.object({
  endPointId: z.string().default(''),
  isHistory: z.boolean().default(false),
  isDeepHistory: z.boolean().default(false),
  isToFinal: z.boolean().default(false),
});

export const StateInfoSchema: z.ZodType<StateInfo, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().default(''),
    id: z.string().default(''),
    transitions: z.array(TransitionInfoSchema).default([]),
    children: z.array(FsmInfoSchema).default([]),
    isInitial: z.boolean().default(false),
    isFinal: z.boolean().default(false),
    hasHistory: z.boolean().default(false),
    hasDeepHistory: z.boolean().default(false),
  })
);

export const FsmInfoSchema: z.ZodType<FsmInfo, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().default(''),
    states: z.array(StateInfoSchema).default([]),
  })
);

export const StateChangedInfoSchema: z.ZodType<StateChangedInfo, z.ZodTypeDef, unknown> = z
  .object({
    machineName: z.string().optional(),
    fsm: z.string().optional(), // wire alias of machineName
    oldStateName: z.string().default(''),
    oldStateId: z.string().default(''),
    newStateName: z.string().default(''),
    newStateId: z.string().default(''),
  })
  .transform(({ machineName, fsm, ...rest }) => ({ machineName: machineName ?? fsm ?? '', ...rest }));

export const MachineCommandSchema: z.ZodType<MachineCommand, z.ZodTypeDef, unknown> = z.object({
  fsm: z.string().default(''),
  command: z.string(),
  // Normally a JSON string; an inline JSON value is accepted and re-serialised
  payload: z.unknown().transform(v => (typeof v === 'string' ? v : v === undefined ? '' : JSON.stringify(v))),
});

export const CommandEnvelopeSchema: z.ZodType<CommandEnvelope, z.ZodTypeDef, unknown> = z.object({
  clientId: z.string(),
  command: MachineCommandSchema,
});

/**
 * Lower-cases the first letter of every object key, recursively, so that
 * PascalCase payloads validate against the camelCase schemas.
 */
export function normalizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeKeys);
  if (value !== null && typeof value === 'object') {
    // A decoded "__proto__" key stays an own property
    return Object.fromEntries(
      Object.entries(value).map(([key, v]) => [key.length > 0 ? key[0].toLowerCase() + key.slice(1) : key, normalizeKeys(v)])
    );
  }
  return value;
}

function decode(payload: unknown, what: string): unknown {
  if (typeof payload !== 'string') return normalizeKeys(payload);
  try {
    return normalizeKeys(JSON.parse(payload));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new PayloadError(what, [issueAt([], 'PAYLOAD-JSON-INVALID', message, { hint: 'The payload must be a single JSON value.' })]);
  }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  const res = schema.safeParse(decode(payload, what));
  if (!res.success) throw new PayloadError(what, fromZodError(res.error));
  return res.data;
}

/** Structural rules the shape alone cannot express, checked for every nested machine too. */
export function checkStructure(fsm: FsmInfo, path: Array<string | number> = []): PayloadIssue[] {
  const issues: PayloadIssue[] = [];
  const initials = fsm.states.filter(s => s.isInitial).length;
  const finals = fsm.states.filter(s => s.isFinal).length;
  const where = [...path, 'states'];
  const label = fsm.name ? `Machine '${fsm.name}'` : 'Machine';
  if (initials === 0) {
    issues.push(issueAt(where, 'FSM-NO-INITIAL', `${label} has no initial state`, { hint: 'Mark exactly one state with isInitial: true.' }));
  } else if (initials > 1) {
    issues.push(issueAt(where, 'FSM-MULTIPLE-INITIAL', `${label} has ${initials} initial states`, { hint: 'Mark exactly one state with isInitial: true.' }));
  }
  if (finals > 1) {
    issues.push(issueAt(where, 'FSM-MULTIPLE-FINAL', `${label} has ${finals} final states`));
  }
  fsm.states.forEach((state, i) => {
    state.children.forEach((child, j) => {
      issues.push(...checkStructure(child, [...where, i, 'children', j]));
    });
  });
  return issues;
}

export function parseFsmInfo(payload: unknown): FsmInfo {
  const what = 'machine description';
  const fsm = parseWith(FsmInfoSchema, payload, what);
  const issues = checkStructure(fsm);
  if (issues.length > 0) throw new PayloadError(what, issues);
  return fsm;
}

export function parseStateChangedInfo(payload: unknown): StateChangedInfo {
  return parseWith(StateChangedInfoSchema, payload, 'state change notice');
}

export function parseMachineCommand(payload: unknown): MachineCommand {
  return parseWith(MachineCommandSchema, payload, 'command');
}

export function parseCommandEnvelope(payload: unknown): CommandEnvelope {
  return parseWith(CommandEnvelopeSchema, payload, 'command envelope');
}
