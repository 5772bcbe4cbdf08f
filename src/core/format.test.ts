import { describe, it, expect } from 'vitest';
import { textReport, toJsonResult } from './format.js';
import type { PayloadIssue } from './types.js';

const issues: PayloadIssue[] = [
  { path: 'states', code: 'FSM-NO-INITIAL', message: "Machine 'M' has no initial state", hint: 'Mark exactly one state with isInitial: true.' },
  { path: '', code: 'PAYLOAD-JSON-INVALID', message: 'Unexpected end of JSON input' },
];

describe('textReport', () => {
  it('says Valid when there is nothing to report', () => {
    expect(textReport('door.fsm.json', [])).toBe('Valid');
  });

  it('lists each issue with its location and hint', () => {
    expect(textReport('door.fsm.json', issues).split('\n')).toEqual([
      "\x1b[31merror\x1b[0m[FSM-NO-INITIAL]: Machine 'M' has no initial state",
      'at door.fsm.json#states',
      'hint: Mark exactly one state with isInitial: true.',
      '',
      '\x1b[31merror\x1b[0m[PAYLOAD-JSON-INVALID]: Unexpected end of JSON input',
      'at door.fsm.json',
      '',
    ]);
  });
});

describe('toJsonResult', () => {
  it('summarises the issues', () => {
    expect(toJsonResult('door.fsm.json', issues)).toEqual({ file: 'door.fsm.json', valid: false, errorCount: 2, errors: issues });
    expect(toJsonResult('ok.fsm.json', [])).toEqual({ file: 'ok.fsm.json', valid: true, errorCount: 0, errors: [] });
  });
});
