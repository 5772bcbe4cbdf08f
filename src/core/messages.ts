// Senders may write several JSON commands back to back into one frame,
// e.g. `{"fsm":"a",...}{"fsm":"a",...}`. Split them at top-level object
// boundaries, ignoring braces that appear inside string literals.

import type { MachineCommand } from './types.js';
import { parseMachineCommand } from './schema.js';

export function splitMessages(text: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) out.push(text.slice(start, i + 1));
    }
  }
  // An unterminated trailing object is passed on so that parsing reports it
  if (depth > 0 && start >= 0) out.push(text.slice(start));
  return out;
}

export function parseMessages(text: string): MachineCommand[] {
  return splitMessages(text).map(parseMachineCommand);
}
