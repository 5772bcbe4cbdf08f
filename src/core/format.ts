import type { PayloadIssue } from './types.js';

export type OutputFormat = 'svg' | 'json';

export function textReport(source: string, issues: PayloadIssue[]): string {
  if (issues.length === 0) return 'Valid';
  const lines: string[] = [];
  for (const e of issues) {
    lines.push(`\x1b[31merror\x1b[0m[${e.code}]: ${e.message}`);
    lines.push(`at ${source}${e.path ? `#${e.path}` : ''}`);
    if (e.hint) {
      const hintLines = String(e.hint).split(/\r?\n/);
      lines.push(`hint: ${hintLines[0]}`);
      for (let i = 1; i < hintLines.length; i++) {
        lines.push(`  ${hintLines[i]}`);
      }
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function toJsonResult(source: string, issues: PayloadIssue[]) {
  return {
    file: source,
    valid: issues.length === 0,
    errorCount: issues.length,
    errors: issues,
  };
}
