// Shared utilities for the SVG builder and serializer

export function escapeXml(text: string): string {
  return String(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Formats a coordinate with at most three decimals, '.' as decimal point and
 * no grouping. Halves round away from zero; negative zero prints as "0".
 */
export function formatNumber(n: number): string {
  const rounded = Math.sign(n) * (Math.round(Math.abs(n) * 1000) / 1000);
  if (rounded === 0) return '0';
  return String(rounded);
}
