import { parseFsmInfo } from '../core/schema.js';
import { PayloadError } from '../core/errorBuilder.js';
import type { PayloadIssue } from '../core/types.js';
import { Diagram } from './diagram.js';
import type { IRenderer } from './interfaces.js';
import { SVGRenderer } from './svg-generator.js';
import { escapeXml } from './utils.js';

export interface RenderOptions {
  /** Custom renderer (defaults to SVGRenderer) */
  renderer?: IRenderer;
}

export interface RenderResult {
  svg: string;
  diagram: Diagram | null;
  issues: PayloadIssue[];
}

/**
 * One-shot rendering of a machine description, without a session.
 * Invalid descriptions produce an error document instead of throwing.
 */
export class FsmRenderer {
  private renderer: IRenderer;

  constructor(renderer?: IRenderer) {
    this.renderer = renderer || new SVGRenderer();
  }

  render(payload: unknown, options: RenderOptions = {}): RenderResult {
    const renderer = options.renderer || this.renderer;
    let diagram: Diagram;
    try {
      diagram = new Diagram(parseFsmInfo(payload));
    } catch (error) {
      if (!(error instanceof PayloadError)) throw error;
      return { svg: this.generateErrorSvg(error.message), diagram: null, issues: error.issues };
    }
    return { svg: renderer.render(diagram), diagram, issues: [] };
  }

  private generateErrorSvg(message: string): string {
    const width = 400;
    const height = 200;

    return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}">
  <rect width="${width}" height="${height}" style="stroke-width:2px;stroke:#ff0000;fill:#ffffff" />
  <text x="${width / 2}" y="${height / 2 - 20}" text-anchor="middle" style="font-family:Arial,sans-serif;font-size:16px">Render Error</text>
  <text x="${width / 2}" y="${height / 2 + 10}" text-anchor="middle" style="font-family:Arial,sans-serif;font-size:12px">${wrapText(message, 40)
    .map((line, i) => `<tspan x="${width / 2}" dy="${i === 0 ? 0 : 15}">${escapeXml(line)}</tspan>`)
    .join('')}</text>
</svg>`;
  }
}

function wrapText(text: string, maxLength: number): string[] {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    if (currentLine.length + word.length + 1 <= maxLength) {
      currentLine += (currentLine ? ' ' : '') + word;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }

  if (currentLine) lines.push(currentLine);
  return lines.slice(0, 3); // Limit to 3 lines
}

export function renderFsm(payload: unknown, options: RenderOptions = {}): RenderResult {
  return new FsmRenderer().render(payload, options);
}
