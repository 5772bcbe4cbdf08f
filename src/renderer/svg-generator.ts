import type { Diagram } from './diagram.js';
import type { IRenderer } from './interfaces.js';
import type { SvgElement } from './types.js';
import { escapeXml } from './utils.js';

/**
 * Serializes a diagram's vector document to SVG markup
 */
export class SVGRenderer implements IRenderer {
  private indent = '  ';

  render(diagram: Diagram): string {
    return this.serialize(diagram.toDocument());
  }

  serialize(element: SvgElement, depth = 0): string {
    const pad = this.indent.repeat(depth);
    const attrs = Object.entries(element.attrs)
      .map(([k, v]) => ` ${k}="${escapeXml(v)}"`)
      .join('');
    if (element.text !== undefined) {
      return `${pad}<${element.tag}${attrs}>${escapeXml(element.text)}</${element.tag}>`;
    }
    if (element.children.length === 0) {
      return `${pad}<${element.tag}${attrs} />`;
    }
    const inner = element.children.map(c => this.serialize(c, depth + 1)).join('\n');
    return `${pad}<${element.tag}${attrs}>\n${inner}\n${pad}</${element.tag}>`;
  }
}

export function renderSvg(diagram: Diagram): string {
  return new SVGRenderer().render(diagram);
}
