import type { Diagram } from './diagram.js';

/**
 * Interface for renderers that generate output from a laid-out diagram
 */
export interface IRenderer {
  /**
   * Generate output from a diagram in its current highlight state
   * @param diagram The laid-out diagram
   * @returns String representation (SVG, etc.)
   */
  render(diagram: Diagram): string;
}
