/**
 * Paints positioned text runs.
 */

import type { PDFFont, PDFPage } from 'pdf-lib';
import type { PlacedText, Rgba } from '../types/index.js';
import { ColorResolver } from '../theme/ColorResolver.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Configuration for TextRenderer.
 */
export interface TextRendererConfig {
  /** Font for every run */
  font: PDFFont;
  /** Logger instance */
  logger?: ILogger;
}

export class TextRenderer {
  private readonly logger: ILogger;
  private readonly colorResolver = new ColorResolver();
  private readonly font: PDFFont;

  constructor(config: TextRendererConfig) {
    this.logger = config.logger ?? createLogger('warn', 'TextRenderer');
    this.font = config.font;
  }

  /**
   * X coordinate where the run starts, given its anchor.
   */
  alignedX(run: PlacedText): number {
    const width = this.font.widthOfTextAtSize(run.text, run.size);
    switch (run.anchor) {
      case 'start':
        return run.position.x;
      case 'center':
        return run.position.x - width / 2;
      case 'end':
        return run.position.x - width;
    }
  }

  renderText(page: PDFPage, run: PlacedText, color: Rgba): void {
    page.drawText(run.text, {
      x: this.alignedX(run),
      y: run.position.y,
      size: run.size,
      font: this.font,
      color: this.colorResolver.toPdfColor(color),
      opacity: this.colorResolver.toOpacity(color),
    });
  }

  renderAll(page: PDFPage, runs: readonly PlacedText[], color: Rgba): void {
    for (const run of runs) {
      this.renderText(page, run, color);
    }
    if (runs.length > 0) {
      this.logger.debug('Rendered text', { runs: runs.length });
    }
  }
}
