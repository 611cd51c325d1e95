/**
 * Paints grid and quadrant lines.
 */

import { LineCapStyle, type PDFPage } from 'pdf-lib';
import type { GridSpec, Rgba } from '../types/index.js';
import { GRID_LINE_WIDTH, QUADRANT_LINE_WIDTH } from '../core/constants.js';
import { ColorResolver } from '../theme/ColorResolver.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Configuration for GridRenderer.
 */
export interface GridRendererConfig {
  /** Grid line color */
  gridColor: Rgba;
  /** Quadrant line color */
  accentColor: Rgba;
  /** Logger instance */
  logger?: ILogger;
}

export class GridRenderer {
  private readonly logger: ILogger;
  private readonly colorResolver = new ColorResolver();
  private readonly gridColor: Rgba;
  private readonly accentColor: Rgba;

  constructor(config: GridRendererConfig) {
    this.logger = config.logger ?? createLogger('warn', 'GridRenderer');
    this.gridColor = config.gridColor;
    this.accentColor = config.accentColor;
  }

  /**
   * Draws the wide lines that split the grid into four quadrants.
   */
  renderQuadrantLines(page: PDFPage, spec: GridSpec): void {
    const { origin, gridBounds } = spec;
    const color = this.colorResolver.toPdfColor(this.accentColor);
    const opacity = this.colorResolver.toOpacity(this.accentColor);

    page.drawLine({
      start: { x: origin.x, y: gridBounds.y },
      end: { x: origin.x, y: gridBounds.y + gridBounds.height },
      thickness: QUADRANT_LINE_WIDTH,
      color,
      opacity,
      lineCap: LineCapStyle.Projecting,
    });
    page.drawLine({
      start: { x: gridBounds.x, y: origin.y },
      end: { x: gridBounds.x + gridBounds.width, y: origin.y },
      thickness: QUADRANT_LINE_WIDTH,
      color,
      opacity,
      lineCap: LineCapStyle.Projecting,
    });
  }

  /**
   * Draws one horizontal line per horizontal tick and one vertical line per vertical tick.
   */
  renderGrid(page: PDFPage, spec: GridSpec): void {
    const { gridBounds } = spec;
    const color = this.colorResolver.toPdfColor(this.gridColor);
    const opacity = this.colorResolver.toOpacity(this.gridColor);
    const left = gridBounds.x;
    const right = gridBounds.x + gridBounds.width;
    const bottom = gridBounds.y;
    const top = gridBounds.y + gridBounds.height;

    for (const y of spec.horizontalTicks) {
      page.drawLine({
        start: { x: left, y },
        end: { x: right, y },
        thickness: GRID_LINE_WIDTH,
        color,
        opacity,
        lineCap: LineCapStyle.Projecting,
      });
    }

    for (const x of spec.verticalTicks) {
      page.drawLine({
        start: { x, y: bottom },
        end: { x, y: top },
        thickness: GRID_LINE_WIDTH,
        color,
        opacity,
        lineCap: LineCapStyle.Projecting,
      });
    }

    this.logger.debug('Rendered grid', {
      lines: spec.horizontalTicks.length + spec.verticalTicks.length,
      color: this.colorResolver.rgbaToHex(this.gridColor),
    });
  }
}
