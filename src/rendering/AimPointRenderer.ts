/**
 * Paints the aiming mark at the centre of the grid.
 */

import { LineCapStyle, type PDFPage } from 'pdf-lib';
import type { AimPointStyle, GridSpec, Point, Rgba } from '../types/index.js';
import { AIM_CIRCLE_WIDTH } from '../core/constants.js';
import { UnitConverter } from '../core/UnitConverter.js';
import { ColorResolver } from '../theme/ColorResolver.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Configuration for AimPointRenderer.
 */
export interface AimPointRendererConfig {
  /** Aim mark color */
  color: Rgba;
  /** Logger instance */
  logger?: ILogger;
}

export class AimPointRenderer {
  private readonly logger: ILogger;
  private readonly colorResolver = new ColorResolver();
  private readonly unitConverter = new UnitConverter();
  private readonly color: Rgba;

  constructor(config: AimPointRendererConfig) {
    this.logger = config.logger ?? createLogger('warn', 'AimPointRenderer');
    this.color = config.color;
  }

  /**
   * Draws the aim mark for `style`.
   * @param page Target page
   * @param spec Grid layout
   * @param style Aim point style
   * @param lineThickness Diagonal and crosshair stroke width in inches
   */
  renderAimPoint(page: PDFPage, spec: GridSpec, style: AimPointStyle, lineThickness: number): void {
    switch (style) {
      case 'diagonal':
        this.renderDiagonals(page, spec, lineThickness);
        break;
      case 'crosshair':
        this.renderCrosshair(page, spec, lineThickness);
        break;
      case 'circles':
        this.renderCircles(page, spec);
        break;
      case 'none':
        break;
    }
  }

  /**
   * Corner-to-corner X across the grid.
   */
  private renderDiagonals(page: PDFPage, spec: GridSpec, lineThickness: number): void {
    const { x, y, width, height } = spec.gridBounds;
    this.strokeLine(page, { x, y }, { x: x + width, y: y + height }, lineThickness);
    this.strokeLine(page, { x: x + width, y }, { x, y: y + height }, lineThickness);
  }

  /**
   * Horizontal and vertical bars through the origin.
   */
  private renderCrosshair(page: PDFPage, spec: GridSpec, lineThickness: number): void {
    const { origin, gridBounds } = spec;
    this.strokeLine(page, { x: gridBounds.x, y: origin.y }, { x: gridBounds.x + gridBounds.width, y: origin.y }, lineThickness);
    this.strokeLine(page, { x: origin.x, y: gridBounds.y }, { x: origin.x, y: gridBounds.y + gridBounds.height }, lineThickness);
  }

  private renderCircles(page: PDFPage, spec: GridSpec): void {
    for (const radius of spec.aimCircleRadii) {
      page.drawCircle({
        x: spec.origin.x,
        y: spec.origin.y,
        size: radius,
        borderColor: this.colorResolver.toPdfColor(this.color),
        borderOpacity: this.colorResolver.toOpacity(this.color),
        borderWidth: AIM_CIRCLE_WIDTH,
      });
    }

    this.logger.debug('Rendered aim circles', { count: spec.aimCircleRadii.length });
  }

  private strokeLine(page: PDFPage, start: Point, end: Point, thicknessInches: number): void {
    const thickness = this.unitConverter.inchesToPoints(thicknessInches);

    // Zero-width strokes print as hairlines in most viewers
    if (thickness <= 0) {
      return;
    }

    page.drawLine({
      start,
      end,
      thickness,
      color: this.colorResolver.toPdfColor(this.color),
      opacity: this.colorResolver.toOpacity(this.color),
      lineCap: LineCapStyle.Projecting,
    });
  }
}
