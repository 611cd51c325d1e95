/**
 * Converts a target request into absolute page coordinates.
 *
 * The grid is square, centred on the printable area and sized so that one cell
 * spans `moa` minutes of angle at the target distance. PDF user space has its
 * origin at the bottom-left corner, so "up" is +y.
 */

import type { TargetRequest, GridSpec, PlacedText, Rect, Point } from '../types/index.js';
import { UnitConverter } from '../core/UnitConverter.js';
import { InvalidParameterError } from '../core/errors.js';
import {
  PAPER_SIZES,
  PAGE_MARGIN,
  MIN_TICK_SPACING,
  MIN_LABEL_SPACING,
  LEGEND_FONT_SIZE,
  LABEL_FONT_SIZE,
  LABEL_GAP,
  MAX_HINT_FONT_SIZE,
  HINT_SIZE_RATIO,
} from '../core/constants.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Scope adjustment hint for each quadrant. A group landing low-left of the aim
 * point needs the reticle moved right and up, and so on.
 */
const QUADRANT_HINTS: ReadonlyArray<{ text: string; dx: -1 | 1; dy: -1 | 1 }> = [
  { text: 'R/U', dx: -1, dy: -1 },
  { text: 'R/D', dx: -1, dy: 1 },
  { text: 'L/U', dx: 1, dy: -1 },
  { text: 'L/D', dx: 1, dy: 1 },
];

/**
 * Formats a length or angle without float noise: 0.6000000000000001 becomes "0.6".
 */
export function formatNumber(value: number): string {
  return String(Number(value.toFixed(3)));
}

/**
 * Builds a file name such as `100_yards_0-25_moa.pdf`.
 */
export function targetFilename(request: Pick<TargetRequest, 'distance' | 'unit' | 'moa'>): string {
  const slug = (value: number): string => formatNumber(value).replace('.', '-');
  return `${slug(request.distance)}_${request.unit}_${slug(request.moa)}_moa.pdf`;
}

/**
 * Builds the document title, e.g. `Target - 100 yards - 0.25 MOA per click`.
 */
export function targetTitle(request: Pick<TargetRequest, 'distance' | 'unit' | 'moa'>): string {
  return `Target - ${Math.trunc(request.distance)} ${request.unit} - ${formatNumber(request.moa)} MOA per click`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Computes grid layouts.
 */
export class GridCalculator {
  private readonly logger: ILogger;
  private readonly unitConverter: UnitConverter;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'GridCalculator');
    this.unitConverter = new UnitConverter();
  }

  /**
   * Computes the layout for a validated request.
   *
   * @throws InvalidParameterError if the spacing cannot be computed or one cell
   * per quadrant does not fit on the page
   */
  computeGridSpec(request: TargetRequest): GridSpec {
    const { distance, unit, moa } = request;

    if (!(distance > 0) || !(moa > 0)) {
      throw new InvalidParameterError(distance > 0 ? 'moa' : 'distance', 'Distance and MOA must be greater than zero');
    }

    const page = PAPER_SIZES[request.paperSize];
    const margin = PAGE_MARGIN;
    const printableArea: Rect = {
      x: margin,
      y: margin,
      width: page.width - 2 * margin,
      height: page.height - 2 * margin,
    };
    const origin: Point = {
      x: printableArea.x + printableArea.width / 2,
      y: printableArea.y + printableArea.height / 2,
    };

    const inchesPerMoa = this.unitConverter.moaToInches(1, distance, unit);
    const clickSize = this.unitConverter.moaToInches(moa, distance, unit);
    const clickPoints = this.unitConverter.inchesToPoints(clickSize);

    if (!Number.isFinite(clickPoints) || clickPoints <= 0) {
      throw new InvalidParameterError('moa', `Grid spacing for ${formatNumber(moa)} MOA at ${formatNumber(distance)} ${unit} cannot be computed`);
    }

    // Clicks too fine to print are grouped so each line still falls on a whole click
    const clicksPerTick = clickPoints < MIN_TICK_SPACING ? Math.ceil(MIN_TICK_SPACING / clickPoints) : 1;
    const tickSpacing = clickPoints * clicksPerTick;

    const side = Math.min(printableArea.width, printableArea.height);
    const cellCount = Math.floor(side / tickSpacing / 2) * 2;

    if (!(cellCount >= 2)) {
      throw new InvalidParameterError(
        'moa',
        `A ${formatNumber(moa)} MOA grid at ${formatNumber(distance)} ${unit} does not fit on ${request.paperSize} paper`
      );
    }

    if (clicksPerTick > 1) {
      this.logger.info('Click spacing below printable minimum, grouping clicks', {
        clickPoints: clickPoints.toFixed(3),
        clicksPerTick,
      });
    }

    const halfCells = cellCount / 2;
    const halfExtent = halfCells * tickSpacing;
    const left = clamp(origin.x - halfExtent, printableArea.x, printableArea.x + printableArea.width);
    const right = clamp(origin.x + halfExtent, printableArea.x, printableArea.x + printableArea.width);
    const bottom = clamp(origin.y - halfExtent, printableArea.y, printableArea.y + printableArea.height);
    const top = clamp(origin.y + halfExtent, printableArea.y, printableArea.y + printableArea.height);
    const gridBounds: Rect = { x: left, y: bottom, width: right - left, height: top - bottom };

    const verticalTicks: number[] = [];
    const horizontalTicks: number[] = [];
    for (let i = 0; i <= cellCount; i++) {
      const offset = (i - halfCells) * tickSpacing;
      verticalTicks.push(clamp(origin.x + offset, left, right));
      horizontalTicks.push(clamp(origin.y + offset, bottom, top));
    }

    const labelEvery = Math.max(1, Math.ceil(MIN_LABEL_SPACING / tickSpacing));
    const axisLabels: PlacedText[] = [];
    const labelBaseline = bottom - LABEL_GAP - LABEL_FONT_SIZE;
    verticalTicks.forEach((x, i) => {
      const steps = i - halfCells;
      if (steps % labelEvery !== 0) return;
      axisLabels.push({
        text: formatNumber(Math.abs(steps) * clicksPerTick * moa),
        position: { x, y: labelBaseline },
        size: LABEL_FONT_SIZE,
        anchor: 'center',
      });
    });

    const aimCircleRadii: number[] = [];
    if (request.aimPoint === 'circles') {
      const ringStep = labelEvery * tickSpacing;
      for (let k = 1; k <= request.aimCircleCount && k * ringStep <= halfExtent; k++) {
        aimCircleRadii.push(k * ringStep);
      }
    }

    const quadrantHints: PlacedText[] = [];
    if (request.scopeAdjustmentText) {
      const quarter = gridBounds.width / 4;
      const size = Math.min(MAX_HINT_FONT_SIZE, (gridBounds.width / 2) * HINT_SIZE_RATIO);
      for (const hint of QUADRANT_HINTS) {
        quadrantHints.push({
          text: hint.text,
          position: { x: origin.x + hint.dx * quarter, y: origin.y + hint.dy * quarter - size / 3 },
          size,
          anchor: 'center',
        });
      }
    }

    let legendText = `${formatNumber(moa)} MOA grid (${clickSize.toFixed(3)} in) at ${formatNumber(distance)} ${unit}`;
    if (clicksPerTick > 1) {
      legendText += `, lines every ${clicksPerTick} clicks`;
    }

    const spec: GridSpec = {
      page: { ...page },
      margin,
      printableArea,
      origin,
      inchesPerMoa,
      clickSize,
      clicksPerTick,
      tickSpacing,
      cellCount,
      gridBounds,
      verticalTicks,
      horizontalTicks,
      labelEvery,
      axisLabels,
      aimCircleRadii,
      quadrantHints,
      legend: {
        text: legendText,
        position: { x: page.width / 2, y: margin - LEGEND_FONT_SIZE / 3 },
        size: LEGEND_FONT_SIZE,
        anchor: 'center',
      },
      title: targetTitle(request),
      filename: targetFilename(request),
    };

    this.logger.debug('Computed grid', {
      paperSize: request.paperSize,
      tickSpacing: tickSpacing.toFixed(3),
      cellCount,
      labelEvery,
    });

    return spec;
  }
}

/**
 * Computes the layout for a request with a default calculator.
 */
export function computeGridSpec(request: TargetRequest): GridSpec {
  return new GridCalculator().computeGridSpec(request);
}
