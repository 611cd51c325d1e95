/**
 * Page and layout constants. Lengths are in PDF points unless the name says otherwise.
 */

import type { PaperSize } from '../types/options.js';
import type { Size } from '../types/geometry.js';

/** Portrait page sizes in points */
export const PAPER_SIZES: Record<PaperSize, Size> = {
  letter: { width: 612, height: 792 },
  legal: { width: 612, height: 1008 },
  a4: { width: 595.28, height: 841.89 },
};

/** Blank border kept on every side of the page (0.5 inch) */
export const PAGE_MARGIN = 36;

/** Narrowest printable gap between grid lines (1/16 inch) */
export const MIN_TICK_SPACING = 4.5;

/** Narrowest gap between axis labels (0.5 inch) */
export const MIN_LABEL_SPACING = 36;

/** Grid line stroke width */
export const GRID_LINE_WIDTH = 1;

/** Quadrant line stroke width */
export const QUADRANT_LINE_WIDTH = 5;

/** Aim-circle stroke width */
export const AIM_CIRCLE_WIDTH = 2;

/** Legend font size */
export const LEGEND_FONT_SIZE = 12;

/** Axis label font size */
export const LABEL_FONT_SIZE = 7;

/** Gap between the bottom grid line and the top of the axis labels */
export const LABEL_GAP = 4;

/** Largest quadrant hint font size */
export const MAX_HINT_FONT_SIZE = 72;

/** Quadrant hint size as a share of the quadrant side */
export const HINT_SIZE_RATIO = 0.4;
