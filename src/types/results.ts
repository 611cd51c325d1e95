import type { Point, Rect, Size, PlacedText } from './geometry.js';

/**
 * Page layout derived from a TargetRequest. All lengths are in PDF points (1/72 inch).
 */
export interface GridSpec {
  /** Page size */
  page: Size;

  /** Blank border on every side of the page */
  margin: number;

  /** Page area inside the margins */
  printableArea: Rect;

  /** Centre of the printable area, also the centre of the grid */
  origin: Point;

  /** Linear size of one minute of angle at the target distance, in inches */
  inchesPerMoa: number;

  /** Linear size of one click (`moa` minutes of angle), in inches */
  clickSize: number;

  /** Clicks between neighbouring grid lines; above 1 when the click is too small to print */
  clicksPerTick: number;

  /** Distance between neighbouring grid lines */
  tickSpacing: number;

  /** Grid cells per side; always even so a line runs through the origin */
  cellCount: number;

  /** Outer edge of the grid */
  gridBounds: Rect;

  /** X coordinates of the vertical grid lines, left to right */
  verticalTicks: number[];

  /** Y coordinates of the horizontal grid lines, bottom to top */
  horizontalTicks: number[];

  /** Grid lines between neighbouring axis labels */
  labelEvery: number;

  /** MOA offsets printed under the grid */
  axisLabels: PlacedText[];

  /** Radii of the concentric aim-circles; empty unless the aim point is 'circles' */
  aimCircleRadii: number[];

  /** R/U, R/D, L/U, L/D hints; empty when scope adjustment text is off */
  quadrantHints: PlacedText[];

  /** Summary line at the bottom of the page */
  legend: PlacedText;

  /** Document title */
  title: string;

  /** Suggested file name for the document */
  filename: string;
}

/**
 * A rendered target.
 */
export interface TargetDocument {
  /** PDF bytes */
  bytes: Uint8Array;
  /** Suggested file name */
  filename: string;
  /** Document title */
  title: string;
  /** Always 1 */
  pageCount: number;
  /** Page size in points */
  size: Size;
}
