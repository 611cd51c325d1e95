/**
 * Unit the shooting distance is given in.
 */
export type DistanceUnit = 'yards' | 'meters';

/**
 * Supported paper sizes (portrait).
 */
export type PaperSize = 'letter' | 'legal' | 'a4';

/**
 * Aiming mark drawn at the centre of the grid.
 * - 'diagonal': an X from corner to corner of the grid
 * - 'crosshair': a thick + through the centre
 * - 'circles': concentric aim-circles around the centre
 * - 'none': grid only
 */
export type AimPointStyle = 'diagonal' | 'crosshair' | 'circles' | 'none';

/**
 * Logging level for the generator.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const DISTANCE_UNITS = ['yards', 'meters'] as const satisfies readonly DistanceUnit[];
export const PAPER_SIZE_NAMES = ['letter', 'legal', 'a4'] as const satisfies readonly PaperSize[];
export const AIM_POINT_STYLES = ['diagonal', 'crosshair', 'circles', 'none'] as const satisfies readonly AimPointStyle[];

/**
 * Options for generating a target.
 */
export interface TargetOptions {
  /**
   * Distance from the muzzle to the target.
   * @default 100
   */
  distance?: number;

  /**
   * Unit of `distance`.
   * @default 'yards'
   */
  unit?: DistanceUnit;

  /**
   * Minutes of angle per grid cell, usually the scope's click value.
   * @default 0.25
   */
  moa?: number;

  /**
   * @default 'letter'
   */
  paperSize?: PaperSize;

  /**
   * @default 'diagonal'
   */
  aimPoint?: AimPointStyle;

  /**
   * Stroke width of the diagonal or crosshair aim lines, in inches.
   * Zero leaves the aim lines out.
   * @default 0.125
   */
  aimLineThickness?: number;

  /**
   * Number of concentric circles drawn when `aimPoint` is 'circles'.
   * @default 3
   */
  aimCircleCount?: number;

  /**
   * Draw quadrant lines and the R/U, R/D, L/U, L/D adjustment hints.
   * @default true
   */
  scopeAdjustmentText?: boolean;
}

/**
 * Fully resolved target parameters. Immutable for the lifetime of one request.
 */
export type TargetRequest = Readonly<Required<TargetOptions>>;

/**
 * Default target options: a quarter-MOA grid at 100 yards on US Letter.
 */
export const DEFAULT_TARGET_OPTIONS: TargetRequest = {
  distance: 100,
  unit: 'yards',
  moa: 0.25,
  paperSize: 'letter',
  aimPoint: 'diagonal',
  aimLineThickness: 0.125,
  aimCircleCount: 3,
  scopeAdjustmentText: true,
};
