/**
 * Type definitions for scope-target.
 */

// Options and configuration
export type {
  TargetOptions,
  TargetRequest,
  DistanceUnit,
  PaperSize,
  AimPointStyle,
  LogLevel,
} from './options.js';
export {
  DEFAULT_TARGET_OPTIONS,
  DISTANCE_UNITS,
  PAPER_SIZE_NAMES,
  AIM_POINT_STYLES,
} from './options.js';

// Results
export type { GridSpec, TargetDocument } from './results.js';

// Theme
export type { TargetTheme } from './theme.js';
export { DEFAULT_TARGET_THEME } from './theme.js';

// Geometry
export type { Rgba, Point, Size, Rect, TextAnchor, PlacedText } from './geometry.js';
export { Colors } from './geometry.js';
