/**
 * scope-target - printable PDF targets for zeroing a rifle scope.
 *
 * Converts a distance and a click value in minutes of angle into a square grid
 * whose cells match one click at that distance, and renders it to a single PDF page.
 */

// Main entry point
export { TargetGenerator, createGenerator, generateTarget } from './core/TargetGenerator.js';
export type { ITargetGenerator, TargetGeneratorConfig } from './core/TargetGenerator.js';
export { resolveTargetRequest, validateTargetRequest } from './core/TargetRequest.js';

// Errors
export { TargetError, InvalidParameterError, RenderFailureError } from './core/errors.js';
export type { TargetErrorCode } from './core/errors.js';

// Types
export type {
  TargetOptions,
  TargetRequest,
  DistanceUnit,
  PaperSize,
  AimPointStyle,
  LogLevel,
  GridSpec,
  TargetDocument,
  TargetTheme,
  Rgba,
  Point,
  Size,
  Rect,
  TextAnchor,
  PlacedText,
} from './types/index.js';
export {
  DEFAULT_TARGET_OPTIONS,
  DEFAULT_TARGET_THEME,
  DISTANCE_UNITS,
  PAPER_SIZE_NAMES,
  AIM_POINT_STYLES,
  Colors,
} from './types/index.js';

// Geometry (for advanced usage)
export { GridCalculator, computeGridSpec, targetFilename, targetTitle } from './geometry/index.js';
export { UnitConverter, inchesToPoints, pointsToInches, moaToInches } from './core/UnitConverter.js';
export { PAPER_SIZES, PAGE_MARGIN, MIN_TICK_SPACING } from './core/constants.js';

// Rendering (for advanced usage)
export { TargetRenderer, GridRenderer, AimPointRenderer, TextRenderer } from './rendering/index.js';
export { FontResolver } from './text/index.js';
export { ColorResolver } from './theme/ColorResolver.js';

// Web server
export { createApp } from './server/app.js';
export type { AppConfig } from './server/app.js';
export { loadServerConfig } from './server/config.js';
export type { ServerConfig } from './server/config.js';

// Logger
export { createLogger, Logger, consoleSink } from './utils/Logger.js';
export type { ILogger, LogEntry, LogSink } from './utils/Logger.js';
