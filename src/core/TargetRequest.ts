import type { TargetOptions, TargetRequest } from '../types/index.js';
import {
  DEFAULT_TARGET_OPTIONS,
  DISTANCE_UNITS,
  PAPER_SIZE_NAMES,
  AIM_POINT_STYLES,
} from '../types/index.js';
import { InvalidParameterError } from './errors.js';

/**
 * Merges options over the defaults and validates the result.
 * Options explicitly set to undefined fall back to their defaults.
 *
 * @throws InvalidParameterError when a value is out of range or unsupported
 */
export function resolveTargetRequest(options: TargetOptions = {}): TargetRequest {
  const request: TargetRequest = {
    distance: options.distance ?? DEFAULT_TARGET_OPTIONS.distance,
    unit: options.unit ?? DEFAULT_TARGET_OPTIONS.unit,
    moa: options.moa ?? DEFAULT_TARGET_OPTIONS.moa,
    paperSize: options.paperSize ?? DEFAULT_TARGET_OPTIONS.paperSize,
    aimPoint: options.aimPoint ?? DEFAULT_TARGET_OPTIONS.aimPoint,
    aimLineThickness: options.aimLineThickness ?? DEFAULT_TARGET_OPTIONS.aimLineThickness,
    aimCircleCount: options.aimCircleCount ?? DEFAULT_TARGET_OPTIONS.aimCircleCount,
    scopeAdjustmentText: options.scopeAdjustmentText ?? DEFAULT_TARGET_OPTIONS.scopeAdjustmentText,
  };

  validateTargetRequest(request);
  return Object.freeze(request);
}

/**
 * Checks a request without applying defaults.
 *
 * @throws InvalidParameterError on the first invalid field
 */
export function validateTargetRequest(request: TargetRequest): void {
  requirePositive('distance', request.distance);
  requirePositive('moa', request.moa);

  if (!DISTANCE_UNITS.includes(request.unit)) {
    throw new InvalidParameterError('unit', `Unsupported distance unit: ${String(request.unit)}`);
  }

  if (!PAPER_SIZE_NAMES.includes(request.paperSize)) {
    throw new InvalidParameterError('paperSize', `Unsupported paper size: ${String(request.paperSize)}`);
  }

  if (!AIM_POINT_STYLES.includes(request.aimPoint)) {
    throw new InvalidParameterError('aimPoint', `Unsupported aim point style: ${String(request.aimPoint)}`);
  }

  if (!Number.isFinite(request.aimLineThickness) || request.aimLineThickness < 0) {
    throw new InvalidParameterError('aimLineThickness', 'Aim line thickness must be zero or more');
  }

  if (!Number.isInteger(request.aimCircleCount) || request.aimCircleCount < 0) {
    throw new InvalidParameterError('aimCircleCount', 'Aim circle count must be a whole number');
  }
}

function requirePositive(field: 'distance' | 'moa', value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(field, `${field === 'moa' ? 'MOA' : 'Distance'} must be greater than zero`);
  }
}
