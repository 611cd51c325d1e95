import { describe, it, expect } from 'vitest';
import { resolveTargetRequest } from '../../src/core/TargetRequest.js';
import { InvalidParameterError } from '../../src/core/errors.js';
import { DEFAULT_TARGET_OPTIONS } from '../../src/types/index.js';
import type { TargetOptions } from '../../src/types/index.js';

function fieldOf(options: TargetOptions): string | undefined {
  try {
    resolveTargetRequest(options);
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      return error.field;
    }
    throw error;
  }
  return undefined;
}

describe('resolveTargetRequest', () => {
  it('should apply defaults', () => {
    expect(resolveTargetRequest()).toEqual(DEFAULT_TARGET_OPTIONS);
  });

  it('should treat undefined options as unset', () => {
    const request = resolveTargetRequest({ distance: undefined, moa: 0.5 });
    expect(request.distance).toBe(100);
    expect(request.moa).toBe(0.5);
  });

  it('should return a frozen request', () => {
    expect(Object.isFrozen(resolveTargetRequest({ unit: 'meters' }))).toBe(true);
  });

  it('should reject non-positive or non-finite distance and spacing', () => {
    expect(fieldOf({ distance: 0 })).toBe('distance');
    expect(fieldOf({ distance: -100 })).toBe('distance');
    expect(fieldOf({ distance: Number.POSITIVE_INFINITY })).toBe('distance');
    expect(fieldOf({ moa: 0 })).toBe('moa');
    expect(fieldOf({ moa: Number.NaN })).toBe('moa');
  });

  it('should report a readable message', () => {
    expect(() => resolveTargetRequest({ moa: -0.25 })).toThrow('MOA must be greater than zero');
    expect(() => resolveTargetRequest({ distance: 0 })).toThrow('Distance must be greater than zero');
  });

  it('should reject unsupported choices from untyped callers', () => {
    const paper: TargetOptions = JSON.parse('{"paperSize":"a5"}');
    const unit: TargetOptions = JSON.parse('{"unit":"feet"}');
    const aim: TargetOptions = JSON.parse('{"aimPoint":"dot"}');

    expect(fieldOf(paper)).toBe('paperSize');
    expect(fieldOf(unit)).toBe('unit');
    expect(fieldOf(aim)).toBe('aimPoint');
    expect(() => resolveTargetRequest(paper)).toThrow('Unsupported paper size: a5');
  });

  it('should reject a negative aim line thickness and fractional circle counts', () => {
    expect(fieldOf({ aimLineThickness: -0.1 })).toBe('aimLineThickness');
    expect(fieldOf({ aimCircleCount: 1.5 })).toBe('aimCircleCount');
    expect(fieldOf({ aimLineThickness: 0, aimCircleCount: 0 })).toBeUndefined();
  });
});
