import type { DistanceUnit } from '../types/options.js';

/**
 * Length and angle constants.
 *
 * PDF user space is measured in points.
 * 1 inch = 72 points
 * 1 inch = 25.4 mm
 * 1 yard = 36 inches
 * 1 degree = 60 minutes of angle
 */

/** Points per inch */
export const POINTS_PER_INCH = 72;

/** Millimetres per inch */
export const MM_PER_INCH = 25.4;

/** Inches per yard */
export const INCHES_PER_YARD = 36;

/** Inches per meter */
export const INCHES_PER_METER = 1000 / MM_PER_INCH;

/** Minutes of angle per degree */
export const MOA_PER_DEGREE = 60;

/**
 * Unit converter for target layout.
 */
export class UnitConverter {
  /**
   * Converts inches to points.
   */
  inchesToPoints(inches: number): number {
    return inches * POINTS_PER_INCH;
  }

  /**
   * Converts points to inches.
   */
  pointsToInches(points: number): number {
    return points / POINTS_PER_INCH;
  }

  /**
   * Converts millimetres to points.
   */
  mmToPoints(mm: number): number {
    return (mm / MM_PER_INCH) * POINTS_PER_INCH;
  }

  /**
   * Converts points to millimetres.
   */
  pointsToMm(points: number): number {
    return (points / POINTS_PER_INCH) * MM_PER_INCH;
  }

  /**
   * Converts a shooting distance to inches.
   */
  distanceToInches(distance: number, unit: DistanceUnit): number {
    return unit === 'meters' ? distance * INCHES_PER_METER : distance * INCHES_PER_YARD;
  }

  /**
   * Converts minutes of angle to radians.
   */
  moaToRadians(moa: number): number {
    return (moa / MOA_PER_DEGREE) * (Math.PI / 180);
  }

  /**
   * Linear spread, in inches, that an angle of `moa` minutes covers at `distance`.
   * Uses the arc length, which is within a few parts per billion of the chord at
   * the angles a grid uses. 1 MOA at 100 yards is about 1.047 inches.
   */
  moaToInches(moa: number, distance: number, unit: DistanceUnit): number {
    return this.distanceToInches(distance, unit) * this.moaToRadians(moa);
  }

  /**
   * Same as moaToInches, in points.
   */
  moaToPoints(moa: number, distance: number, unit: DistanceUnit): number {
    return this.inchesToPoints(this.moaToInches(moa, distance, unit));
  }
}

/**
 * Shared converter instance.
 */
export const defaultUnitConverter = new UnitConverter();

/**
 * Converts inches to points.
 */
export function inchesToPoints(inches: number): number {
  return defaultUnitConverter.inchesToPoints(inches);
}

/**
 * Converts points to inches.
 */
export function pointsToInches(points: number): number {
  return defaultUnitConverter.pointsToInches(points);
}

/**
 * Converts minutes of angle at a distance to inches.
 */
export function moaToInches(moa: number, distance: number, unit: DistanceUnit): number {
  return defaultUnitConverter.moaToInches(moa, distance, unit);
}
