/**
 * Command-line argument parsing for the target CLI.
 */

import { parseArgs } from 'node:util';
import { InvalidParameterError } from '../core/errors.js';
import { ColorResolver } from '../theme/ColorResolver.js';
import type { TargetOptions, TargetTheme, LogLevel, DistanceUnit, PaperSize, AimPointStyle } from '../types/index.js';
import { DISTANCE_UNITS, PAPER_SIZE_NAMES, AIM_POINT_STYLES } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidParameterError(flag, `--${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseChoice<T extends string>(flag: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidParameterError(flag, `--${flag} must be one of ${allowed.join(', ')}`);
  }
  return match;
}

export interface CliInvocation {
  options: TargetOptions;
  theme: Partial<TargetTheme>;
  outDir: string;
  logLevel: LogLevel;
}

/**
 * Turns command-line arguments into generator options.
 */
export function parseCliArgs(argv: string[]): CliInvocation {
  const { values } = parseArgs({
    args: argv,
    options: {
      distance: { type: 'string' },
      unit: { type: 'string' },
      moa: { type: 'string' },
      paper: { type: 'string' },
      aim: { type: 'string' },
      thickness: { type: 'string' },
      circles: { type: 'string' },
      'no-adjustment-text': { type: 'boolean' },
      color: { type: 'string' },
      out: { type: 'string' },
      'log-level': { type: 'string' },
    },
    strict: true,
  });

  const theme: Partial<TargetTheme> = {};
  if (values.color !== undefined) {
    const resolver = new ColorResolver();
    if (!resolver.isHexColor(values.color)) {
      throw new InvalidParameterError('color', `--color must be a hex color such as #000000, got "${values.color}"`);
    }
    const color = resolver.parseHexColor(values.color);
    theme.grid = color;
    theme.aim = color;
  }

  return {
    options: {
      distance: parseNumber('distance', values.distance),
      unit: parseChoice<DistanceUnit>('unit', values.unit, DISTANCE_UNITS),
      moa: parseNumber('moa', values.moa),
      paperSize: parseChoice<PaperSize>('paper', values.paper, PAPER_SIZE_NAMES),
      aimPoint: parseChoice<AimPointStyle>('aim', values.aim, AIM_POINT_STYLES),
      aimLineThickness: parseNumber('thickness', values.thickness),
      aimCircleCount: parseNumber('circles', values.circles),
      scopeAdjustmentText: values['no-adjustment-text'] !== true,
    },
    theme,
    outDir: values.out ?? '.',
    logLevel: parseChoice<LogLevel>('log-level', values['log-level'], LOG_LEVELS) ?? 'warn',
  };
}
