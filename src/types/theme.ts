import type { Rgba } from './geometry.js';
import { Colors } from './geometry.js';

/**
 * Colors and fonts used when painting a target.
 */
export interface TargetTheme {
  /** Grid lines */
  grid: Rgba;
  /** Diagonal, crosshair and circle aim marks */
  aim: Rgba;
  /** Quadrant lines and adjustment hints */
  accent: Rgba;
  /** Legend and axis labels */
  text: Rgba;
  /** Standard font name for all text */
  fontFamily: string;
}

export const DEFAULT_TARGET_THEME: TargetTheme = {
  grid: Colors.black,
  aim: Colors.black,
  accent: Colors.gray,
  text: Colors.black,
  fontFamily: 'Helvetica',
};
