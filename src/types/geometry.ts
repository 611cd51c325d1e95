/**
 * RGBA color with values 0-255 for each channel.
 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * 2D point in page space (points, origin at the bottom-left corner).
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Size with width and height.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Rectangle with its bottom-left corner at (x, y).
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Horizontal alignment of a text run relative to its anchor.
 */
export type TextAnchor = 'start' | 'center' | 'end';

/**
 * A text run positioned on the page.
 */
export interface PlacedText {
  text: string;
  /** Anchor point; the baseline passes through `position.y` */
  position: Point;
  /** Font size in points */
  size: number;
  anchor: TextAnchor;
}

/**
 * RGBA colors used by the default theme.
 */
export const Colors = {
  black: { r: 0, g: 0, b: 0, a: 255 },
  gray: { r: 128, g: 128, b: 128, a: 255 },
} as const satisfies Record<string, Rgba>;
