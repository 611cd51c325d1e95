import { rgb, type RGB } from 'pdf-lib';
import type { Rgba } from '../types/index.js';
import { Colors } from '../types/index.js';

const HEX_COLOR = /^#?([0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/**
 * Converts between hex strings, RGBA and pdf-lib colors.
 */
export class ColorResolver {
  /**
   * True for #RGB, #RRGGBB or #RRGGBBAA, with or without the leading '#'.
   */
  isHexColor(hex: string): boolean {
    return HEX_COLOR.test(hex.trim());
  }

  /**
   * Parses a hex color string (#RGB, #RRGGBB or #RRGGBBAA) to RGBA.
   * Unparseable input resolves to black.
   */
  parseHexColor(hex: string): Rgba {
    hex = hex.trim().replace('#', '');

    if (hex.length === 3) {
      const c0 = hex[0] ?? '0';
      const c1 = hex[1] ?? '0';
      const c2 = hex[2] ?? '0';
      hex = c0 + c0 + c1 + c1 + c2 + c2;
    }

    if (!/^[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/.test(hex)) {
      return { ...Colors.black };
    }

    const r = parseInt(hex.substring(0, 2), 16);
    const g = parseInt(hex.substring(2, 4), 16);
    const b = parseInt(hex.substring(4, 6), 16);
    const a = hex.length === 8 ? parseInt(hex.substring(6, 8), 16) : 255;
    return { r, g, b, a };
  }

  /**
   * Converts RGBA to a pdf-lib device RGB color. Alpha is handled by `toOpacity`.
   */
  toPdfColor(color: Rgba): RGB {
    return rgb(color.r / 255, color.g / 255, color.b / 255);
  }

  /**
   * Alpha channel as a 0-1 opacity.
   */
  toOpacity(color: Rgba): number {
    return color.a / 255;
  }

  /**
   * Converts RGBA to hex string.
   */
  rgbaToHex(color: Rgba, includeAlpha: boolean = false): string {
    const r = color.r.toString(16).padStart(2, '0');
    const g = color.g.toString(16).padStart(2, '0');
    const b = color.b.toString(16).padStart(2, '0');

    if (includeAlpha) {
      const a = color.a.toString(16).padStart(2, '0');
      return `#${r}${g}${b}${a}`;
    }

    return `#${r}${g}${b}`;
  }
}
