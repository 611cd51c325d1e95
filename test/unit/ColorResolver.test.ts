import { describe, it, expect } from 'vitest';
import { rgb } from 'pdf-lib';
import { ColorResolver } from '../../src/theme/ColorResolver.js';
import { Colors } from '../../src/types/index.js';

describe('ColorResolver', () => {
  describe('Hex color parsing', () => {
    it('should parse 6-digit hex colors', () => {
      const resolver = new ColorResolver();

      expect(resolver.parseHexColor('FF0000')).toEqual({ r: 255, g: 0, b: 0, a: 255 });
      expect(resolver.parseHexColor('00FF00')).toEqual({ r: 0, g: 255, b: 0, a: 255 });
      expect(resolver.parseHexColor('0000ff')).toEqual({ r: 0, g: 0, b: 255, a: 255 });
    });

    it('should parse 3-digit hex shorthand', () => {
      const resolver = new ColorResolver();

      expect(resolver.parseHexColor('F00')).toEqual({ r: 255, g: 0, b: 0, a: 255 });
      expect(resolver.parseHexColor('888')).toEqual({ r: 136, g: 136, b: 136, a: 255 });
    });

    it('should handle # prefix', () => {
      const resolver = new ColorResolver();

      expect(resolver.parseHexColor('#FF0000')).toEqual({ r: 255, g: 0, b: 0, a: 255 });
    });

    it('should parse 8-digit hex with alpha', () => {
      const resolver = new ColorResolver();

      expect(resolver.parseHexColor('FF000080')).toEqual({ r: 255, g: 0, b: 0, a: 128 });
    });

    it('should fall back to black for invalid input', () => {
      const resolver = new ColorResolver();

      expect(resolver.parseHexColor('not-a-color')).toEqual(Colors.black);
      expect(resolver.parseHexColor('#12')).toEqual(Colors.black);
    });
  });

  describe('Hex color detection', () => {
    it('should accept 3, 6 and 8 digit colors', () => {
      const resolver = new ColorResolver();

      expect(resolver.isHexColor('#f00')).toBe(true);
      expect(resolver.isHexColor('ff0000')).toBe(true);
      expect(resolver.isHexColor(' #FF000080 ')).toBe(true);
    });

    it('should reject anything else', () => {
      const resolver = new ColorResolver();

      expect(resolver.isHexColor('ff00zz')).toBe(false);
      expect(resolver.isHexColor('#12')).toBe(false);
      expect(resolver.isHexColor('#ff00000')).toBe(false);
      expect(resolver.isHexColor('red')).toBe(false);
    });
  });

  describe('PDF conversion', () => {
    it('should convert RGBA to a pdf-lib RGB color', () => {
      const resolver = new ColorResolver();

      expect(resolver.toPdfColor(Colors.black)).toEqual(rgb(0, 0, 0));
      expect(resolver.toPdfColor({ r: 255, g: 0, b: 51, a: 255 })).toEqual(rgb(1, 0, 0.2));
    });

    it('should convert alpha to opacity', () => {
      const resolver = new ColorResolver();

      expect(resolver.toOpacity(Colors.gray)).toBe(1);
      expect(resolver.toOpacity({ r: 0, g: 0, b: 0, a: 0 })).toBe(0);
    });
  });

  describe('Hex output', () => {
    it('should convert RGBA to hex', () => {
      const resolver = new ColorResolver();

      expect(resolver.rgbaToHex(Colors.gray)).toBe('#808080');
      expect(resolver.rgbaToHex({ r: 255, g: 0, b: 0, a: 128 }, true)).toBe('#ff000080');
    });
  });
});
