import { describe, it, expect, vi, afterEach } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import { TargetGenerator, generateTarget } from '../../src/core/TargetGenerator.js';
import { TargetRenderer } from '../../src/rendering/TargetRenderer.js';
import { InvalidParameterError, RenderFailureError } from '../../src/core/errors.js';
import { createLogger, type LogEntry } from '../../src/utils/Logger.js';
import type { TargetOptions } from '../../src/types/index.js';

const quiet = { logLevel: 'silent' } as const;

function header(bytes: Uint8Array): string {
  return Buffer.from(bytes.subarray(0, 5)).toString('latin1');
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('TargetGenerator', () => {
  describe('Document output', () => {
    it('should produce a PDF with exactly one page', async () => {
      const document = await generateTarget({}, quiet);

      expect(header(document.bytes)).toBe('%PDF-');
      expect(document.pageCount).toBe(1);

      const loaded = await PDFDocument.load(document.bytes);
      expect(loaded.getPageCount()).toBe(1);
    });

    it('should size the page for the paper and set the title', async () => {
      const document = await generateTarget({ paperSize: 'legal', distance: 50, unit: 'meters', moa: 0.5 }, quiet);
      const loaded = await PDFDocument.load(document.bytes);
      const size = loaded.getPage(0).getSize();

      expect(size.width).toBe(612);
      expect(size.height).toBe(1008);
      expect(document.size).toEqual({ width: 612, height: 1008 });
      expect(loaded.getTitle()).toBe('Target - 50 meters - 0.5 MOA per click');
      expect(document.title).toBe('Target - 50 meters - 0.5 MOA per click');
      expect(document.filename).toBe('50_meters_0-5_moa.pdf');
    });

    it('should produce one page for every aim point style', async () => {
      const generator = new TargetGenerator(quiet);
      const styles: TargetOptions['aimPoint'][] = ['diagonal', 'crosshair', 'circles', 'none'];

      for (const aimPoint of styles) {
        const document = await generator.generate({ aimPoint, paperSize: 'a4' });
        const loaded = await PDFDocument.load(document.bytes);
        expect(loaded.getPageCount()).toBe(1);
        expect(loaded.getPage(0).getSize().width).toBeCloseTo(595.28, 2);
      }
    });

    it('should produce byte-identical output for identical input', async () => {
      const generator = new TargetGenerator(quiet);
      const options: TargetOptions = { distance: 200, moa: 0.5, aimPoint: 'circles' };

      const first = await generator.generate(options);
      const second = await generator.generate(options);

      expect(Buffer.from(first.bytes).equals(Buffer.from(second.bytes))).toBe(true);
    });

    it('should produce different output for different input', async () => {
      const generator = new TargetGenerator(quiet);

      const first = await generator.generate({ moa: 0.25 });
      const second = await generator.generate({ moa: 0.5 });

      expect(Buffer.from(first.bytes).equals(Buffer.from(second.bytes))).toBe(false);
    });
  });

  describe('Layout', () => {
    it('should expose the computed layout without rendering', () => {
      const render = vi.spyOn(TargetRenderer.prototype, 'render');
      const spec = new TargetGenerator(quiet).computeLayout({ distance: 100, moa: 0.25 });

      expect(spec.cellCount).toBe(28);
      expect(render).not.toHaveBeenCalled();
    });
  });

  describe('Errors', () => {
    it('should reject non-positive distance before rendering', async () => {
      const render = vi.spyOn(TargetRenderer.prototype, 'render');
      const generator = new TargetGenerator(quiet);

      await expect(generator.generate({ distance: 0 })).rejects.toBeInstanceOf(InvalidParameterError);
      await expect(generator.generate({ moa: -1 })).rejects.toBeInstanceOf(InvalidParameterError);
      expect(render).not.toHaveBeenCalled();
    });

    it('should surface an unavailable font as a render failure', async () => {
      const generator = new TargetGenerator({ ...quiet, theme: { fontFamily: 'Wingdings' } });

      await expect(generator.generate()).rejects.toBeInstanceOf(RenderFailureError);
      await expect(generator.generate()).rejects.toThrow('Font "Wingdings" is not available');
    });

    it('should wrap drawing library errors as render failures', async () => {
      vi.spyOn(PDFDocument.prototype, 'save').mockRejectedValue(new Error('disk full'));
      const generator = new TargetGenerator(quiet);

      await expect(generator.generate()).rejects.toThrow('Failed to render target: disk full');
      await expect(generator.generate()).rejects.toBeInstanceOf(RenderFailureError);
    });
  });

  describe('Logging', () => {
    it('should log each generated target', async () => {
      const entries: LogEntry[] = [];
      const logger = createLogger('info', 'test', (entry) => entries.push(entry));

      await new TargetGenerator({ logger }).generate();

      expect(entries.map((entry) => [entry.level, entry.context, entry.message])).toEqual([
        ['info', 'test', 'Target generated'],
      ]);
      expect(entries[0]?.data?.filename).toBe('100_yards_0-25_moa.pdf');
    });

    it('should log rejected parameters as warnings', async () => {
      const entries: LogEntry[] = [];
      const logger = createLogger('info', 'test', (entry) => entries.push(entry));

      await expect(new TargetGenerator({ logger }).generate({ distance: -1 })).rejects.toThrow();

      expect(entries.map((entry) => [entry.level, entry.message])).toEqual([
        ['warn', 'Rejected target parameters'],
      ]);
      expect(entries[0]?.data?.field).toBe('distance');
    });
  });
});
