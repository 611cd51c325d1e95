/**
 * Resolves font names to the 14 standard PDF fonts.
 * Standard fonts need no embedded font program, which keeps documents small
 * and their bytes stable from run to run.
 */

import { StandardFonts, type PDFDocument, type PDFFont } from 'pdf-lib';
import { RenderFailureError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Common family names mapped to standard fonts.
 */
const FONT_ALIASES: Record<string, StandardFonts> = {
  'helvetica': StandardFonts.Helvetica,
  'arial': StandardFonts.Helvetica,
  'sans-serif': StandardFonts.Helvetica,
  'helvetica-bold': StandardFonts.HelveticaBold,
  'arial-bold': StandardFonts.HelveticaBold,
  'times': StandardFonts.TimesRoman,
  'times-roman': StandardFonts.TimesRoman,
  'times new roman': StandardFonts.TimesRoman,
  'serif': StandardFonts.TimesRoman,
  'times-bold': StandardFonts.TimesRomanBold,
  'courier': StandardFonts.Courier,
  'courier new': StandardFonts.Courier,
  'monospace': StandardFonts.Courier,
  'courier-bold': StandardFonts.CourierBold,
};

/**
 * Resolves and embeds fonts for one document.
 */
export class FontResolver {
  private readonly logger: ILogger;
  private readonly embedded: Map<StandardFonts, PDFFont> = new Map();

  constructor(
    private readonly doc: PDFDocument,
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('warn', 'FontResolver');
  }

  /**
   * Maps a family name to a standard font.
   *
   * @throws RenderFailureError for names with no standard equivalent
   */
  resolveFontName(family: string): StandardFonts {
    const font = FONT_ALIASES[family.trim().toLowerCase()];
    if (font === undefined) {
      throw new RenderFailureError(`Font "${family}" is not available`);
    }
    return font;
  }

  /**
   * Embeds the font for `family`, reusing an earlier embedding.
   */
  async getFont(family: string): Promise<PDFFont> {
    const name = this.resolveFontName(family);
    const cached = this.embedded.get(name);
    if (cached) {
      return cached;
    }

    const font = await this.doc.embedFont(name);
    this.embedded.set(name, font);
    this.logger.debug('Embedded font', { family, name });
    return font;
  }
}
