import { PDFDocument } from 'pdf-lib';
import type { GridSpec, TargetDocument, TargetRequest, TargetTheme } from '../types/index.js';
import { DEFAULT_TARGET_THEME } from '../types/index.js';
import { RenderFailureError, TargetError, errorMessage } from '../core/errors.js';
import { FontResolver } from '../text/FontResolver.js';
import { GridRenderer } from './GridRenderer.js';
import { AimPointRenderer } from './AimPointRenderer.js';
import { TextRenderer } from './TextRenderer.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Paints a computed grid onto a single PDF page.
 */
export class TargetRenderer {
  private readonly logger: ILogger;
  private readonly theme: TargetTheme;
  private readonly gridRenderer: GridRenderer;
  private readonly aimPointRenderer: AimPointRenderer;

  constructor(theme: Partial<TargetTheme> = {}, logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'TargetRenderer');
    this.theme = { ...DEFAULT_TARGET_THEME, ...theme };
    this.gridRenderer = new GridRenderer({
      gridColor: this.theme.grid,
      accentColor: this.theme.accent,
      logger: this.logger.child('Grid'),
    });
    this.aimPointRenderer = new AimPointRenderer({
      color: this.theme.aim,
      logger: this.logger.child('AimPoint'),
    });
  }

  /**
   * Renders the target and serializes it.
   *
   * Metadata updates are disabled so no creation date or producer is written;
   * the same layout always serializes to the same bytes.
   *
   * @throws RenderFailureError if pdf-lib cannot draw or save the document
   */
  async render(spec: GridSpec, request: TargetRequest): Promise<TargetDocument> {
    try {
      const doc = await PDFDocument.create({ updateMetadata: false });
      doc.setTitle(spec.title);

      const fonts = new FontResolver(doc, this.logger.child('Fonts'));
      const textRenderer = new TextRenderer({
        font: await fonts.getFont(this.theme.fontFamily),
        logger: this.logger.child('Text'),
      });

      const page = doc.addPage([spec.page.width, spec.page.height]);

      textRenderer.renderText(page, spec.legend, this.theme.text);

      if (request.scopeAdjustmentText) {
        this.gridRenderer.renderQuadrantLines(page, spec);
      }

      this.gridRenderer.renderGrid(page, spec);
      this.aimPointRenderer.renderAimPoint(page, spec, request.aimPoint, request.aimLineThickness);
      textRenderer.renderAll(page, spec.axisLabels, this.theme.text);
      textRenderer.renderAll(page, spec.quadrantHints, this.theme.accent);

      const bytes = await doc.save();

      this.logger.debug('Serialized target', { bytes: bytes.length, title: spec.title });

      return {
        bytes,
        filename: spec.filename,
        title: spec.title,
        pageCount: doc.getPageCount(),
        size: { ...spec.page },
      };
    } catch (error) {
      if (error instanceof TargetError) {
        throw error;
      }
      throw new RenderFailureError(`Failed to render target: ${errorMessage(error)}`, error);
    }
  }
}
