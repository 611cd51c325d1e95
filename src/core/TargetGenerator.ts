import type {
  TargetOptions,
  TargetDocument,
  GridSpec,
  TargetTheme,
  LogLevel,
} from '../types/index.js';
import { resolveTargetRequest } from './TargetRequest.js';
import { errorMessage, InvalidParameterError } from './errors.js';
import { GridCalculator } from '../geometry/GridCalculator.js';
import { TargetRenderer } from '../rendering/TargetRenderer.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Interface for the target generator.
 */
export interface ITargetGenerator {
  /**
   * Generates a single-page target PDF.
   */
  generate(options?: TargetOptions): Promise<TargetDocument>;

  /**
   * Computes the page layout without rendering it.
   */
  computeLayout(options?: TargetOptions): GridSpec;
}

/**
 * Configuration for TargetGenerator.
 */
export interface TargetGeneratorConfig {
  /**
   * Logging level, used when no logger is given.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /** Logger instance */
  logger?: ILogger;

  /** Color and font overrides */
  theme?: Partial<TargetTheme>;
}

/**
 * Main entry point: TargetOptions → TargetRequest → GridSpec → TargetDocument.
 * Holds no per-request state, so one instance can serve every request.
 */
export class TargetGenerator implements ITargetGenerator {
  private readonly logger: ILogger;
  private readonly calculator: GridCalculator;
  private readonly renderer: TargetRenderer;

  constructor(config: TargetGeneratorConfig = {}) {
    this.logger = config.logger ?? createLogger(config.logLevel ?? 'warn', 'TargetGenerator');
    this.calculator = new GridCalculator(this.logger.child('Grid'));
    this.renderer = new TargetRenderer(config.theme, this.logger.child('Render'));
  }

  computeLayout(options: TargetOptions = {}): GridSpec {
    const request = resolveTargetRequest(options);
    return this.calculator.computeGridSpec(request);
  }

  async generate(options: TargetOptions = {}): Promise<TargetDocument> {
    const startTime = Date.now();

    try {
      const request = resolveTargetRequest(options);
      const spec = this.calculator.computeGridSpec(request);
      const document = await this.renderer.render(spec, request);

      this.logger.info('Target generated', {
        filename: document.filename,
        bytes: document.bytes.length,
        durationMs: Date.now() - startTime,
      });

      return document;
    } catch (error) {
      if (error instanceof InvalidParameterError) {
        this.logger.warn('Rejected target parameters', { field: error.field, error: error.message });
      } else {
        this.logger.error('Failed to generate target', { error: errorMessage(error) });
      }
      throw error;
    }
  }
}

/**
 * Creates a new TargetGenerator instance.
 */
export function createGenerator(config?: TargetGeneratorConfig): ITargetGenerator {
  return new TargetGenerator(config);
}

/**
 * Convenience function to generate a target with default configuration.
 */
export async function generateTarget(
  options?: TargetOptions,
  config?: TargetGeneratorConfig
): Promise<TargetDocument> {
  return new TargetGenerator(config).generate(options);
}
