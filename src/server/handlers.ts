/**
 * Request handlers, kept independent of express so they can be called directly.
 */

import type { ITargetGenerator } from '../core/TargetGenerator.js';
import { InvalidParameterError, RenderFailureError, errorMessage } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { parseTargetForm } from './form.js';
import { renderFormPage } from './views.js';

/**
 * Framework-neutral HTTP response.
 */
export interface HandlerResponse {
  status: number;
  contentType: string;
  body: string | Buffer;
  headers?: Record<string, string>;
}

export const GENERIC_FAILURE_MESSAGE = 'Failed to generate target';

function htmlResponse(html: string): HandlerResponse {
  return { status: 200, contentType: 'text/html; charset=utf-8', body: html };
}

/**
 * GET /: the empty form.
 */
export function showForm(): HandlerResponse {
  return htmlResponse(renderFormPage());
}

/**
 * POST /create_target: validates the form and returns the PDF.
 * Invalid input re-renders the form with status 200 and an inline error.
 *
 * @throws anything other than InvalidParameterError, for `errorResponse` to handle
 */
export async function createTarget(
  body: unknown,
  generator: ITargetGenerator,
  logger: ILogger
): Promise<HandlerResponse> {
  const form = parseTargetForm(body);

  if (!form.success) {
    logger.info('Rejected form input', { field: form.field, error: form.error });
    return htmlResponse(renderFormPage({ values: form.values, error: form.error }));
  }

  try {
    const document = await generator.generate(form.options);
    return {
      status: 200,
      contentType: 'application/pdf',
      body: Buffer.from(document.bytes),
      headers: {
        'Content-Disposition': `attachment; filename="${document.filename}"`,
      },
    };
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      return htmlResponse(renderFormPage({ values: form.values, error: error.message }));
    }
    throw error;
  }
}

/**
 * 4xx status carried by body-parser (http-errors) failures, if any.
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Error response for anything thrown past the handlers.
 * Unreadable form bodies re-render the form with their 4xx status; render
 * failures and unexpected errors get a generic 500.
 */
export function errorResponse(error: unknown, logger: ILogger): HandlerResponse {
  const status = clientErrorStatus(error);
  if (status !== undefined) {
    const message = status === 413 ? 'Form submission is too large' : 'Form submission could not be read';
    logger.info('Rejected request body', { status, error: errorMessage(error) });
    return { ...htmlResponse(renderFormPage({ error: message })), status };
  }

  const kind = error instanceof RenderFailureError ? 'Render failure' : 'Unhandled error';
  logger.error(kind, { error: errorMessage(error) });
  return { status: 500, contentType: 'text/plain; charset=utf-8', body: GENERIC_FAILURE_MESSAGE };
}
