import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import { PDFDocument } from 'pdf-lib';
import { createApp } from '../../src/server/app.js';
import { TargetGenerator, type ITargetGenerator } from '../../src/core/TargetGenerator.js';
import { RenderFailureError } from '../../src/core/errors.js';
import { createLogger } from '../../src/utils/Logger.js';
import type { GridSpec, TargetDocument } from '../../src/types/index.js';

/**
 * Generator stand-in whose renderer always fails.
 */
class BrokenRenderGenerator implements ITargetGenerator {
  async generate(): Promise<TargetDocument> {
    throw new RenderFailureError('Failed to render target: out of memory');
  }

  computeLayout(): GridSpec {
    throw new RenderFailureError('Failed to render target: out of memory');
  }
}

interface RunningApp {
  baseUrl: string;
  close(): Promise<void>;
}

async function startApp(generator: ITargetGenerator): Promise<RunningApp> {
  const app = createApp({ generator, logger: createLogger('silent') });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

const formBody = { distance: '100', unit: 'yards', moa: '0.25', scopeAdjustmentText: 'on' };

describe('createApp', () => {
  let running: RunningApp;
  let broken: RunningApp;

  beforeAll(async () => {
    running = await startApp(new TargetGenerator({ logLevel: 'silent' }));
    broken = await startApp(new BrokenRenderGenerator());
  });

  afterAll(async () => {
    await running.close();
    await broken.close();
  });

  it('should serve the form', async () => {
    const response = await fetch(`${running.baseUrl}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await response.text()).toContain('<form method="post" action="/create_target">');
  });

  it('should answer health checks', async () => {
    const response = await fetch(`${running.baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('ok');
  });

  it('should return a one-page PDF download', async () => {
    const response = await fetch(`${running.baseUrl}/create_target`, {
      method: 'POST',
      body: new URLSearchParams(formBody),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/pdf');
    expect(response.headers.get('content-disposition')).toBe('attachment; filename="100_yards_0-25_moa.pdf"');

    const loaded = await PDFDocument.load(new Uint8Array(await response.arrayBuffer()));
    expect(loaded.getPageCount()).toBe(1);
  });

  it('should re-render the form for invalid input', async () => {
    const response = await fetch(`${running.baseUrl}/create_target`, {
      method: 'POST',
      body: new URLSearchParams({ ...formBody, moa: '0' }),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await response.text()).toContain('<p class="error" role="alert">MOA must be greater than zero</p>');
  });

  it('should hide render failures behind a generic 500', async () => {
    const response = await fetch(`${broken.baseUrl}/create_target`, {
      method: 'POST',
      body: new URLSearchParams(formBody),
    });

    expect(response.status).toBe(500);
    expect(await response.text()).toBe('Failed to generate target');
  });

  it('should reject an oversized form body with 413', async () => {
    const response = await fetch(`${running.baseUrl}/create_target`, {
      method: 'POST',
      body: new URLSearchParams({ ...formBody, notes: 'a'.repeat(20000) }),
    });

    expect(response.status).toBe(413);
    expect(await response.text()).toContain('<p class="error" role="alert">Form submission is too large</p>');
  });

  it('should reject an unsupported charset with 415', async () => {
    const response = await fetch(`${running.baseUrl}/create_target`, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded; charset=koi8-x' },
      body: 'distance=100&moa=0.25',
    });

    expect(response.status).toBe(415);
    expect(await response.text()).toContain('<p class="error" role="alert">Form submission could not be read</p>');
  });
});
