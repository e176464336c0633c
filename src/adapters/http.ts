/**
 * Fetch-style HTTP handler: (Request) => Promise<Response>.
 *
 * Routes:
 *   POST     /write        line-protocol ingestion
 *   GET|POST /query        `{"results": []}` for clients probing databases
 *   GET|HEAD /ping         204, InfluxDB clients check it before writing
 *   GET      metricsPath   scrape
 *   GET      /             landing page
 */

import { gunzipSync } from 'node:zlib';
import type { ExporterContext } from '../core/ExporterContext.ts';
import type { Pipeline } from '../core/Pipeline.ts';
import type { Collector } from '../core/Collector.ts';

export type FetchHandler = (req: Request) => Promise<Response>;

export interface HttpHandlerOptions {
  metricsPath: string;
}

const QUERY_STUB_BODY = '{"results": []}';

function landingPage(metricsPath: string): string {
  return `<html>
<head><title>InfluxDB Exporter</title></head>
<body>
<h1>InfluxDB Exporter</h1>
<p><a href="${metricsPath}">Metrics</a></p>
</body>
</html>`;
}

function methodNotAllowed(allow: string): Response {
  return new Response('Method Not Allowed', { status: 405, headers: { Allow: allow } });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map pipeline status codes to HTTP responses. */
function pipelineResultToResponse(status: number, message: string): Response {
  switch (status) {
    case 204:
      return new Response(null, { status: 204 }); // InfluxDB acknowledges writes with no content
    default:
      return new Response(message, { status, headers: { 'Content-Type': 'text/plain; charset=utf-8' } });
  }
}

async function readBody(req: Request): Promise<Uint8Array> {
  const raw = new Uint8Array(await req.arrayBuffer());
  const encoding = req.headers.get('content-encoding')?.trim().toLowerCase();
  if (encoding === 'gzip') return gunzipSync(raw);
  return raw;
}

export function createWriteHandler(ctx: ExporterContext, pipeline: Pipeline): FetchHandler {
  return async (req: Request): Promise<Response> => {
    ctx.markPush();

    let body: Uint8Array;
    try {
      body = await readBody(req);
    } catch (err) {
      ctx.logger.warn('error reading write body', { error: errorMessage(err) });
      return new Response(`error reading body: ${errorMessage(err)}`, { status: 500 });
    }

    const precision = new URL(req.url).searchParams.get('precision') || 'ns';
    const result = pipeline.process(body, precision);
    if (result.status >= 400) {
      ctx.logger.debug('rejected write', { status: result.status, message: result.message });
    }
    return pipelineResultToResponse(result.status, result.message);
  };
}

export function createMetricsHandler(ctx: ExporterContext, collector: Collector): FetchHandler {
  return async (): Promise<Response> => {
    try {
      const { contentType, body } = await collector.collect();
      return new Response(body, { status: 200, headers: { 'Content-Type': contentType } });
    } catch (err) {
      ctx.logger.error('scrape failed', { error: errorMessage(err) });
      return new Response(`error collecting metrics: ${errorMessage(err)}`, { status: 500 });
    }
  };
}

/**
 * Returns a fetch handler serving every exporter route.
 * Returns 405 for a known path with the wrong method, 404 otherwise.
 */
export function createHttpHandler(
  ctx: ExporterContext,
  pipeline: Pipeline,
  collector: Collector,
  options: HttpHandlerOptions
): FetchHandler {
  const write = createWriteHandler(ctx, pipeline);
  const metrics = createMetricsHandler(ctx, collector);

  return async (req: Request): Promise<Response> => {
    const { pathname } = new URL(req.url);

    if (pathname === options.metricsPath) {
      if (req.method !== 'GET' && req.method !== 'HEAD') return methodNotAllowed('GET');
      return metrics(req);
    }

    switch (pathname) {
      case '/write':
        if (req.method !== 'POST') return methodNotAllowed('POST');
        return write(req);
      case '/query':
        if (req.method !== 'GET' && req.method !== 'POST') return methodNotAllowed('GET, POST');
        return new Response(QUERY_STUB_BODY, {
          status: 200,
          headers: { 'Content-Type': 'application/json' },
        });
      case '/ping':
        if (req.method !== 'GET' && req.method !== 'HEAD') return methodNotAllowed('GET, HEAD');
        return new Response(null, { status: 204 });
      case '/':
        if (req.method !== 'GET') return methodNotAllowed('GET');
        return new Response(landingPage(options.metricsPath), {
          status: 200,
          headers: { 'Content-Type': 'text/html; charset=utf-8' },
        });
      default:
        return new Response('Not Found', { status: 404 });
    }
  };
}
