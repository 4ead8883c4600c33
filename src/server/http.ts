import http from 'node:http';
import type { IncomingHttpHeaders } from 'node:http';
import { URL } from 'node:url';
import logger from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { listEvents as listStoredEvents, type ListEventsOptions, type PaginatedEvents } from '../db.js';
import { FrameUnavailableError, InvalidColorError } from '../errors.js';
import type { CameraService } from '../app.js';
import { formatSnapshotTimestamp } from '../video/snapshot.js';

const MAX_BODY_BYTES = 16 * 1024;

/** The request surface the router reads. `http.IncomingMessage` satisfies it. */
export interface HttpRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/** The response surface the router writes. `http.ServerResponse` satisfies it. */
export interface HttpResponse {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string | number): unknown;
  write(chunk: Buffer | string): boolean;
  end(chunk?: Buffer | string): unknown;
  once(event: 'close' | 'drain', listener: () => void): unknown;
  off(event: 'close' | 'drain', listener: () => void): unknown;
}

export type CameraApi = Pick<
  CameraService,
  | 'previewBoundary'
  | 'openPreviewStream'
  | 'getLivePreviewFrame'
  | 'captureSnapshot'
  | 'getMotionStatus'
  | 'setDeviceColor'
  | 'turnDeviceOff'
  | 'toggleAutoMode'
  | 'getStatus'
>;

export interface RequestHandlerOptions {
  service: CameraApi;
  metrics?: MetricsRegistry;
  listEvents?: (options: ListEventsOptions) => PaginatedEvents;
}

export interface HttpServerOptions extends RequestHandlerOptions {
  port?: number;
  host?: string;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

function sendJson(res: HttpResponse, statusCode: number, body: unknown) {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

function sendJpeg(res: HttpResponse, jpeg: Buffer, filename?: string) {
  res.statusCode = 200;
  res.setHeader('Content-Type', 'image/jpeg');
  res.setHeader('Content-Length', jpeg.length);
  res.setHeader('Cache-Control', 'no-store');
  if (filename) {
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  }
  res.end(jpeg);
}

async function readBody(req: HttpRequest): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new BadRequestError('Request body too large');
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function parsePercent(params: URLSearchParams, name: string): number {
  const raw = params.get(name);
  if (raw === null || raw.trim() === '') {
    return 0;
  }
  return Number(raw);
}

function parseLimit(value: string | null): number | undefined {
  if (value === null) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new BadRequestError('limit must be an integer');
  }
  return parsed;
}

function waitForDrain(res: HttpResponse, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      res.off('drain', done);
      signal.removeEventListener('abort', done);
      resolve();
    };
    res.once('drain', done);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Maps the camera routes onto the service. Holds no state of its own beyond
 * the per-request abort signal of a preview stream.
 */
export function createRequestHandler(options: RequestHandlerOptions) {
  const { service } = options;
  const metrics = options.metrics ?? metricsModule;
  const listEvents = options.listEvents ?? listStoredEvents;

  async function streamPreview(res: HttpResponse) {
    const controller = new AbortController();
    const onClose = () => controller.abort();
    res.once('close', onClose);

    res.statusCode = 200;
    res.setHeader('Content-Type', `multipart/x-mixed-replace; boundary=${service.previewBoundary}`);
    res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
    res.setHeader('Connection', 'close');

    const session = service.openPreviewStream(controller.signal);
    try {
      for await (const chunk of session) {
        if (!res.write(chunk.part)) {
          await waitForDrain(res, controller.signal);
        }
        if (controller.signal.aborted) {
          break;
        }
      }
    } finally {
      res.off('close', onClose);
      session.close();
      res.end();
    }
  }

  async function route(req: HttpRequest, res: HttpResponse, url: URL) {
    const method = req.method ?? 'GET';
    const key = `${method} ${url.pathname}`;

    switch (key) {
      case 'GET /video_feed':
        await streamPreview(res);
        return;
      case 'GET /preview.jpg':
        sendJpeg(res, await service.getLivePreviewFrame());
        return;
      case 'POST /capture': {
        const snapshot = await service.captureSnapshot();
        const filename = `capture_${formatSnapshotTimestamp(new Date(snapshot.capturedAt))}.jpg`;
        sendJpeg(res, snapshot.jpeg, filename);
        return;
      }
      case 'GET /motion_status':
        sendJson(res, 200, { motion: service.getMotionStatus().detected });
        return;
      case 'POST /set_led': {
        const params = new URLSearchParams(await readBody(req));
        await service.setDeviceColor(
          parsePercent(params, 'red'),
          parsePercent(params, 'green'),
          parsePercent(params, 'blue')
        );
        sendJson(res, 200, { success: true });
        return;
      }
      case 'POST /off_led':
        await service.turnDeviceOff();
        sendJson(res, 200, { success: true });
        return;
      case 'POST /toggle_motion_led': {
        const { autoMode } = await service.toggleAutoMode();
        sendJson(res, 200, { motion_led_auto: autoMode });
        return;
      }
      case 'GET /api/status':
        sendJson(res, 200, service.getStatus());
        return;
      case 'GET /api/events': {
        const result = listEvents({
          limit: parseLimit(url.searchParams.get('limit')),
          detector: url.searchParams.get('detector') ?? undefined,
          source: url.searchParams.get('source') ?? undefined
        });
        sendJson(res, 200, result);
        return;
      }
      case 'GET /metrics':
        res.statusCode = 200;
        res.setHeader('Content-Type', 'text/plain; version=0.0.4');
        res.end(metrics.exportPrometheus());
        return;
      default:
        sendJson(res, 404, { error: 'Not found' });
    }
  }

  return async function handle(req: HttpRequest, res: HttpResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    metrics.incrementCounter('http.requests');
    try {
      await route(req, res, url);
    } catch (error) {
      if (res.headersSent) {
        logger.warn({ err: error, path: url.pathname }, 'HTTP response aborted');
        res.end();
        return;
      }
      if (error instanceof FrameUnavailableError) {
        sendJson(res, 503, { success: false, message: error.message });
        return;
      }
      if (error instanceof InvalidColorError || error instanceof BadRequestError) {
        sendJson(res, 400, { success: false, message: error.message });
        return;
      }
      metrics.incrementCounter('http.errors');
      logger.error({ err: error, path: url.pathname }, 'HTTP request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  };
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 5000;
  const host = options.host ?? '0.0.0.0';
  const handle = createRequestHandler(options);

  const server = http.createServer((req, res) => {
    handle(req, res).catch(error => {
      logger.error({ err: error }, 'HTTP handler crashed');
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.listen(port, host, () => resolve());
    server.on('error', reject);
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
