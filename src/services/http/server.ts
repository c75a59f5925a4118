import http from 'http';
import type { AddressInfo } from 'net';
import { SERVICE_NAME } from '../../config/constants';
import type { ExpenseStore } from '../database/expense-store';
import { CATEGORIES_RESOURCE, readCategoriesResource } from '../categories';
import { type ToolErrorCode, callTool, listTools } from '../tools';

export interface ServerDeps {
  store: ExpenseStore;
  categoriesPath: string;
}

export interface RouteResponse {
  status: number;
  contentType: string;
  body: string;
}

const JSON_TYPE = 'application/json';

const ERROR_STATUS: Record<ToolErrorCode, number> = {
  unknown_tool: 404,
  invalid_arguments: 400,
  storage_unavailable: 503,
};

function json(status: number, payload: unknown): RouteResponse {
  return { status, contentType: JSON_TYPE, body: JSON.stringify(payload) };
}

function parseBody(body: string): { ok: true; value: unknown } | { ok: false } {
  if (body.trim() === '') return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

/**
 * Map a request onto the tools and the category resource. Kept free of
 * sockets so it can be exercised directly.
 */
export function routeRequest(deps: ServerDeps, method: string, url: string, body: string): RouteResponse {
  const pathname = new URL(url, 'http://localhost').pathname;

  if (method === 'GET' && pathname === '/health') {
    return json(200, { status: 'ok', timestamp: new Date().toISOString(), service: SERVICE_NAME });
  }

  if (method === 'GET' && pathname === '/tools') {
    return json(200, listTools());
  }

  if (method === 'GET' && pathname === '/resources') {
    return json(200, [CATEGORIES_RESOURCE]);
  }

  if (method === 'GET' && pathname === CATEGORIES_RESOURCE.path) {
    return {
      status: 200,
      contentType: CATEGORIES_RESOURCE.mimeType,
      body: readCategoriesResource(deps.categoriesPath),
    };
  }

  const toolMatch = /^\/tools\/([^/]+)$/.exec(pathname);
  if (method === 'POST' && toolMatch) {
    const args = parseBody(body);
    if (!args.ok) {
      return json(400, { error: 'Request body must be valid JSON' });
    }

    const outcome = callTool(deps.store, decodeURIComponent(toolMatch[1]), args.value);
    if (!outcome.ok) {
      return json(ERROR_STATUS[outcome.error.code], { error: outcome.error.message, code: outcome.error.code });
    }
    return json(200, outcome.result);
  }

  return json(404, { error: 'Not found' });
}

function describeAddress(address: AddressInfo | string | null): string {
  if (address === null) return 'unknown address';
  if (typeof address === 'string') return address;
  return `${address.address}:${address.port}`;
}

/**
 * Resolves once the socket is bound; rejects on listen errors such as
 * EADDRINUSE so startup can fail cleanly.
 */
export function startServer(deps: ServerDeps, port: number): Promise<http.Server> {
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      let response: RouteResponse;
      try {
        response = routeRequest(deps, req.method ?? 'GET', req.url ?? '/', Buffer.concat(chunks).toString('utf-8'));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error('[HTTP] Unhandled error:', message);
        response = json(500, { error: 'Internal server error' });
      }

      console.log(`[HTTP] ${req.method} ${req.url} ${response.status}`);
      res.writeHead(response.status, { 'Content-Type': response.contentType });
      res.end(response.body);
    });
  });

  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      console.error('[HTTP] Failed to listen:', error.message);
      reject(error);
    };
    server.once('error', onError);
    server.listen(port, () => {
      server.off('error', onError);
      console.log(`[HTTP] ${SERVICE_NAME} listening on ${describeAddress(server.address())}`);
      resolve(server);
    });
  });
}
