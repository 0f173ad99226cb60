import express, { type Router } from 'express';
import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { errorHandler } from '../../../src/leverage-api/middleware/index';

interface RouteLayer {
  route?: { path: string; methods: Record<string, boolean> };
}

/** "METHOD /path" for every route mounted directly on the router. */
export function listRoutes(router: Router): string[] {
  return router.stack.flatMap((layer: RouteLayer) => {
    const route = layer.route;
    if (!route) return [];
    return Object.keys(route.methods).map((method) => `${method.toUpperCase()} ${route.path}`);
  });
}

export interface DispatchResult {
  status: number;
  body: unknown;
}

/**
 * Runs one request through the router and the API error handler in process.
 * The body arrives already parsed; the JSON payload is captured instead of
 * being written to a socket.
 */
export function dispatch(router: Router, method: string, url: string, body?: unknown): Promise<DispatchResult> {
  const app = express();
  app.use(router);
  app.use(errorHandler);

  return new Promise((resolve) => {
    const req = new IncomingMessage(new Socket());
    req.method = method;
    req.url = url;
    Object.defineProperty(req, 'body', { value: body, writable: true, enumerable: true });

    const res = new ServerResponse(req);
    Object.defineProperty(res, 'json', {
      value: (payload: unknown) => {
        resolve({ status: res.statusCode, body: payload });
        return res;
      },
    });

    app(req, res);
  });
}
