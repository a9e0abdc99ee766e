import { vi } from 'vitest';
import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import type { Router } from '../../router';
import type {
  ApiError,
  ApiRequest,
  ApiResponse,
  Middleware,
  RouteHandler,
  RouteRegistrar
} from '../../../types/api';

// Mock request helper
export interface MockRequestOptions {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  body?: unknown;
  query?: Record<string, string | string[]>;
  params?: Record<string, string>;
  actorId?: number;
}

function createIncomingMessage(options: MockRequestOptions): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.method = options.method ?? 'GET';
  req.url = options.url ?? '/';
  req.headers = {
    host: 'localhost',
    'content-type': 'application/json',
    ...options.headers
  };
  return req;
}

export function createMockRequest(options: MockRequestOptions = {}): ApiRequest {
  return Object.assign(createIncomingMessage(options), {
    params: options.params ?? {},
    query: options.query ?? {},
    body: options.body,
    requestId: 'test-request-id',
    startTime: Date.now(),
    actorId: options.actorId
  });
}

/**
 * A response that keeps the status and parsed JSON body instead of writing
 * to a socket
 */
export class MockResponse extends ServerResponse implements ApiResponse {
  body: unknown = undefined;

  json = (data: unknown, statusCode = 200): void => {
    this.writeHead(statusCode);
    this.end(JSON.stringify(data));
  };

  error = (error: ApiError): void => {
    this.json(
      {
        success: false,
        error: { message: error.message, code: error.code, details: error.details }
      },
      error.statusCode
    );
  };

  override writeHead(statusCode: number): this {
    this.statusCode = statusCode;
    return this;
  }

  override end(chunk?: unknown): this {
    if (typeof chunk === 'string') {
      this.body = JSON.parse(chunk);
    }
    return this;
  }
}

export function createMockResponse(req: IncomingMessage = createIncomingMessage({})): MockResponse {
  return new MockResponse(req);
}

// Route collector for testing route registration
export interface CollectedRoute {
  method: 'GET' | 'POST';
  path: string;
  handler: RouteHandler;
  middlewares: Middleware[];
}

export function createMockRouter(): RouteRegistrar & { routes: CollectedRoute[] } {
  const routes: CollectedRoute[] = [];

  return {
    routes,
    get: vi.fn((path: string, handler: RouteHandler, middlewares: Middleware[] = []) => {
      routes.push({ method: 'GET', path, handler, middlewares });
    }),
    post: vi.fn((path: string, handler: RouteHandler, middlewares: Middleware[] = []) => {
      routes.push({ method: 'POST', path, handler, middlewares });
    })
  };
}

// Helper to find a route by method and path
export function findRoute(
  routes: CollectedRoute[],
  method: CollectedRoute['method'],
  path: string
): CollectedRoute {
  const route = routes.find((r) => r.method === method && r.path === path);
  if (!route) {
    throw new Error(`Route ${method} ${path} is not registered`);
  }
  return route;
}

// Helper to execute a route handler with mock request/response
export async function executeRoute(route: CollectedRoute, req: ApiRequest, res: ApiResponse): Promise<void> {
  for (const middleware of route.middlewares) {
    let nextCalled = false;
    await middleware(req, res, async () => {
      nextCalled = true;
    });
    if (!nextCalled) {
      return; // Middleware blocked the request
    }
  }

  await route.handler(req, res);
}

/**
 * Send a request through the full router: body parsing, middleware, route
 * matching and error formatting
 */
export async function dispatch(
  router: Router,
  options: MockRequestOptions
): Promise<{ statusCode: number; body: unknown }> {
  const req = createIncomingMessage(options);
  if (options.body !== undefined) {
    req.push(JSON.stringify(options.body));
  }
  req.push(null);

  const res = createMockResponse(req);
  await router.handleRequest(req, res);

  return { statusCode: res.statusCode, body: res.body };
}
