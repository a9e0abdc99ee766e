import type { IncomingMessage, ServerResponse } from 'node:http';

import type { Id } from './database';

export interface ApiRequest extends IncomingMessage {
  params: Record<string, string>;
  query: Record<string, string | string[]>;
  body: unknown;
  requestId: string;
  startTime: number;
  // Set by the actor middleware from the X-Actor-Id header
  actorId?: Id;
}

export interface ApiResponse extends ServerResponse {
  json: (data: unknown, statusCode?: number) => void;
  error: (error: ApiError) => void;
}

export interface ApiError {
  message: string;
  code: string;
  statusCode: number;
  details?: unknown;
}

export type RouteHandler = (req: ApiRequest, res: ApiResponse) => Promise<void> | void;

export type Middleware = (
  req: ApiRequest,
  res: ApiResponse,
  next: () => Promise<void>
) => Promise<void> | void;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

export interface RouteDefinition {
  method: HttpMethod;
  path: string;
  handler: RouteHandler;
  middleware?: Middleware[];
}

/**
 * The part of the router that route modules register against
 */
export interface RouteRegistrar {
  get(path: string, handler: RouteHandler, middleware?: Middleware[]): void;
  post(path: string, handler: RouteHandler, middleware?: Middleware[]): void;
}
