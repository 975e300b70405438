import type { NextFunction, Request, RequestHandler, Response } from 'express';
import '../types/express';

export interface MockRequestInit {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  params?: Record<string, string>;
  query?: Record<string, unknown>;
  body?: unknown;
  caller?: Request['caller'];
}

/**
 * Just enough of an Express request for middlewares and controllers
 */
export function mockRequest(init: MockRequestInit = {}): Request {
  const headers = init.headers ?? {};
  const request = {
    method: init.method ?? 'GET',
    url: init.url ?? '/',
    originalUrl: init.url ?? '/',
    headers,
    params: init.params ?? {},
    query: init.query ?? {},
    body: init.body,
    caller: init.caller,
    ip: '127.0.0.1',
    socket: { remoteAddress: '127.0.0.1' },
    get: (name: string) => headers[name.toLowerCase()],
  };
  // Handlers only read the fields above
  return request as unknown as Request;
}

export interface MockResponse {
  statusCode: number;
  body: unknown;
  redirectedTo?: string;
  status: jest.Mock;
  json: jest.Mock;
  redirect: jest.Mock;
}

export function mockResponse(): MockResponse {
  const response: MockResponse = {
    statusCode: 200,
    body: undefined,
    status: jest.fn(),
    json: jest.fn(),
    redirect: jest.fn(),
  };
  response.status.mockImplementation((code: number) => {
    response.statusCode = code;
    return response;
  });
  response.json.mockImplementation((payload: unknown) => {
    response.body = payload;
    return response;
  });
  response.redirect.mockImplementation((status: number, url: string) => {
    response.statusCode = status;
    response.redirectedTo = url;
  });
  return response;
}

export function asResponse(response: MockResponse): Response {
  return response as unknown as Response;
}

/**
 * Runs a handler until it either responds or hands off to next()
 */
export function runHandler(
  handler: RequestHandler,
  req: Request,
  response: MockResponse
): Promise<{ nextArg: unknown; called: 'next' | 'response' }> {
  return new Promise((resolve) => {
    const settle = () => resolve({ nextArg: undefined, called: 'response' });
    response.json.mockImplementationOnce((payload: unknown) => {
      response.body = payload;
      settle();
      return response;
    });
    response.redirect.mockImplementationOnce((status: number, url: string) => {
      response.statusCode = status;
      response.redirectedTo = url;
      settle();
    });
    const next: NextFunction = (arg?: unknown) => resolve({ nextArg: arg, called: 'next' });
    handler(req, asResponse(response), next);
  });
}
