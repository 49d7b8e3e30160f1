/**
 * A parsed request as handed over by the network listener
 */
export interface DispatchRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  query_params: Record<string, string>;
  body: string;
}

export interface DispatchResponse {
  status: number;
  body: string;
}

export type RouteHandler = (request: DispatchRequest) => Promise<DispatchResponse>;

export interface Route {
  method: string;
  handler: RouteHandler;
}

export type Dispatcher = (request: DispatchRequest) => Promise<DispatchResponse>;

export function jsonResponse(status: number, payload: unknown): DispatchResponse {
  return { status, body: JSON.stringify(payload) };
}

/**
 * Route requests by exact path. Unknown paths answer 404, known paths with
 * another method 405.
 */
export function createDispatcher(routes: Record<string, Route>): Dispatcher {
  const table = new Map(Object.entries(routes));

  return async request => {
    const route = table.get(request.path);
    if (!route) {
      return jsonResponse(404, {
        error: 'Not found',
        path: request.path,
        timestamp: new Date().toISOString(),
      });
    }

    if (route.method.toUpperCase() !== request.method.toUpperCase()) {
      return jsonResponse(405, {
        error: 'Method not allowed',
        path: request.path,
        allowed: route.method.toUpperCase(),
      });
    }

    return route.handler(request);
  };
}
