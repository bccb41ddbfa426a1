/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { errorResponse } from '../lib/http-utils.js';
import * as metrics from '../metrics.js';
import { HandlerError, RouteNotFoundError } from './errors.js';
import { Route, compareRoutes } from './route.js';
import {
  GatewayRequest,
  GatewayResponse,
  Handler,
  PathParams,
  QueryParams,
} from './types.js';
import { parseQueryParams, parseUrlPath } from './url.js';

export type DispatchResult<TEnv> =
  | {
      matched: true;
      route: Route<TEnv>;
      pathParams: PathParams;
      queryParams: QueryParams;
    }
  | {
      matched: false;
      error: RouteNotFoundError;
    };

/**
 * Method and path template router. The route table is kept sorted by route
 * specificity (fewer captures first, then longer literal text) with
 * registration order breaking ties, so `/bugs/search` is never shadowed by
 * `/bugs/{id}` whichever is registered first.
 *
 * Routes are expected to be registered before the first request is
 * dispatched; the table is not guarded against concurrent registration.
 */
export class Router<TEnv = unknown> {
  private log: winston.Logger;
  private readonly table: Route<TEnv>[] = [];
  private nextSequence = 0;

  constructor({ log }: { log: winston.Logger }) {
    this.log = log.child({ class: this.constructor.name });
  }

  /**
   * Register a handler. Throws PatternError for malformed templates.
   */
  addRoute(method: string, pattern: string, handler: Handler<TEnv>): void {
    const route = new Route(method, pattern, handler, this.nextSequence++);
    this.table.push(route);
    this.table.sort(compareRoutes);

    this.log.debug('Route registered', {
      method: route.method,
      pattern,
      specificity: route.specificity(),
    });
  }

  get(pattern: string, handler: Handler<TEnv>): this {
    this.addRoute('GET', pattern, handler);
    return this;
  }

  post(pattern: string, handler: Handler<TEnv>): this {
    this.addRoute('POST', pattern, handler);
    return this;
  }

  put(pattern: string, handler: Handler<TEnv>): this {
    this.addRoute('PUT', pattern, handler);
    return this;
  }

  delete(pattern: string, handler: Handler<TEnv>): this {
    this.addRoute('DELETE', pattern, handler);
    return this;
  }

  // Current table in match order
  get routes(): readonly Route<TEnv>[] {
    return this.table;
  }

  dispatch(
    method: string,
    path: string,
    queryParams: QueryParams = {},
  ): DispatchResult<TEnv> {
    for (const route of this.table) {
      const pathParams = route.matches(method, path);
      if (pathParams !== undefined) {
        return { matched: true, route, pathParams, queryParams };
      }
    }

    return {
      matched: false,
      error: new RouteNotFoundError(method.toUpperCase(), path),
    };
  }

  /**
   * Resolve and invoke the handler for a request. Never rejects: unmatched
   * requests become 404 envelopes and handler failures become 500 envelopes.
   */
  async handle(request: GatewayRequest, env: TEnv): Promise<GatewayResponse> {
    const method = request.method.toUpperCase();
    const path = parseUrlPath(request.url);
    const queryParams = parseQueryParams(request.url);

    const result = this.dispatch(method, path, queryParams);

    if (!result.matched) {
      this.log.debug('No route matched', { method, path });
      metrics.httpRequestsCounter.inc({
        method,
        route: 'unmatched',
        status: 404,
      });
      return errorResponse(result.error.message, 404);
    }

    const { route, pathParams } = result;
    let response: GatewayResponse;
    try {
      response = await route.handler({
        request,
        env,
        pathParams,
        queryParams,
        path,
      });
    } catch (error) {
      const handlerError = new HandlerError(error, { method, path });
      this.log.error('Route handler failed', {
        method,
        path,
        route: route.template,
        message: handlerError.message,
        stack: handlerError.stack,
      });
      metrics.handlerErrorsCounter.inc({ route: route.template });
      response = errorResponse(handlerError.message, 500);
    }

    metrics.httpRequestsCounter.inc({
      method,
      route: route.template,
      status: response.status,
    });
    return response;
  }
}
