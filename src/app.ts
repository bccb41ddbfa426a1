/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as cors } from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import winston from 'winston';

import { errorMessage } from './lib/error.js';
import { corsHeaders, errorResponse } from './lib/http-utils.js';
import { registry } from './metrics.js';
import { Router } from './router/router.js';
import { GatewayRequest, GatewayResponse } from './router/types.js';

const PARSE_FAILED = 'entity.parse.failed';

function isParseFailure(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === PARSE_FAILED
  );
}

function toGatewayRequest(req: Request): GatewayRequest {
  return {
    method: req.method,
    url: req.originalUrl,
    headers: req.headers,
    body: req.body,
  };
}

function writeResponse(res: Response, response: GatewayResponse): void {
  res.status(response.status).set(response.headers);
  if (response.body === null) {
    res.end();
  } else {
    res.send(response.body);
  }
}

/**
 * Express host for a gateway router. CORS preflights and `/metrics` are
 * answered here; every other request is dispatched through the router.
 */
export function createApp<TEnv>({
  log,
  router,
  env,
}: {
  log: winston.Logger;
  router: Pick<Router<TEnv>, 'handle'>;
  env: TEnv;
}): express.Express {
  const app = express();
  const allowed = corsHeaders();

  app.use(
    cors({
      methods: allowed['Access-Control-Allow-Methods'],
      allowedHeaders: allowed['Access-Control-Allow-Headers'],
      maxAge: Number(allowed['Access-Control-Max-Age']),
    }),
  );

  app.get('/metrics', (_req, res, next) => {
    registry
      .metrics()
      .then((body) => {
        res.set('Content-Type', registry.contentType).send(body);
      })
      .catch(next);
  });

  // A malformed body is passed to handlers as absent
  const jsonParser = express.json();
  app.use((req, res, next) => {
    jsonParser(req, res, (error?: unknown) => {
      if (error === undefined) {
        next();
      } else if (isParseFailure(error)) {
        log.debug('Ignoring malformed JSON body', {
          path: req.path,
          message: errorMessage(error),
        });
        req.body = undefined;
        next();
      } else {
        next(error);
      }
    });
  });
  app.use(express.text({ type: () => true }));

  app.use((req, res, next) => {
    router
      .handle(toGatewayRequest(req), env)
      .then((response) => writeResponse(res, response))
      .catch(next);
  });

  app.use(
    (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const message = errorMessage(error);
      log.error('Unhandled request error', {
        method: req.method,
        path: req.path,
        message,
      });
      writeResponse(
        res,
        errorResponse(`Internal Server Error: ${message}`, 500),
      );
    },
  );

  return app;
}
