/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

export const registry = promClient.register;

//
// Dispatch metrics
//

export const httpRequestsCounter = new promClient.Counter({
  name: 'http_requests_total',
  help: 'Count of dispatched requests by method, matched route and status',
  labelNames: ['method', 'route', 'status'] as const,
});

export const handlerErrorsCounter = new promClient.Counter({
  name: 'handler_errors_total',
  help: 'Count of route handler failures converted to 500 responses',
  labelNames: ['route'] as const,
});

//
// Upstream metrics
//

export const upstreamRequestsCounter = new promClient.Counter({
  name: 'upstream_requests_total',
  help: 'Count of requests sent to the upstream API by outcome',
  labelNames: ['method', 'outcome'] as const,
});
