/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

//
// HTTP server
//

// HTTP server port
export const PORT = env.intVarOrDefault('PORT', 8787);

//
// Upstream backend
//

// Base URL of the upstream REST API that proxied resources are fetched from
export const UPSTREAM_API_BASE_URL = env.varOrDefault(
  'UPSTREAM_API_BASE_URL',
  'https://blt.owasp.org/api/v1',
);

// Optional token sent as "Authorization: Token <token>"
export const UPSTREAM_API_TOKEN = env.varOrUndefined('UPSTREAM_API_TOKEN');

export const UPSTREAM_REQUEST_TIMEOUT_MS = env.intVarOrDefault(
  'UPSTREAM_REQUEST_TIMEOUT_MS',
  10_000,
);

// Public website linked from the homepage and health responses
export const WEBSITE_URL = env.varOrDefault(
  'WEBSITE_URL',
  'https://blt.owasp.org',
);

//
// Local store
//

export const SQLITE_DB_PATH = env.varOrDefault(
  'SQLITE_DB_PATH',
  'data/sqlite/gateway.db',
);

export const MIGRATIONS_PATH = env.varOrDefault('MIGRATIONS_PATH', 'migrations');

// Apply pending schema migrations at boot
export const RUN_MIGRATIONS = env.boolVarOrDefault('RUN_MIGRATIONS', true);

//
// Logging
//

export const LOG_LEVEL = env.varOrDefault('LOG_LEVEL', 'info').toLowerCase();

// "json" or "simple"
export const LOG_FORMAT = env.varOrDefault('LOG_FORMAT', 'simple');

// Keep stack traces on non-error log lines too
export const LOG_ALL_STACKTRACES = env.boolVarOrDefault(
  'LOG_ALL_STACKTRACES',
  false,
);

export const INSTANCE_ID = env.varOrUndefined('INSTANCE_ID');
