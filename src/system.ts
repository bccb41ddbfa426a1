/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as config from './config.js';
import { SqliteStore } from './database/sqlite-store.js';
import { GatewayEnv } from './handlers/env.js';
import { DetailedError, errorMessage } from './lib/error.js';
import log from './log.js';
import { buildRouter, routeInfo } from './routes.js';
import { UpstreamClient } from './upstream/client.js';
import { release } from './version.js';

// Shutdown registry for managing cleanup handlers
type CleanupHandler = {
  name: string;
  handler: () => Promise<void>;
};

const cleanupHandlers: CleanupHandler[] = [];

/**
 * Register a cleanup handler to be called during shutdown, in registration
 * order.
 */
export function registerCleanupHandler(
  name: string,
  handler: () => Promise<void>,
): void {
  cleanupHandlers.push({ name, handler });
  log.debug(`Registered cleanup handler: ${name}`);
}

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception:', error);
});

//
// Local store
//

export const store = new SqliteStore({ log, dbPath: config.SQLITE_DB_PATH });

if (config.RUN_MIGRATIONS) {
  const applied = await store.migrate(config.MIGRATIONS_PATH);
  log.info('Migrations complete', { applied: applied.length });
}

const missingTables = store.getMissingTables();
if (missingTables.length > 0) {
  log.error('Database is not initialized', { missingTables });
  throw new DetailedError(
    `Database is not initialized, missing tables: ${missingTables.join(', ')}`,
    { missingTables },
  );
}

//
// Upstream API
//

export const upstream = new UpstreamClient({
  log,
  baseUrl: config.UPSTREAM_API_BASE_URL,
  token: config.UPSTREAM_API_TOKEN,
  requestTimeoutMs: config.UPSTREAM_REQUEST_TIMEOUT_MS,
  userAgent: `bug-gateway/${release}`,
});

//
// Routing
//

export const router = buildRouter({ log });

export const env: GatewayEnv = {
  log,
  store,
  upstream,
  websiteUrl: config.WEBSITE_URL,
  version: release,
  routes: () => routeInfo(router),
};

let isShuttingDown = false;

export const shutdown = async (exitCode = 0) => {
  if (isShuttingDown) {
    log.info('Shutdown already in progress');
    return;
  }

  isShuttingDown = true;
  log.info('Shutting down...');

  for (const { name, handler } of cleanupHandlers) {
    try {
      log.debug(`Running cleanup handler: ${name}`);
      await handler();
    } catch (error: unknown) {
      log.error(`Error in cleanup handler: ${name}`, {
        message: errorMessage(error),
      });
    }
  }

  store.close();

  log.info('Shutdown complete');
  process.exit(exitCode);
};

// Handle shutdown signals
process.on('SIGINT', async () => {
  await shutdown();
});

process.on('SIGTERM', async () => {
  await shutdown();
});
