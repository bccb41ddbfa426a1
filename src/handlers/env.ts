/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { SqliteStore } from '../database/sqlite-store.js';
import { Handler, HandlerContext } from '../router/types.js';
import { UpstreamClient } from '../upstream/client.js';

export interface RouteInfo {
  method: string;
  template: string;
}

/**
 * Services and settings handed to every route handler.
 */
export interface GatewayEnv {
  log: winston.Logger;
  store: SqliteStore;
  upstream: UpstreamClient;
  websiteUrl: string;
  version: string;
  // Live route table, used to document the API
  routes(): RouteInfo[];
}

export type GatewayContext = HandlerContext<GatewayEnv>;
export type GatewayHandler = Handler<GatewayEnv>;
