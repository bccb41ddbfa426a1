/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { jsonResponse } from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext, RouteInfo } from './env.js';

/**
 * Top-level resource collections served over GET, keyed by name.
 */
export function resourceEndpoints(routes: RouteInfo[]): Record<string, string> {
  const names = new Set<string>();
  for (const { method, template } of routes) {
    const [name] = template.split('/').filter((part) => part !== '');
    if (method === 'GET' && name !== undefined && !name.includes('{')) {
      names.add(name);
    }
  }
  names.delete('health');

  return Object.fromEntries(
    [...names].sort().map((name) => [name, `/${name}`]),
  );
}

export async function health({
  env,
}: GatewayContext): Promise<GatewayResponse> {
  return jsonResponse({
    status: 'healthy',
    api: 'Bug Gateway API',
    version: env.version,
    endpoints: resourceEndpoints(env.routes()),
    links: {
      website: env.websiteUrl,
      documentation: '/',
    },
  });
}
