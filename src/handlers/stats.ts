/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { jsonResponse } from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext } from './env.js';
import { isRecord, upstreamErrorResponse } from './upstream-utils.js';

const STAT_DESCRIPTIONS = {
  bugs: 'Total number of bugs reported',
  users: 'Total number of registered users',
  hunts: 'Total number of bug hunts',
  domains: 'Total number of tracked domains',
};

export async function getStats({
  env,
}: GatewayContext): Promise<GatewayResponse> {
  const result = await env.upstream.getStats();
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }

  const data = isRecord(result.data) ? result.data : {};

  return jsonResponse({
    success: true,
    data: {
      bugs: data.bugs ?? 0,
      users: data.users ?? 0,
      hunts: data.hunts ?? 0,
      domains: data.domains ?? 0,
    },
    description: STAT_DESCRIPTIONS,
  });
}
