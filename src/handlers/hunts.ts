/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  errorResponse,
  jsonResponse,
  parsePaginationParams,
} from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext, GatewayHandler } from './env.js';
import {
  detailResponse,
  listResponse,
  parseId,
  upstreamErrorResponse,
} from './upstream-utils.js';

export type HuntFilter = 'active' | 'previous' | 'upcoming';

export async function listHunts({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getHunts({
    page,
    perPage,
    active: queryParams.active === 'true',
    previous: queryParams.previous === 'true',
    upcoming: queryParams.upcoming === 'true',
  });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return listResponse(result.data, page, perPage);
}

export async function getHunt({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid hunt ID', 400);
  }

  const result = await env.upstream.getHunt(id);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return detailResponse(result.data);
}

/**
 * Handler for one of the fixed hunt listings (`/hunts/active` and friends).
 */
export function filteredHunts(filter: HuntFilter): GatewayHandler {
  return async ({ env }) => {
    const result = await env.upstream.getHunts({
      active: filter === 'active',
      previous: filter === 'previous',
      upcoming: filter === 'upcoming',
    });
    if (!result.ok) {
      return upstreamErrorResponse(result);
    }
    return jsonResponse({ success: true, filter, data: result.data });
  };
}
