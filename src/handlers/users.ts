/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { errorResponse, parsePaginationParams } from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext } from './env.js';
import {
  detailResponse,
  listResponse,
  parseId,
  upstreamErrorResponse,
} from './upstream-utils.js';

export async function listUsers({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getUsers({ page, perPage });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return listResponse(result.data, page, perPage);
}

// Also serves /users/{id}/profile
export async function getUser({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid user ID', 400);
  }

  const result = await env.upstream.getUser(id);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return detailResponse(result.data);
}
