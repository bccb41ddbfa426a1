/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  errorResponse,
  jsonResponse,
  paginatedResponse,
  parsePaginationParams,
} from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext } from './env.js';
import { parseId } from './upstream-utils.js';

export async function listDomains({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const { domains, total } = env.store.listDomains({
    limit: perPage,
    offset: (page - 1) * perPage,
  });
  return paginatedResponse(domains, page, perPage, total);
}

export async function getDomain({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid domain ID', 400);
  }

  const domain = env.store.getDomain(id);
  if (domain === undefined) {
    return errorResponse('Domain not found', 404);
  }

  return jsonResponse({ success: true, data: domain });
}

export async function getDomainTags({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid domain ID', 400);
  }

  const domain = env.store.getDomain(id);
  if (domain === undefined) {
    return errorResponse('Domain not found', 404);
  }

  return jsonResponse({
    success: true,
    domain_id: id,
    data: domain.tags,
    count: domain.tags.length,
  });
}
