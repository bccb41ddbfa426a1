/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  checkRequiredFields,
  errorResponse,
  jsonResponse,
  parseBoundedInt,
  parseJsonBody,
  parsePaginationParams,
} from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext } from './env.js';
import {
  detailResponse,
  listResponse,
  parseId,
  upstreamErrorResponse,
} from './upstream-utils.js';

export async function listIssues({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getIssues({
    page,
    perPage,
    status: queryParams.status,
    domain: queryParams.domain,
    search: queryParams.search,
  });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return listResponse(result.data, page, perPage);
}

export async function getIssue({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid issue ID', 400);
  }

  const result = await env.upstream.getIssue(id);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return detailResponse(result.data);
}

export async function searchIssues({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const query = queryParams.q ?? '';
  if (query === '') {
    return errorResponse("Search query 'q' is required", 400);
  }

  const limit = parseBoundedInt(queryParams.limit, 10, 1, 100);
  const result = await env.upstream.searchIssues(query, limit);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return jsonResponse({ success: true, query, data: result.data });
}

export async function createIssue({
  env,
  request,
}: GatewayContext): Promise<GatewayResponse> {
  const body = parseJsonBody(request);
  if (body === undefined || Object.keys(body).length === 0) {
    return errorResponse('Request body is required', 400);
  }

  const missing = checkRequiredFields(body, ['url', 'description']);
  if (missing.length > 0) {
    return errorResponse(
      `Missing required fields: ${missing.join(', ')}`,
      400,
    );
  }

  const result = await env.upstream.createIssue(body);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return jsonResponse(
    {
      success: true,
      message: 'Issue created successfully',
      data: result.data,
    },
    201,
  );
}
