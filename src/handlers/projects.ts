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
import { GatewayContext } from './env.js';
import {
  detailResponse,
  isRecord,
  listResponse,
  parseId,
  upstreamErrorResponse,
} from './upstream-utils.js';

export async function listProjects({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getProjects({
    page,
    perPage,
    search: queryParams.search ?? queryParams.q,
  });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }

  // The projects endpoint answers with its own { projects, count } shape
  const { data } = result;
  if (isRecord(data) && Array.isArray(data.projects)) {
    return jsonResponse({
      success: true,
      data: data.projects,
      count: data.count ?? data.projects.length,
    });
  }

  return listResponse(data, page, perPage);
}

export async function getProject({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid project ID', 400);
  }

  const result = await env.upstream.getProject(id);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return detailResponse(result.data);
}

export async function getProjectContributors({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid project ID', 400);
  }

  const result = await env.upstream.getProject(id);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }

  const contributors =
    isRecord(result.data) && Array.isArray(result.data.contributors)
      ? result.data.contributors
      : [];

  return jsonResponse({
    success: true,
    project_id: id,
    data: contributors,
    count: contributors.length,
  });
}
