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

export async function listOrganizations({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getOrganizations({
    page,
    perPage,
    search: queryParams.search ?? queryParams.q,
  });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return listResponse(result.data, page, perPage);
}

export async function getOrganization({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid organization ID', 400);
  }

  const result = await env.upstream.getOrganization(id);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return detailResponse(result.data);
}

export async function getOrganizationRepos({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid organization ID', 400);
  }

  const result = await env.upstream.getOrganizationRepos(id);
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return jsonResponse({
    success: true,
    organization_id: id,
    data: result.data,
  });
}

/**
 * Projects belonging to one organization. The upstream has no per
 * organization listing, so the project listing is filtered here.
 */
export async function getOrganizationProjects({
  env,
  pathParams,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid organization ID', 400);
  }

  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getProjects({ page, perPage });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }

  const { data } = result;
  if (isRecord(data) && Array.isArray(data.projects)) {
    const projects = data.projects.filter(
      (project) =>
        isRecord(project) && String(project.organization) === String(id),
    );
    return jsonResponse({
      success: true,
      organization_id: id,
      data: projects,
      count: projects.length,
    });
  }

  return jsonResponse({ success: true, organization_id: id, data });
}
