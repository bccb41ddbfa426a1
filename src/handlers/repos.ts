/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { errorResponse, jsonResponse } from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext } from './env.js';
import { parseId, upstreamErrorResponse } from './upstream-utils.js';

export async function listRepos({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const organizationId = parseId(queryParams.organization);

  if (organizationId !== undefined) {
    const result = await env.upstream.getOrganizationRepos(organizationId);
    if (!result.ok) {
      return upstreamErrorResponse(result);
    }
    const { data } = result;
    return jsonResponse({
      success: true,
      organization_id: organizationId,
      data,
      count: Array.isArray(data) ? data.length : 0,
    });
  }

  return jsonResponse({
    success: true,
    message: 'Repository listing',
    info: 'Use ?organization={id} to get repositories for a specific organization',
    endpoints: {
      organization_repos: '/organizations/{id}/repos',
      project_repos: '/projects/{id}/repos',
    },
  });
}

// Repositories are only addressable through their organization upstream
export async function getRepo({
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid repository ID', 400);
  }

  return jsonResponse({
    success: true,
    message: 'Repository details endpoint',
    data: {
      id,
      note: 'Direct repository lookup may require organization context',
    },
  });
}
