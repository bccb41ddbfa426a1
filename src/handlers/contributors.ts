/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  errorResponse,
  isDigits,
  parsePaginationParams,
} from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext } from './env.js';
import {
  detailResponse,
  isRecord,
  listResponse,
  upstreamErrorResponse,
} from './upstream-utils.js';

export async function listContributors({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getContributors({ page, perPage });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return listResponse(result.data, page, perPage);
}

/**
 * Look a contributor up by id or GitHub id in the first page of the
 * contributor listing; the upstream has no single-contributor endpoint.
 */
export async function getContributor({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = pathParams.id;
  if (!isDigits(id)) {
    return errorResponse('Invalid contributor ID', 400);
  }

  const result = await env.upstream.getContributors();
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }

  const contributor = Array.isArray(result.data)
    ? result.data.find(
        (entry) =>
          isRecord(entry) &&
          (String(entry.id) === id || String(entry.github_id) === id),
      )
    : undefined;

  if (contributor === undefined) {
    return errorResponse('Contributor not found', 404);
  }
  return detailResponse(contributor);
}
