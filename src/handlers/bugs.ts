/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { errorMessage } from '../lib/error.js';
import {
  checkRequiredFields,
  errorResponse,
  isDigits,
  jsonResponse,
  paginatedResponse,
  parseBoundedInt,
  parseJsonBody,
  parsePaginationParams,
} from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { GatewayContext } from './env.js';
import { parseId } from './upstream-utils.js';

const REQUIRED_FIELDS = ['url', 'description'] as const;
const MAX_URL_LENGTH = 200;

export async function listBugs({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const { status, domain, verified } = queryParams;

  // Non-numeric domain filters are ignored, out of range ones rejected
  const domainId = parseId(domain);
  if (domain !== undefined && isDigits(domain) && domainId === undefined) {
    return errorResponse('Invalid domain ID', 400);
  }

  try {
    const { bugs, total } = env.store.listBugs({
      status: status || undefined,
      domain: domainId,
      verified: verified ? verified.toLowerCase() === 'true' : undefined,
      limit: perPage,
      offset: (page - 1) * perPage,
    });
    return paginatedResponse(bugs, page, perPage, total);
  } catch (error: unknown) {
    env.log.error('Failed to fetch bugs', { message: errorMessage(error) });
    return errorResponse(`Failed to fetch bugs: ${errorMessage(error)}`, 500);
  }
}

export async function getBug({
  env,
  pathParams,
}: GatewayContext): Promise<GatewayResponse> {
  const id = parseId(pathParams.id);
  if (id === undefined) {
    return errorResponse('Invalid bug id format', 400);
  }

  const bug = env.store.getBug(id);
  if (bug === undefined) {
    return errorResponse('Bug not found', 404);
  }

  return jsonResponse({ success: true, data: bug });
}

export async function createBug({
  env,
  request,
}: GatewayContext): Promise<GatewayResponse> {
  const body = parseJsonBody(request);
  if (body === undefined || Object.keys(body).length === 0) {
    return errorResponse('Request body is required', 400);
  }

  const missing = checkRequiredFields(body, REQUIRED_FIELDS);
  if (missing.length > 0) {
    return errorResponse(
      `Missing required fields: ${missing.join(', ')}`,
      400,
    );
  }

  const { url, description } = body;
  if (typeof url !== 'string' || typeof description !== 'string') {
    return errorResponse('Fields url and description must be strings', 400);
  }
  if (url.length > MAX_URL_LENGTH) {
    return errorResponse('URL must be 200 characters or less', 400);
  }

  try {
    const bug = env.store.createBug({ ...body, url, description });
    return jsonResponse(
      {
        success: true,
        message: 'Bug created successfully',
        ...(bug !== undefined && { data: bug }),
      },
      201,
    );
  } catch (error: unknown) {
    env.log.error('Failed to create bug', { message: errorMessage(error) });
    return errorResponse(`Failed to create bug: ${errorMessage(error)}`, 500);
  }
}

export async function searchBugs({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const query = queryParams.q ?? '';
  if (query === '') {
    return errorResponse("Search query 'q' is required", 400);
  }

  const limit = parseBoundedInt(queryParams.limit, 10, 1, 100);

  return jsonResponse({
    success: true,
    query,
    data: env.store.searchBugs(query, limit),
  });
}
