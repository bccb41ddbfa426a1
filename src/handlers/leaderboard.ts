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
  isRecord,
  listResponse,
  upstreamErrorResponse,
} from './upstream-utils.js';

type ParsedInt =
  | { ok: true; value: number | undefined }
  | { ok: false; message: string };

function parseRangedInt(
  value: string | undefined,
  min: number,
  max: number,
  messages: { range: string; format: string },
): ParsedInt {
  if (value === undefined || value === '') {
    return { ok: true, value: undefined };
  }
  if (!/^\s*[-+]?\d+\s*$/.test(value)) {
    return { ok: false, message: messages.format };
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min || parsed > max) {
    return { ok: false, message: messages.range };
  }
  return { ok: true, value: parsed };
}

export async function getGlobalLeaderboard({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getLeaderboard({ page, perPage });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return listResponse(result.data, page, perPage, { type: 'global' });
}

export async function getMonthlyLeaderboard({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);

  const month = parseRangedInt(queryParams.month, 1, 12, {
    range: 'Month must be between 1 and 12',
    format: 'Invalid month format',
  });
  if (!month.ok) {
    return errorResponse(month.message, 400);
  }

  const year = parseRangedInt(queryParams.year, 2000, 2100, {
    range: 'Invalid year',
    format: 'Invalid year format',
  });
  if (!year.ok) {
    return errorResponse(year.message, 400);
  }

  const result = await env.upstream.getLeaderboard({
    page,
    perPage,
    month: month.value,
    year: year.value,
  });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }

  const { data } = result;

  return jsonResponse({
    success: true,
    type: 'monthly',
    month: month.value ?? null,
    year: year.value ?? null,
    data: isRecord(data) && 'results' in data ? data.results : data,
    pagination: { page, per_page: perPage },
  });
}

export async function getOrganizationLeaderboard({
  env,
  queryParams,
}: GatewayContext): Promise<GatewayResponse> {
  const [page, perPage] = parsePaginationParams(queryParams);
  const result = await env.upstream.getLeaderboard({
    page,
    perPage,
    type: 'organizations',
  });
  if (!result.ok) {
    return upstreamErrorResponse(result);
  }
  return listResponse(result.data, page, perPage, { type: 'organizations' });
}
