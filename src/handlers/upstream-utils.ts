/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  buildPagination,
  errorResponse,
  isDigits,
  jsonResponse,
} from '../lib/http-utils.js';
import { GatewayResponse } from '../router/types.js';
import { UpstreamResult } from '../upstream/client.js';

export interface UpstreamPage {
  results: unknown[];
  count?: unknown;
  next?: unknown;
  previous?: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isUpstreamPage(data: unknown): data is UpstreamPage {
  return isRecord(data) && Array.isArray(data.results);
}

export function upstreamErrorResponse(
  result: Extract<UpstreamResult, { ok: false }>,
): GatewayResponse {
  return errorResponse(result.message, result.status);
}

/**
 * Re-envelope an upstream listing. Paged upstream results keep their
 * navigation links, bare arrays are paged locally and anything else is
 * passed through as `data`.
 */
export function listResponse(
  data: unknown,
  page: number,
  perPage: number,
  extra: Record<string, unknown> = {},
): GatewayResponse {
  if (isUpstreamPage(data)) {
    return jsonResponse({
      success: true,
      ...extra,
      data: data.results,
      pagination: {
        page,
        per_page: perPage,
        count: data.results.length,
        total: data.count ?? null,
        next: data.next ?? null,
        previous: data.previous ?? null,
      },
    });
  }

  if (Array.isArray(data)) {
    return jsonResponse({
      success: true,
      ...extra,
      data,
      pagination: buildPagination(data.length, page, perPage),
    });
  }

  return jsonResponse({ success: true, ...extra, data });
}

export function detailResponse(data: unknown): GatewayResponse {
  return jsonResponse({ success: true, data });
}

/**
 * Numeric value of a path id, or undefined when it is not all digits.
 */
// Ids past the safe integer range would round to a different record
export function parseId(value: string | undefined): number | undefined {
  if (value === undefined || !isDigits(value)) {
    return undefined;
  }
  const id = Number(value);
  return Number.isSafeInteger(id) ? id : undefined;
}
