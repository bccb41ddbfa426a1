/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { GatewayRequest, GatewayResponse } from '../router/types.js';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;
// Keeps (page - 1) * per_page a safe integer offset
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PER_PAGE) + 1;

export function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers':
      'Content-Type, Authorization, X-Requested-With',
    'Access-Control-Max-Age': '86400',
  };
}

export function jsonResponse(
  data: unknown,
  status = 200,
  headers?: Record<string, string>,
): GatewayResponse {
  return {
    status,
    headers: {
      'Content-Type': 'application/json',
      ...corsHeaders(),
      ...headers,
    },
    body: JSON.stringify(data),
  };
}

export function htmlResponse(html: string, status = 200): GatewayResponse {
  return {
    status,
    headers: {
      'Content-Type': 'text/html; charset=utf-8',
      ...corsHeaders(),
    },
    body: html,
  };
}

/**
 * Error envelope: `{ error: true, message, status }` with the HTTP status
 * mirrored in the body.
 */
export function errorResponse(
  message: string,
  status = 400,
  details?: Record<string, unknown>,
): GatewayResponse {
  return jsonResponse(
    {
      error: true,
      message,
      status,
      ...(details !== undefined && { details }),
    },
    status,
  );
}

export function successResponse(
  data?: unknown,
  message = 'Success',
  status = 200,
): GatewayResponse {
  return jsonResponse(
    {
      success: true,
      message,
      ...(data !== undefined && data !== null && { data }),
    },
    status,
  );
}

export interface Pagination {
  page: number;
  per_page: number;
  count: number;
  total?: number;
  total_pages?: number;
}

export function buildPagination(
  count: number,
  page: number,
  perPage: number,
  total?: number,
): Pagination {
  const pagination: Pagination = { page, per_page: perPage, count };
  if (total !== undefined) {
    pagination.total = total;
    pagination.total_pages = Math.ceil(total / perPage);
  }
  return pagination;
}

export function paginatedResponse(
  items: unknown[],
  page = DEFAULT_PAGE,
  perPage = DEFAULT_PER_PAGE,
  total?: number,
): GatewayResponse {
  return jsonResponse({
    success: true,
    data: items,
    pagination: buildPagination(items.length, page, perPage, total),
  });
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*[-+]?\d+\s*$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

/**
 * Read `page` and `per_page` from the query. Page is at least 1, per_page is
 * clamped to 1..100 and unparsable values fall back to their defaults.
 */
export function parsePaginationParams(
  query: Record<string, string>,
): [page: number, perPage: number] {
  const page = Math.min(
    MAX_PAGE,
    Math.max(1, parseInteger(query.page) ?? DEFAULT_PAGE),
  );
  const perPage = Math.max(
    1,
    Math.min(MAX_PER_PAGE, parseInteger(query.per_page) ?? DEFAULT_PER_PAGE),
  );
  return [page, perPage];
}

/**
 * Integer query value clamped to `[min, max]`, or the fallback when absent or
 * unparsable.
 */
export function parseBoundedInt(
  value: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const parsed = parseInteger(value);
  return parsed === undefined ? fallback : Math.min(Math.max(parsed, min), max);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonBody(
  request: GatewayRequest,
): Record<string, unknown> | undefined {
  const { body } = request;

  if (typeof body === 'string') {
    if (body.trim() === '') {
      return undefined;
    }
    try {
      const parsed: unknown = JSON.parse(body);
      return isPlainObject(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }

  return isPlainObject(body) ? body : undefined;
}

export function checkRequiredFields(
  body: Record<string, unknown>,
  fields: readonly string[],
): string[] {
  return fields.filter((field) => !(field in body));
}

export function headerValue(
  headers: GatewayRequest['headers'],
  name: string,
): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export function isDigits(value: string): boolean {
  return /^\d+$/.test(value);
}
