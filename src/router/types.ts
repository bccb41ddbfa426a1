/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type PathParams = Record<string, string>;
export type QueryParams = Record<string, string>;

export type HeaderValue = string | string[] | undefined;

/**
 * Transport-neutral view of an incoming request. The HTTP host adapts its own
 * request type into this shape before dispatching.
 */
export interface GatewayRequest {
  method: string;
  // Either a bare path with optional query string or an absolute URL
  url: string;
  headers: Record<string, HeaderValue>;
  // Parsed body when the host already decoded one, otherwise raw text
  body?: unknown;
}

export interface GatewayResponse {
  status: number;
  headers: Record<string, string>;
  body: string | null;
}

export interface HandlerContext<TEnv> {
  request: GatewayRequest;
  env: TEnv;
  pathParams: PathParams;
  queryParams: QueryParams;
  path: string;
}

export type Handler<TEnv = unknown> = (
  context: HandlerContext<TEnv>,
) => Promise<GatewayResponse>;
