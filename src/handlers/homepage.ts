/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { headerValue, htmlResponse } from '../lib/http-utils.js';
import { GatewayRequest, GatewayResponse } from '../router/types.js';
import { parseBaseUrl } from '../router/url.js';
import { GatewayContext, RouteInfo } from './env.js';

const TEMPLATE_PATH = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  'templates',
  'homepage.html',
);

let template: string | undefined;

function loadTemplate(): string {
  if (template === undefined) {
    template = fs.readFileSync(TEMPLATE_PATH, 'utf8');
  }
  return template;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

/**
 * Scheme and host clients used to reach this request: taken from an
 * absolute request URL, else from the Host header.
 */
export function requestBaseUrl(request: GatewayRequest): string {
  const fromUrl = parseBaseUrl(request.url);
  if (fromUrl !== undefined) {
    return fromUrl;
  }

  const host = headerValue(request.headers, 'host');
  if (host === undefined) {
    return '';
  }
  const proto = headerValue(request.headers, 'x-forwarded-proto') ?? 'http';
  return `${proto}://${host}`;
}

export function renderEndpointRows(routes: RouteInfo[]): string {
  return routes
    .map(
      ({ method, template }) =>
        `          <tr><td class="method">${escapeHtml(method)}</td>` +
        `<td><code>${escapeHtml(template)}</code></td></tr>`,
    )
    .join('\n');
}

/**
 * Substitute `{{name}}` placeholders. Unknown placeholders are left as is.
 */
export function renderTemplate(
  source: string,
  values: Record<string, string>,
): string {
  return source.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match,
  );
}

export async function homepage({
  env,
  request,
}: GatewayContext): Promise<GatewayResponse> {
  const routes = env.routes();

  const html = renderTemplate(loadTemplate(), {
    baseUrl: escapeHtml(requestBaseUrl(request)),
    websiteUrl: escapeHtml(env.websiteUrl),
    version: escapeHtml(env.version),
    endpointCount: String(routes.length),
    endpointRows: renderEndpointRows(routes),
  });

  return htmlResponse(html);
}
