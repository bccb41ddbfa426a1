/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { QueryParams } from './types.js';

const SCHEME_AND_HOST_REGEX = /^[a-zA-Z][a-zA-Z\d+.-]*:\/\/[^/?#]*/;

/**
 * Extract the routable path from a bare path or an absolute URL. The query
 * string is dropped and a single trailing slash is removed, except for the
 * root path.
 *
 * @example
 * parseUrlPath('https://example.com/users/?page=2') // '/users'
 * parseUrlPath('/') // '/'
 */
export function parseUrlPath(url: string): string {
  let path = url.replace(SCHEME_AND_HOST_REGEX, '');

  const queryStart = path.indexOf('?');
  if (queryStart !== -1) {
    path = path.slice(0, queryStart);
  }

  if (!path.startsWith('/')) {
    path = `/${path}`;
  }

  if (path !== '/' && path.endsWith('/')) {
    path = path.slice(0, -1);
  }

  return path;
}

/**
 * Parse `key=value` pairs joined by `&` after the first `?`. Pairs without an
 * `=` are dropped, the last duplicate wins and values are passed through
 * without percent-decoding.
 */
export function parseQueryParams(url: string): QueryParams {
  const queryStart = url.indexOf('?');
  if (queryStart === -1) {
    return {};
  }

  const entries: [string, string][] = [];
  for (const pair of url.slice(queryStart + 1).split('&')) {
    const separator = pair.indexOf('=');
    if (separator === -1) {
      continue;
    }
    entries.push([pair.slice(0, separator), pair.slice(separator + 1)]);
  }

  return Object.fromEntries(entries);
}

/**
 * Scheme and host of an absolute URL, or undefined for a bare path.
 */
export function parseBaseUrl(url: string): string | undefined {
  return SCHEME_AND_HOST_REGEX.exec(url)?.[0];
}
