/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { DetailedError, errorMessage } from '../lib/error.js';

// Malformed route template. Raised at registration time only.
export class PatternError extends DetailedError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid route pattern "${pattern}": ${reason}`, { pattern });
    this.pattern = pattern;
  }
}

export class RouteNotFoundError extends DetailedError {
  readonly method: string;
  readonly path: string;

  constructor(method: string, path: string) {
    super(`Not Found: ${method} ${path}`, { method, path });
    this.method = method;
    this.path = path;
  }
}

// Wraps whatever a matched handler threw or rejected with.
export class HandlerError extends DetailedError {
  constructor(cause: unknown, details: { method: string; path: string }) {
    super(`Handler error: ${errorMessage(cause)}`, {
      ...details,
      cause,
      stack: cause instanceof Error ? cause.stack : undefined,
    });
  }
}
