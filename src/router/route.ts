/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  CompiledPattern,
  SpecificityKey,
  compareSpecificity,
  compilePattern,
} from './pattern.js';
import { Handler, PathParams } from './types.js';

export class Route<TEnv = unknown> {
  readonly method: string;
  readonly pattern: CompiledPattern;
  readonly handler: Handler<TEnv>;
  // Registration sequence, used to break specificity ties
  readonly sequence: number;

  constructor(
    method: string,
    template: string,
    handler: Handler<TEnv>,
    sequence = 0,
  ) {
    this.method = method.toUpperCase();
    this.pattern = compilePattern(template);
    this.handler = handler;
    this.sequence = sequence;
  }

  get template(): string {
    return this.pattern.template;
  }

  /**
   * Returns the captured parameters when both method and path match. A
   * pattern without captures yields an empty object, never undefined.
   */
  matches(method: string, path: string): PathParams | undefined {
    if (this.method !== method.toUpperCase()) {
      return undefined;
    }
    return this.pattern.match(path);
  }

  specificity(): SpecificityKey {
    return this.pattern.specificity;
  }
}

export function compareRoutes<TEnv>(a: Route<TEnv>, b: Route<TEnv>): number {
  return (
    compareSpecificity(a.specificity(), b.specificity()) ||
    a.sequence - b.sequence
  );
}
