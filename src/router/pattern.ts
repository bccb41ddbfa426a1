/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { PatternError } from './errors.js';
import { PathParams } from './types.js';

export type PatternSegment =
  | { kind: 'literal'; text: string }
  | { kind: 'param'; name: string };

/**
 * Ordering key for route templates, compared lexicographically with lower
 * ranking first: fewer capture slots, then more literal characters, then the
 * segment count term.
 */
export type SpecificityKey = readonly [
  paramCount: number,
  negatedLiteralLength: number,
  negatedSegmentCount: number,
];

export interface CompiledPattern {
  readonly template: string;
  readonly segments: readonly PatternSegment[];
  readonly paramNames: readonly string[];
  readonly specificity: SpecificityKey;
  match(path: string): PathParams | undefined;
}

const PARAM_NAME_REGEX = /^\w+$/;

// One path segment's worth of word characters and hyphens
const PARAM_VALUE_SOURCE = '([\\w-]+)';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function parsePattern(template: string): PatternSegment[] {
  if (!template.startsWith('/')) {
    throw new PatternError(template, "must start with '/'");
  }

  const segments: PatternSegment[] = [];
  const seen = new Set<string>();
  let literal = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i];

    if (char === '}') {
      throw new PatternError(template, `unbalanced '}' at offset ${i}`);
    }

    if (char !== '{') {
      literal += char;
      i++;
      continue;
    }

    const close = template.indexOf('}', i + 1);
    if (close === -1) {
      throw new PatternError(template, `unbalanced '{' at offset ${i}`);
    }

    const name = template.slice(i + 1, close);
    if (!PARAM_NAME_REGEX.test(name)) {
      throw new PatternError(template, `invalid capture name "${name}"`);
    }
    if (seen.has(name)) {
      throw new PatternError(template, `duplicate capture name "${name}"`);
    }

    if (literal !== '') {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    } else if (segments.at(-1)?.kind === 'param') {
      throw new PatternError(
        template,
        `capture "${name}" must be separated from the previous capture by literal text`,
      );
    }

    seen.add(name);
    segments.push({ kind: 'param', name });
    i = close + 1;
  }

  if (literal !== '') {
    segments.push({ kind: 'literal', text: literal });
  }

  return segments;
}

export function computeSpecificity(
  template: string,
  segments: readonly PatternSegment[],
): SpecificityKey {
  let paramCount = 0;
  let literalLength = 0;
  for (const segment of segments) {
    if (segment.kind === 'param') {
      paramCount++;
    } else {
      literalLength += segment.text.length;
    }
  }

  const segmentCount = template.split('/').filter((s) => s !== '').length;

  // 0 - n rather than -n so that a zero count stays +0
  return [paramCount, 0 - literalLength, 0 - segmentCount];
}

export function compareSpecificity(
  a: SpecificityKey,
  b: SpecificityKey,
): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return 0;
}

/**
 * Compile a route template such as `/users/{id}/posts/{post_id}` into an
 * anchored matcher. Throws {@link PatternError} for malformed templates.
 */
export function compilePattern(template: string): CompiledPattern {
  const segments = parsePattern(template);
  const paramNames = segments.flatMap((segment) =>
    segment.kind === 'param' ? [segment.name] : [],
  );

  const source = segments
    .map((segment) =>
      segment.kind === 'param'
        ? PARAM_VALUE_SOURCE
        : escapeRegExp(segment.text),
    )
    .join('');
  const regex = new RegExp(`^${source}$`);

  return {
    template,
    segments,
    paramNames,
    specificity: computeSpecificity(template, segments),
    match(path: string): PathParams | undefined {
      const result = regex.exec(path);
      if (result === null) {
        return undefined;
      }

      return Object.fromEntries(
        paramNames.map((name, index) => [name, result[index + 1]]),
      );
    },
  };
}
