/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import path from 'node:path';

/**
 * Parse SQL content into named statements. A statement name is a `--` line
 * at the start of the file or directly after a blank line; every other `--`
 * line inside a statement is dropped.
 *
 * @example
 * parseSqlStatements('-- selectOne\nSELECT 1') // { selectOne: 'SELECT 1' }
 */
export function parseSqlStatements(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  const lines = content.replace(/\r\n/g, '\n').split('\n');

  let name: string | undefined;
  let buf: string[] = [];

  const push = () => {
    if (name !== undefined) {
      result[name] = buf.join('\n').trim();
    }
    name = undefined;
    buf = [];
  };

  lines.forEach((line, i) => {
    const trimmed = line.trim();

    if (trimmed.startsWith('--')) {
      const prevBlank = i === 0 || lines[i - 1].trim() === '';
      if (prevBlank) {
        push();
        name = trimmed.slice(2).trim();
      }
      return;
    }

    if (name !== undefined) {
      buf.push(line.trimEnd());
    }
  });

  push();
  return result;
}

/**
 * Load the named statements of every `.sql` file in a directory. Later files
 * override earlier ones when names collide.
 */
export default function loadSql(dir: string): Record<string, string> {
  const result: Record<string, string> = {};

  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const content = fs.readFileSync(path.resolve(dir, file), 'utf8');
    Object.assign(result, parseSqlStatements(content));
  }

  return result;
}
