/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import Sqlite from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import winston from 'winston';

import { DetailedError } from '../lib/error.js';
import { createMigrator } from './migrator.js';
import loadSql from './sql-loader.js';

export const SQL_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'sql');

export const REQUIRED_TABLES = [
  'tags',
  'domains',
  'domain_tags',
  'bugs',
  'bug_screenshots',
  'bug_tags',
];

export type SqlValue = string | number | bigint | Buffer | null;
export type Row = Record<string, SqlValue>;

export interface BugFilters {
  status?: string;
  domain?: number;
  verified?: boolean;
  limit: number;
  offset: number;
}

export type BugDetail = Record<string, SqlValue | Row[]> & {
  screenshots: Row[];
  tags: Row[];
};

export type DomainDetail = Record<string, SqlValue | Row[]> & {
  tags: Row[];
};

export interface BugInput {
  url: string;
  description: string;
  [key: string]: unknown;
}

interface IdParams {
  id: number;
}

interface PageParams {
  limit: number;
  offset: number;
}

interface CountRow {
  total: number;
}

// Falsy and non-scalar input values are stored as NULL
function nullable(value: unknown): string | number | null {
  if (typeof value === 'boolean') {
    return value ? 1 : null;
  }
  if ((typeof value === 'string' || typeof value === 'number') && value) {
    return value;
  }
  return null;
}

function flag(value: unknown): number {
  return value ? 1 : 0;
}

export class SqliteStore {
  private log: winston.Logger;
  private db: Sqlite.Database;
  private sql: Record<string, string>;

  constructor({
    log,
    dbPath,
    sqlDir = SQL_DIR,
  }: {
    log: winston.Logger;
    dbPath: string;
    sqlDir?: string;
  }) {
    this.log = log.child({ class: this.constructor.name });

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Sqlite(dbPath);
    this.db.pragma('foreign_keys = ON');
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.sql = loadSql(sqlDir);
  }

  private stmt<P extends object, R = unknown>(name: string) {
    const source = this.sql[name];
    if (source === undefined) {
      throw new DetailedError('Unknown SQL statement', { statement: name });
    }
    return this.db.prepare<P, R>(source);
  }

  /**
   * Apply every `.sql` migration in `dir` that has not been applied yet, in
   * file name order. Returns the names of the migrations applied.
   */
  async migrate(dir: string): Promise<string[]> {
    const migrator = createMigrator({
      log: this.log,
      db: this.db,
      sql: this.sql,
      migrationsPath: dir,
    });
    const applied = await migrator.up();
    return applied.map((migration) => migration.name);
  }

  getMissingTables(): string[] {
    const existing = new Set(
      this.stmt<[], { name: string }>('selectTableNames')
        .all()
        .map((row) => row.name),
    );
    return REQUIRED_TABLES.filter((table) => !existing.has(table));
  }

  listBugs({ status, domain, verified, limit, offset }: BugFilters): {
    bugs: Row[];
    total: number;
  } {
    const filters = {
      status: status ?? null,
      domain: domain ?? null,
      verified: verified === undefined ? null : flag(verified),
    };

    const count = this.stmt<typeof filters, CountRow>('countBugs').get(filters);
    const bugs = this.stmt<typeof filters & PageParams, Row>('selectBugs').all({
      ...filters,
      limit,
      offset,
    });

    return { bugs, total: count?.total ?? 0 };
  }

  getBug(id: number): BugDetail | undefined {
    const bug = this.stmt<IdParams, Row>('selectBugById').get({ id });
    if (bug === undefined) {
      return undefined;
    }

    return {
      ...bug,
      screenshots: this.stmt<IdParams, Row>('selectBugScreenshots').all({ id }),
      tags: this.stmt<IdParams, Row>('selectBugTags').all({ id }),
    };
  }

  createBug(input: BugInput): Row | undefined {
    const params = {
      url: input.url,
      description: input.description,
      markdown_description: nullable(input.markdown_description),
      label: nullable(input.label),
      views: nullable(input.views),
      verified: flag(input.verified),
      score: nullable(input.score),
      status: nullable(input.status) ?? 'open',
      user_agent: nullable(input.user_agent),
      ocr: nullable(input.ocr),
      screenshot: nullable(input.screenshot),
      github_url: nullable(input.github_url),
      is_hidden: flag(input.is_hidden),
      rewarded: nullable(input.rewarded) ?? 0,
      reporter_ip_address: nullable(input.reporter_ip_address),
      cve_id: nullable(input.cve_id),
      cve_score: nullable(input.cve_score),
      hunt: nullable(input.hunt),
      domain: nullable(input.domain),
      user: nullable(input.user),
      closed_by: nullable(input.closed_by),
    };

    const { lastInsertRowid } = this.stmt<typeof params>('insertBug').run(
      params,
    );
    this.log.debug('Created bug', { id: lastInsertRowid });

    return this.stmt<{ id: number | bigint }, Row>('selectBugRow').get({
      id: lastInsertRowid,
    });
  }

  searchBugs(query: string, limit: number): Row[] {
    return this.stmt<{ pattern: string; limit: number }, Row>('searchBugs').all(
      { pattern: `%${query}%`, limit },
    );
  }

  listDomains({ limit, offset }: PageParams): {
    domains: Row[];
    total: number;
  } {
    const count = this.stmt<[], CountRow>('countDomains').get();
    const domains = this.stmt<PageParams, Row>('selectDomains').all({
      limit,
      offset,
    });
    return { domains, total: count?.total ?? 0 };
  }

  getDomain(id: number): DomainDetail | undefined {
    const domain = this.stmt<IdParams, Row>('selectDomainById').get({ id });
    if (domain === undefined) {
      return undefined;
    }
    return { ...domain, tags: this.getDomainTags(id) };
  }

  getDomainTags(id: number): Row[] {
    return this.stmt<IdParams, Row>('selectDomainTags').all({ id });
  }

  close(): void {
    this.db.close();
  }
}
