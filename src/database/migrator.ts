/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import Sqlite from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { MigrationParams, RunnableMigration, Umzug, UmzugStorage } from 'umzug';
import winston from 'winston';

import { DetailedError } from '../lib/error.js';

type MigrationContext = Sqlite.Database;

function toDownPath(upPath: string): string {
  return path.join(path.dirname(upPath), 'down', path.basename(upPath));
}

function execFile(db: Sqlite.Database, file: string): void {
  const sql = fs.readFileSync(file, 'utf8');
  db.transaction(() => {
    db.exec(sql);
  })();
}

class SqliteMigrationStorage implements UmzugStorage<MigrationContext> {
  constructor(private sql: Record<string, string>) {}

  private prepare<P extends object, R = unknown>(
    db: Sqlite.Database,
    name: string,
  ) {
    const source = this.sql[name];
    if (source === undefined) {
      throw new DetailedError('Unknown SQL statement', { statement: name });
    }
    return db.prepare<P, R>(source);
  }

  private ensureMigrationsTable(db: Sqlite.Database): void {
    this.prepare<[]>(db, 'createMigrationsTable').run();
  }

  async logMigration({
    name,
    context,
  }: MigrationParams<MigrationContext>): Promise<void> {
    this.ensureMigrationsTable(context);
    this.prepare<{ name: string; applied_at: number }>(
      context,
      'insertMigration',
    ).run({ name, applied_at: Date.now() });
  }

  async unlogMigration({
    name,
    context,
  }: MigrationParams<MigrationContext>): Promise<void> {
    this.ensureMigrationsTable(context);
    this.prepare<{ name: string }>(context, 'deleteMigration').run({ name });
  }

  async executed({
    context,
  }: Pick<MigrationParams<MigrationContext>, 'context'>): Promise<string[]> {
    this.ensureMigrationsTable(context);
    return this.prepare<[], { name: string }>(
      context,
      'selectAppliedMigrations',
    )
      .all()
      .map((row) => row.name);
  }
}

/**
 * Every `.sql` file in `dir`, in file name order. A file of the same name
 * under `dir/down/` reverts it.
 */
export function listMigrations(
  dir: string,
): RunnableMigration<MigrationContext>[] {
  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort()
    .map((name): RunnableMigration<MigrationContext> => {
      const upPath = path.resolve(dir, name);
      const downPath = toDownPath(upPath);
      return {
        name,
        path: upPath,
        up: async ({ context }) => execFile(context, upPath),
        down: async ({ context }) => {
          if (!fs.existsSync(downPath)) {
            throw new DetailedError('Migration cannot be reverted', {
              migration: name,
            });
          }
          execFile(context, downPath);
        },
      };
    });
}

export function createMigrator({
  log,
  db,
  sql,
  migrationsPath,
}: {
  log: winston.Logger;
  db: Sqlite.Database;
  sql: Record<string, string>;
  migrationsPath: string;
}): Umzug<MigrationContext> {
  const migrationLog = log.child({ class: 'Migrator' });

  return new Umzug<MigrationContext>({
    migrations: () => listMigrations(migrationsPath),
    context: db,
    storage: new SqliteMigrationStorage(sql),
    create: { folder: migrationsPath },
    logger: {
      info: (event) => migrationLog.info('Migration event', event),
      warn: (event) => migrationLog.warn('Migration event', event),
      error: (event) => migrationLog.error('Migration event', event),
      debug: (event) => migrationLog.debug('Migration event', event),
    },
  });
}
