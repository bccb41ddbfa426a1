/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import Sqlite from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

import * as config from './config.js';
import { createMigrator } from './database/migrator.js';
import loadSql from './database/sql-loader.js';
import { SQL_DIR } from './database/sqlite-store.js';
import log from './log.js';

// Usage: db:migrate -- up | down | pending | executed | create
fs.mkdirSync(path.dirname(config.SQLITE_DB_PATH), { recursive: true });
const db = new Sqlite(config.SQLITE_DB_PATH);

try {
  await createMigrator({
    log,
    db,
    sql: loadSql(SQL_DIR),
    migrationsPath: config.MIGRATIONS_PATH,
  }).runAsCLI();
} finally {
  db.close();
}
