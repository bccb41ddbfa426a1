/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { createLogger, format, transports } from 'winston';

import * as config from './config.js';

const dropStackTraces = format((info) => {
  if (
    info.level !== 'error' &&
    info.stack !== undefined &&
    !config.LOG_ALL_STACKTRACES
  ) {
    delete info.stack;
  }
  return info;
});

// The node test runner sets NODE_TEST_CONTEXT in every test process
const underTestRunner = process.env.NODE_TEST_CONTEXT !== undefined;

const logger = createLogger({
  level: config.LOG_LEVEL,
  defaultMeta: { service: 'bug-gateway', instanceId: config.INSTANCE_ID },
  format: format.combine(
    dropStackTraces(),
    format.errors(),
    format.timestamp(),
    config.LOG_FORMAT === 'json' ? format.json() : format.simple(),
  ),
  transports: underTestRunner
    ? [new transports.File({ filename: 'logs/test.log' })]
    : [new transports.Console()],
});

export default logger;
