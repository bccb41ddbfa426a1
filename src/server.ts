/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { createApp } from './app.js';
import * as config from './config.js';
import log from './log.js';
import * as system from './system.js';

const app = createApp({ log, router: system.router, env: system.env });

const server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`);
});

system.registerCleanupHandler(
  'http-server',
  () =>
    new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    }),
);

export { server };
