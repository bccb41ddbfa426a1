/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import * as bugs from './handlers/bugs.js';
import * as contributors from './handlers/contributors.js';
import * as domains from './handlers/domains.js';
import { GatewayEnv, RouteInfo } from './handlers/env.js';
import { health } from './handlers/health.js';
import { homepage } from './handlers/homepage.js';
import * as hunts from './handlers/hunts.js';
import * as issues from './handlers/issues.js';
import * as leaderboard from './handlers/leaderboard.js';
import * as organizations from './handlers/organizations.js';
import * as projects from './handlers/projects.js';
import * as repos from './handlers/repos.js';
import { getStats } from './handlers/stats.js';
import * as users from './handlers/users.js';
import { Router } from './router/router.js';

/**
 * Build the gateway route table. Parameterized routes may be registered
 * before the literal routes they overlap (`/bugs/{id}` before
 * `/bugs/search`); the router orders them by specificity.
 */
export function buildRouter({
  log,
}: {
  log: winston.Logger;
}): Router<GatewayEnv> {
  const router = new Router<GatewayEnv>({ log });

  router.get('/', homepage).get('/health', health);

  // Bugs (local store)
  router
    .get('/bugs', bugs.listBugs)
    .get('/bugs/{id}', bugs.getBug)
    .post('/bugs', bugs.createBug)
    .get('/bugs/search', bugs.searchBugs);

  // Issues
  router
    .get('/issues', issues.listIssues)
    .get('/issues/{id}', issues.getIssue)
    .post('/issues', issues.createIssue)
    .get('/issues/search', issues.searchIssues);

  // Users
  router
    .get('/users', users.listUsers)
    .get('/users/{id}', users.getUser)
    .get('/users/{id}/profile', users.getUser);

  // Domains (local store)
  router
    .get('/domains', domains.listDomains)
    .get('/domains/{id}', domains.getDomain)
    .get('/domains/{id}/tags', domains.getDomainTags);

  // Organizations
  router
    .get('/organizations', organizations.listOrganizations)
    .get('/organizations/{id}', organizations.getOrganization)
    .get('/organizations/{id}/repos', organizations.getOrganizationRepos)
    .get(
      '/organizations/{id}/projects',
      organizations.getOrganizationProjects,
    );

  // Projects
  router
    .get('/projects', projects.listProjects)
    .get('/projects/{id}', projects.getProject)
    .get('/projects/{id}/contributors', projects.getProjectContributors);

  // Hunts
  router
    .get('/hunts', hunts.listHunts)
    .get('/hunts/{id}', hunts.getHunt)
    .get('/hunts/active', hunts.filteredHunts('active'))
    .get('/hunts/previous', hunts.filteredHunts('previous'))
    .get('/hunts/upcoming', hunts.filteredHunts('upcoming'));

  router.get('/stats', getStats);

  // Leaderboard
  router
    .get('/leaderboard', leaderboard.getGlobalLeaderboard)
    .get('/leaderboard/monthly', leaderboard.getMonthlyLeaderboard)
    .get(
      '/leaderboard/organizations',
      leaderboard.getOrganizationLeaderboard,
    );

  // Contributors and repositories
  router
    .get('/contributors', contributors.listContributors)
    .get('/contributors/{id}', contributors.getContributor)
    .get('/repos', repos.listRepos)
    .get('/repos/{id}', repos.getRepo);

  return router;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Route table summary for documentation, ordered by template then method.
 */
export function routeInfo(router: Router<GatewayEnv>): RouteInfo[] {
  return router.routes
    .map(({ method, template }) => ({ method, template }))
    .sort(
      (a, b) =>
        compareText(a.template, b.template) || compareText(a.method, b.method),
    );
}
