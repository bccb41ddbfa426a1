/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { after, afterEach, before, describe, it, mock } from 'node:test';

import {
  TestStore,
  createContext,
  createTestEnv,
  createTestStore,
  createTestUpstream,
  pluck,
  recordOf,
  responseJson,
} from '../../test/gateway-env.js';
import { createTestLogger } from '../../test/test-logger.js';
import { UpstreamResult } from '../upstream/client.js';
import * as contributors from './contributors.js';
import { GatewayEnv } from './env.js';
import * as hunts from './hunts.js';
import * as issues from './issues.js';
import * as leaderboard from './leaderboard.js';
import * as organizations from './organizations.js';
import * as projects from './projects.js';
import * as repos from './repos.js';
import { getStats } from './stats.js';
import * as users from './users.js';

const log = createTestLogger({ suite: 'upstream handlers' });

const ok = (data: unknown): UpstreamResult => ({ ok: true, status: 200, data });
const fail = (status: number, message: string): UpstreamResult => ({
  ok: false,
  status,
  message,
});

describe('upstream handlers', () => {
  let testStore: TestStore;
  let env: GatewayEnv;

  before(async () => {
    testStore = await createTestStore({ log, migrate: false });
    env = createTestEnv({
      log,
      store: testStore.store,
      upstream: createTestUpstream(log),
    });
  });

  after(() => {
    testStore.cleanup();
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('issues', () => {
    it('should re-envelope a paged issue listing', async () => {
      const getIssues = mock.method(env.upstream, 'getIssues', async () =>
        ok({ count: 5, next: null, previous: null, results: [{ id: 1 }] }),
      );

      const response = await issues.listIssues(
        createContext(env, { queryParams: { page: '2', status: 'open' } }),
      );

      assert.deepEqual(getIssues.mock.calls[0].arguments, [
        {
          page: 2,
          perPage: 20,
          status: 'open',
          domain: undefined,
          search: undefined,
        },
      ]);
      assert.deepEqual(responseJson(response), {
        success: true,
        data: [{ id: 1 }],
        pagination: {
          page: 2,
          per_page: 20,
          count: 1,
          total: 5,
          next: null,
          previous: null,
        },
      });
    });

    it('should pass upstream failures through', async () => {
      mock.method(env.upstream, 'getIssues', async () =>
        fail(503, 'Service unavailable'),
      );
      const response = await issues.listIssues(createContext(env));
      assert.equal(response.status, 503);
      assert.deepEqual(responseJson(response), {
        error: true,
        message: 'Service unavailable',
        status: 503,
      });
    });

    it('should validate the issue id before calling upstream', async () => {
      const getIssue = mock.method(env.upstream, 'getIssue', async () =>
        ok({}),
      );
      const response = await issues.getIssue(
        createContext(env, { pathParams: { id: 'x1' } }),
      );
      assert.deepEqual(responseJson(response), {
        error: true,
        message: 'Invalid issue ID',
        status: 400,
      });
      assert.equal(getIssue.mock.callCount(), 0);
    });

    it('should reject ids that cannot be forwarded exactly', async () => {
      const getIssue = mock.method(env.upstream, 'getIssue', async () =>
        ok({}),
      );
      const response = await issues.getIssue(
        createContext(env, { pathParams: { id: '9007199254740993' } }),
      );
      assert.deepEqual(responseJson(response), {
        error: true,
        message: 'Invalid issue ID',
        status: 400,
      });
      assert.equal(getIssue.mock.callCount(), 0);
    });

    it('should return a single issue', async () => {
      const getIssue = mock.method(env.upstream, 'getIssue', async () =>
        ok({ id: 7, description: 'Broken link' }),
      );
      const response = await issues.getIssue(
        createContext(env, { pathParams: { id: '7' } }),
      );
      assert.deepEqual(getIssue.mock.calls[0].arguments, [7]);
      assert.deepEqual(responseJson(response), {
        success: true,
        data: { id: 7, description: 'Broken link' },
      });
    });

    it('should map a missing issue to the upstream status', async () => {
      mock.method(env.upstream, 'getIssue', async () => fail(404, 'Not found.'));
      const response = await issues.getIssue(
        createContext(env, { pathParams: { id: '8' } }),
      );
      assert.equal(response.status, 404);
    });

    it('should require a search query and clamp the limit', async () => {
      const searchIssues = mock.method(env.upstream, 'searchIssues', async () =>
        ok([{ id: 3 }]),
      );

      const missing = await issues.searchIssues(createContext(env));
      assert.equal(missing.status, 400);

      const response = await issues.searchIssues(
        createContext(env, { queryParams: { q: 'xss', limit: '500' } }),
      );
      assert.deepEqual(searchIssues.mock.calls[0].arguments, ['xss', 100]);
      assert.deepEqual(responseJson(response), {
        success: true,
        query: 'xss',
        data: [{ id: 3 }],
      });
    });

    it('should validate and forward a new issue', async () => {
      const createIssue = mock.method(env.upstream, 'createIssue', async () =>
        ok({ id: 10 }),
      );
      const post = (body: unknown) =>
        issues.createIssue(createContext(env, { method: 'POST', body }));

      assert.deepEqual(responseJson(await post(undefined)), {
        error: true,
        message: 'Request body is required',
        status: 400,
      });
      assert.deepEqual(responseJson(await post({ url: 'https://a.test' })), {
        error: true,
        message: 'Missing required fields: description',
        status: 400,
      });

      const body = { url: 'https://a.test', description: 'Typo' };
      const response = await post(body);
      assert.equal(response.status, 201);
      assert.deepEqual(createIssue.mock.calls[0].arguments, [body]);
      assert.deepEqual(responseJson(response), {
        success: true,
        message: 'Issue created successfully',
        data: { id: 10 },
      });
    });
  });

  describe('users', () => {
    it('should page a bare user list locally', async () => {
      mock.method(env.upstream, 'getUsers', async () =>
        ok([{ id: 1 }, { id: 2 }]),
      );
      const response = await users.listUsers(
        createContext(env, { queryParams: { per_page: '10' } }),
      );
      assert.deepEqual(responseJson(response), {
        success: true,
        data: [{ id: 1 }, { id: 2 }],
        pagination: { page: 1, per_page: 10, count: 2 },
      });
    });

    it('should validate the user id', async () => {
      const response = await users.getUser(
        createContext(env, { pathParams: { id: 'me' } }),
      );
      assert.deepEqual(responseJson(response), {
        error: true,
        message: 'Invalid user ID',
        status: 400,
      });
    });
  });

  describe('organizations', () => {
    it('should accept q as the search term', async () => {
      const getOrganizations = mock.method(
        env.upstream,
        'getOrganizations',
        async () => ok([]),
      );
      await organizations.listOrganizations(
        createContext(env, { queryParams: { q: 'owasp' } }),
      );
      assert.deepEqual(getOrganizations.mock.calls[0].arguments, [
        { page: 1, perPage: 20, search: 'owasp' },
      ]);
    });

    it('should return organization repositories', async () => {
      const getRepos = mock.method(
        env.upstream,
        'getOrganizationRepos',
        async () => ok([{ name: 'api' }]),
      );
      const response = await organizations.getOrganizationRepos(
        createContext(env, { pathParams: { id: '3' } }),
      );
      assert.deepEqual(getRepos.mock.calls[0].arguments, [3]);
      assert.deepEqual(responseJson(response), {
        success: true,
        organization_id: 3,
        data: [{ name: 'api' }],
      });
    });

    it('should filter projects by organization', async () => {
      mock.method(env.upstream, 'getProjects', async () =>
        ok({
          projects: [
            { id: 1, organization: 3 },
            { id: 2, organization: 4 },
            { id: 3, organization: '3' },
          ],
        }),
      );
      const response = await organizations.getOrganizationProjects(
        createContext(env, { pathParams: { id: '3' } }),
      );
      const body = recordOf(responseJson(response));
      assert.equal(body.organization_id, 3);
      assert.equal(body.count, 2);
      assert.deepEqual(pluck(body.data, 'id'), [1, 3]);
    });

    it('should pass other project payloads through', async () => {
      mock.method(env.upstream, 'getProjects', async () => ok(['p']));
      const response = await organizations.getOrganizationProjects(
        createContext(env, { pathParams: { id: '3' } }),
      );
      assert.deepEqual(responseJson(response), {
        success: true,
        organization_id: 3,
        data: ['p'],
      });
    });
  });

  describe('projects', () => {
    it('should unwrap the projects listing', async () => {
      mock.method(env.upstream, 'getProjects', async () =>
        ok({ projects: [{ id: 1 }], count: 10 }),
      );
      const response = await projects.listProjects(createContext(env));
      assert.deepEqual(responseJson(response), {
        success: true,
        data: [{ id: 1 }],
        count: 10,
      });
    });

    it('should list project contributors', async () => {
      mock.method(env.upstream, 'getProject', async () =>
        ok({ id: 5, contributors: [{ login: 'a' }, { login: 'b' }] }),
      );
      const response = await projects.getProjectContributors(
        createContext(env, { pathParams: { id: '5' } }),
      );
      assert.deepEqual(responseJson(response), {
        success: true,
        project_id: 5,
        data: [{ login: 'a' }, { login: 'b' }],
        count: 2,
      });
    });

    it('should return no contributors when the project has none', async () => {
      mock.method(env.upstream, 'getProject', async () => ok({ id: 5 }));
      const response = await projects.getProjectContributors(
        createContext(env, { pathParams: { id: '5' } }),
      );
      const body = recordOf(responseJson(response));
      assert.deepEqual(body.data, []);
      assert.equal(body.count, 0);
    });
  });

  describe('hunts', () => {
    it('should forward listing flags from the query', async () => {
      const getHunts = mock.method(env.upstream, 'getHunts', async () =>
        ok([]),
      );
      await hunts.listHunts(
        createContext(env, { queryParams: { active: 'true' } }),
      );
      assert.deepEqual(getHunts.mock.calls[0].arguments, [
        {
          page: 1,
          perPage: 20,
          active: true,
          previous: false,
          upcoming: false,
        },
      ]);
    });

    it('should serve fixed hunt filters', async () => {
      const getHunts = mock.method(env.upstream, 'getHunts', async () =>
        ok([{ id: 2 }]),
      );
      const response = await hunts.filteredHunts('previous')(
        createContext(env),
      );
      assert.deepEqual(getHunts.mock.calls[0].arguments, [
        { active: false, previous: true, upcoming: false },
      ]);
      assert.deepEqual(responseJson(response), {
        success: true,
        filter: 'previous',
        data: [{ id: 2 }],
      });
    });

    it('should validate the hunt id', async () => {
      const response = await hunts.getHunt(
        createContext(env, { pathParams: { id: 'next' } }),
      );
      assert.deepEqual(responseJson(response), {
        error: true,
        message: 'Invalid hunt ID',
        status: 400,
      });
    });
  });

  describe('stats', () => {
    it('should default missing counters to zero', async () => {
      mock.method(env.upstream, 'getStats', async () =>
        ok({ bugs: 10, users: 3, extra: 1 }),
      );
      const body = recordOf(responseJson(await getStats(createContext(env))));
      assert.equal(body.success, true);
      assert.deepEqual(body.data, { bugs: 10, users: 3, hunts: 0, domains: 0 });
      assert.deepEqual(Object.keys(recordOf(body.description)), [
        'bugs',
        'users',
        'hunts',
        'domains',
      ]);
    });

    it('should pass upstream failures through', async () => {
      mock.method(env.upstream, 'getStats', async () =>
        fail(500, 'Request failed: socket hang up'),
      );
      const response = await getStats(createContext(env));
      assert.equal(response.status, 500);
    });
  });

  describe('leaderboard', () => {
    const monthly = (queryParams: Record<string, string>) =>
      leaderboard.getMonthlyLeaderboard(createContext(env, { queryParams }));

    it('should validate month and year', async () => {
      const cases: [Record<string, string>, string][] = [
        [{ month: '13' }, 'Month must be between 1 and 12'],
        [{ month: '0' }, 'Month must be between 1 and 12'],
        [{ month: 'may' }, 'Invalid month format'],
        [{ year: '1999' }, 'Invalid year'],
        [{ year: '20x4' }, 'Invalid year format'],
      ];
      for (const [query, message] of cases) {
        assert.deepEqual(responseJson(await monthly(query)), {
          error: true,
          message,
          status: 400,
        });
      }
    });

    it('should return the monthly leaderboard', async () => {
      const getLeaderboard = mock.method(
        env.upstream,
        'getLeaderboard',
        async () => ok({ results: [{ user: 'a' }], count: 1 }),
      );
      const response = await monthly({ month: '3', year: '2024' });
      assert.deepEqual(getLeaderboard.mock.calls[0].arguments, [
        { page: 1, perPage: 20, month: 3, year: 2024 },
      ]);
      assert.deepEqual(responseJson(response), {
        success: true,
        type: 'monthly',
        month: 3,
        year: 2024,
        data: [{ user: 'a' }],
        pagination: { page: 1, per_page: 20 },
      });
    });

    it('should report null month and year when unfiltered', async () => {
      mock.method(env.upstream, 'getLeaderboard', async () => ok([]));
      const body = recordOf(responseJson(await monthly({})));
      assert.equal(body.month, null);
      assert.equal(body.year, null);
      assert.deepEqual(body.data, []);
    });

    it('should tag the global leaderboard', async () => {
      mock.method(env.upstream, 'getLeaderboard', async () =>
        ok([{ user: 'a' }, { user: 'b' }]),
      );
      const response = await leaderboard.getGlobalLeaderboard(
        createContext(env),
      );
      assert.deepEqual(responseJson(response), {
        success: true,
        type: 'global',
        data: [{ user: 'a' }, { user: 'b' }],
        pagination: { page: 1, per_page: 20, count: 2 },
      });
    });

    it('should request the organization leaderboard', async () => {
      const getLeaderboard = mock.method(
        env.upstream,
        'getLeaderboard',
        async () => ok({ count: 1, results: [{ org: 'x' }] }),
      );
      const response = await leaderboard.getOrganizationLeaderboard(
        createContext(env),
      );
      assert.deepEqual(getLeaderboard.mock.calls[0].arguments, [
        { page: 1, perPage: 20, type: 'organizations' },
      ]);
      const body = recordOf(responseJson(response));
      assert.equal(body.type, 'organizations');
      assert.deepEqual(body.data, [{ org: 'x' }]);
    });
  });

  describe('contributors', () => {
    const get = (id: string) =>
      contributors.getContributor(createContext(env, { pathParams: { id } }));

    it('should find a contributor by id or GitHub id', async () => {
      mock.method(env.upstream, 'getContributors', async () =>
        ok([
          { id: 5, github_id: 12, name: 'first' },
          { id: 6, github_id: 13, name: 'second' },
        ]),
      );
      const nameOf = async (id: string) =>
        recordOf(recordOf(responseJson(await get(id))).data).name;
      assert.equal(await nameOf('6'), 'second');
      assert.equal(await nameOf('12'), 'first');
    });

    it('should return 404 when nothing matches', async () => {
      mock.method(env.upstream, 'getContributors', async () =>
        ok({ results: [] }),
      );
      assert.deepEqual(responseJson(await get('99')), {
        error: true,
        message: 'Contributor not found',
        status: 404,
      });
    });

    it('should validate the contributor id', async () => {
      assert.equal((await get('abc')).status, 400);
    });
  });

  describe('repos', () => {
    it('should describe the listing without an organization', async () => {
      const body = recordOf(
        responseJson(await repos.listRepos(createContext(env))),
      );
      assert.equal(body.message, 'Repository listing');
      assert.deepEqual(body.endpoints, {
        organization_repos: '/organizations/{id}/repos',
        project_repos: '/projects/{id}/repos',
      });
    });

    it('should list an organization repositories', async () => {
      const getRepos = mock.method(
        env.upstream,
        'getOrganizationRepos',
        async () => ok([{ id: 1 }, { id: 2 }]),
      );
      const response = await repos.listRepos(
        createContext(env, { queryParams: { organization: '4' } }),
      );
      assert.deepEqual(getRepos.mock.calls[0].arguments, [4]);
      assert.deepEqual(responseJson(response), {
        success: true,
        organization_id: 4,
        data: [{ id: 1 }, { id: 2 }],
        count: 2,
      });
    });

    it('should describe a single repository', async () => {
      const response = await repos.getRepo(
        createContext(env, { pathParams: { id: '8' } }),
      );
      assert.deepEqual(responseJson(response), {
        success: true,
        message: 'Repository details endpoint',
        data: {
          id: 8,
          note: 'Direct repository lookup may require organization context',
        },
      });
    });

    it('should validate the repository id', async () => {
      const response = await repos.getRepo(
        createContext(env, { pathParams: { id: 'api' } }),
      );
      assert.deepEqual(responseJson(response), {
        error: true,
        message: 'Invalid repository ID',
        status: 400,
      });
    });
  });
});
