/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, AxiosInstance, Method } from 'axios';
import winston from 'winston';

import { errorMessage } from '../lib/error.js';
import { upstreamRequestsCounter } from '../metrics.js';

export type UpstreamResult<T = unknown> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; message: string; data?: unknown };

export type QueryValue = string | number | boolean | undefined;
export type UpstreamQuery = Record<string, QueryValue>;

export interface PageOptions {
  page?: number;
  perPage?: number;
}

export interface IssueFilters extends PageOptions {
  status?: string;
  domain?: string;
  search?: string;
}

export interface HuntFilters extends PageOptions {
  active?: boolean;
  previous?: boolean;
  upcoming?: boolean;
}

export interface LeaderboardOptions extends PageOptions {
  month?: number;
  year?: number;
  type?: 'global' | 'organizations';
}

const BODY_METHODS = ['POST', 'PUT', 'PATCH'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function failureMessage(data: unknown): string {
  if (isRecord(data)) {
    for (const key of ['detail', 'error']) {
      const value = data[key];
      if (typeof value === 'string') {
        return value;
      }
    }
  }
  return 'Request failed';
}

// Empty bodies become {} and non-JSON bodies are wrapped
function normalizeBody(data: unknown): unknown {
  if (data === undefined || data === null || data === '') {
    return {};
  }
  if (typeof data === 'string') {
    return { raw_response: data };
  }
  return data;
}

function pageParams({ page = 1, perPage = 20 }: PageOptions): UpstreamQuery {
  return { page: String(page), per_page: String(perPage) };
}

/**
 * Client for the upstream bug-tracker REST API. Requests never reject:
 * failures are reported through the result's `ok` flag.
 */
export class UpstreamClient {
  private log: winston.Logger;
  private axios: AxiosInstance;

  constructor({
    log,
    baseUrl,
    token,
    requestTimeoutMs,
    userAgent,
  }: {
    log: winston.Logger;
    baseUrl: string;
    token?: string;
    requestTimeoutMs: number;
    userAgent: string;
  }) {
    this.log = log.child({ class: this.constructor.name });

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': userAgent,
    };
    if (token !== undefined && token !== '') {
      headers.Authorization = `Token ${token}`;
    }

    this.axios = axios.create({
      baseURL: baseUrl.replace(/\/+$/, ''),
      timeout: requestTimeoutMs,
      headers,
      validateStatus: () => true,
    });
  }

  async request(
    method: Method,
    endpoint: string,
    { params, data }: { params?: UpstreamQuery; data?: unknown } = {},
  ): Promise<UpstreamResult> {
    const upperMethod = method.toUpperCase();
    const log = this.log.child({ method: 'request', endpoint });

    const query =
      params === undefined
        ? undefined
        : Object.fromEntries(
            Object.entries(params).filter(([, v]) => v !== undefined),
          );

    try {
      const response = await this.axios.request({
        method,
        url: `/${endpoint.replace(/^\/+/, '')}`,
        params: query,
        data:
          data !== undefined && BODY_METHODS.includes(upperMethod)
            ? data
            : undefined,
      });

      const body = normalizeBody(response.data);

      if (response.status >= 400) {
        upstreamRequestsCounter.inc({ method: upperMethod, outcome: 'error' });
        log.debug('Upstream returned error status', {
          status: response.status,
        });
        return {
          ok: false,
          status: response.status,
          message: failureMessage(body),
          data: body,
        };
      }

      upstreamRequestsCounter.inc({ method: upperMethod, outcome: 'success' });
      return { ok: true, status: response.status, data: body };
    } catch (error: unknown) {
      const message = errorMessage(error);
      upstreamRequestsCounter.inc({ method: upperMethod, outcome: 'failure' });
      log.warn('Upstream request failed', { message });
      return { ok: false, status: 500, message: `Request failed: ${message}` };
    }
  }

  get(endpoint: string, params?: UpstreamQuery) {
    return this.request('GET', endpoint, { params });
  }

  post(endpoint: string, data?: unknown, params?: UpstreamQuery) {
    return this.request('POST', endpoint, { params, data });
  }

  //
  // Issues
  //

  getIssues({ status, domain, search, ...page }: IssueFilters = {}) {
    return this.get('issues/', {
      ...pageParams(page),
      status: status || undefined,
      domain: domain || undefined,
      search: search || undefined,
    });
  }

  getIssue(id: number) {
    return this.get(`issues/${id}/`);
  }

  createIssue(issue: Record<string, unknown>) {
    return this.post('issues/', issue);
  }

  searchIssues(q: string, limit = 10) {
    return this.get('search/', { q, limit: String(limit) });
  }

  //
  // Users
  //

  getUsers(page: PageOptions = {}) {
    return this.get('profile/', pageParams(page));
  }

  getUser(id: number) {
    return this.get(`profile/${id}/`);
  }

  //
  // Organizations and projects
  //

  getOrganizations({ search, ...page }: PageOptions & { search?: string } = {}) {
    return this.get('organizations/', {
      ...pageParams(page),
      search: search || undefined,
    });
  }

  getOrganization(id: number) {
    return this.get(`organizations/${id}/`);
  }

  getOrganizationRepos(id: number) {
    return this.get(`organizations/${id}/repositories/`);
  }

  getProjects({ search, ...page }: PageOptions & { search?: string } = {}) {
    return this.get('projects/', {
      ...pageParams(page),
      q: search || undefined,
    });
  }

  getProject(id: number) {
    return this.get(`projects/${id}/`);
  }

  //
  // Hunts, stats, leaderboard and contributors
  //

  getHunts({ active, previous, upcoming, ...page }: HuntFilters = {}) {
    const params = pageParams(page);
    if (active) {
      params.activeHunt = 'true';
    } else if (previous) {
      params.previousHunt = 'true';
    } else if (upcoming) {
      params.upcomingHunt = 'true';
    }
    return this.get('hunt/', params);
  }

  getHunt(id: number) {
    return this.get(`hunt/${id}/`);
  }

  getStats() {
    return this.get('stats/');
  }

  getLeaderboard({
    month,
    year,
    type = 'global',
    ...page
  }: LeaderboardOptions = {}) {
    const params = pageParams(page);
    if (month) {
      params.filter = 'true';
      params.month = String(month);
    }
    if (year) {
      params.filter = 'true';
      params.year = String(year);
    }
    if (type === 'organizations') {
      params.leaderboard_type = 'organizations';
    }
    return this.get('leaderboard/', params);
  }

  getContributors(page: PageOptions = {}) {
    return this.get('contributors/', pageParams(page));
  }
}
