import nodeFetch, { type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import {
  ClientsQuery,
  MerakiClient,
  MerakiClientSchema,
  MerakiNetwork,
  MerakiNetworkSchema,
} from '../types/index.js';
import { ApiError, ErrorCode, MigrationError, NetworkNotFoundError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export interface DashboardAPIConfig {
  apiKey: string;
  baseUrl?: string;
  fetch?: Fetcher;
}

export const DEFAULT_BASE_URL = 'https://api.meraki.com/api/v1';
export const DEFAULT_TIMESPAN = 86400;
export const DEFAULT_PER_PAGE = 1000;

const log = createChildLogger('dashboard-api');

export class MerakiDashboardAPI {
  private apiKey: string;
  private baseUrl: string;
  private fetch: Fetcher;

  constructor(config: DashboardAPIConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.fetch = config.fetch ?? nodeFetch;
  }

  private async request<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    log.debug({ url }, 'GET');

    const response = await this.fetch(url, {
      method: 'GET',
      headers: {
        'X-Cisco-Meraki-API-Key': this.apiKey,
        'Accept': 'application/json',
        'Content-Type': 'application/json',
      },
    });

    log.debug({ url, status: response.status }, 'response');

    if (!response.ok) {
      const error = await response.text();
      throw new ApiError(response.status, endpoint, error || response.statusText);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new MigrationError(
        ErrorCode.API_INVALID_RESPONSE,
        `Unexpected response from ${endpoint}: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
        { context: { endpoint } }
      );
    }
    return parsed.data;
  }

  async getOrganizationNetworks(orgId: string): Promise<MerakiNetwork[]> {
    return this.request(
      `/organizations/${encodeURIComponent(orgId)}/networks`,
      z.array(MerakiNetworkSchema)
    );
  }

  /**
   * Fails with NetworkNotFoundError unless the organization owns the network.
   */
  async assertNetworkInOrganization(orgId: string, networkId: string): Promise<MerakiNetwork> {
    const networks = await this.getOrganizationNetworks(orgId);
    const network = networks.find((n) => n.id === networkId);
    if (!network) {
      throw new NetworkNotFoundError(orgId, networkId);
    }
    return network;
  }

  async getNetworkClients(networkId: string, query: ClientsQuery): Promise<MerakiClient[]> {
    const params = new URLSearchParams({
      timespan: String(query.timespan),
      perPage: String(query.perPage),
    });
    if (query.startingAfter !== undefined) {
      params.set('startingAfter', query.startingAfter);
    }
    return this.request(
      `/networks/${encodeURIComponent(networkId)}/clients?${params.toString()}`,
      z.array(MerakiClientSchema)
    );
  }

  /**
   * Walks every page of clients seen within `timespan` seconds.
   *
   * The MAC of the last client on a page is the cursor for the next one, so
   * this relies on the API returning clients in a stable order. Clients
   * inserted or reordered between two page fetches can be skipped or
   * returned twice.
   */
  async getAllNetworkClients(
    networkId: string,
    options: { timespan?: number; perPage?: number } = {}
  ): Promise<MerakiClient[]> {
    const timespan = options.timespan ?? DEFAULT_TIMESPAN;
    const perPage = options.perPage ?? DEFAULT_PER_PAGE;
    const clients: MerakiClient[] = [];
    let startingAfter: string | undefined;

    for (;;) {
      const page = await this.getNetworkClients(networkId, { timespan, perPage, startingAfter });
      const last = page.at(-1);
      if (last === undefined) break;

      clients.push(...page);
      log.debug({ networkId, page: page.length, total: clients.length }, 'fetched client page');

      if (page.length < perPage) break;
      startingAfter = last.mac;
    }

    return clients;
  }
}
