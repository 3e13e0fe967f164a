import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { AppConfig } from '../../config';
import { AuthMissingError, ReauthNeededError, TransportError, UpstreamError } from '../../errors/mailbox.errors';
import type { GraphCollection, QueryParams } from '../../types/mail.types';
import type { RequestContext } from '../../utils/request-context';

/**
 * Bearer-authenticated GET access to Microsoft Graph.
 * The token comes from the request context bound by the auth gateway, never from arguments.
 */
export class GraphClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: AppConfig['graph'],
    private readonly context: RequestContext,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ timeout: settings.timeoutMs });
  }

  /**
   * GET a Graph resource.
   * `endpoint` is either a path under the base URL or a full @odata.nextLink, which already
   * embeds its query and is used as-is.
   */
  async get<T>(endpoint: string, params: QueryParams = {}): Promise<T> {
    const accessToken = this.context.getAccessToken();
    if (!accessToken) {
      throw new AuthMissingError();
    }

    const isContinuation = endpoint.startsWith('http');
    const url = isContinuation ? endpoint : `${this.settings.baseUrl}/${endpoint}`;

    let response: AxiosResponse<T>;
    try {
      response = await this.http.get<T>(url, {
        headers: { Authorization: `Bearer ${accessToken}` },
        params: isContinuation ? undefined : params,
        timeout: this.settings.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new TransportError('Microsoft Graph', axios.isAxiosError(error) ? error.code : undefined);
    }

    if (response.status === 401) {
      throw new ReauthNeededError();
    }
    if (response.status >= 400) {
      throw new UpstreamError(response.status);
    }

    return response.data;
  }

  /**
   * Fetch a collection, following @odata.nextLink until `maxCount` items are collected.
   * Any page failure propagates; the result never exceeds `maxCount`.
   */
  async getPaginated<T>(endpoint: string, maxCount: number, params: QueryParams = {}): Promise<T[]> {
    const items: T[] = [];
    let currentEndpoint = endpoint;
    let currentParams = params;

    while (items.length < maxCount) {
      const page = await this.get<GraphCollection<T>>(currentEndpoint, currentParams);
      items.push(...(page.value ?? []));

      const nextLink = page['@odata.nextLink'];
      if (!nextLink || items.length >= maxCount) {
        break;
      }

      currentEndpoint = nextLink;
      currentParams = {}; // nextLink carries the original query
    }

    return items.slice(0, maxCount);
  }
}
