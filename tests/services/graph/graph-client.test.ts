import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config';
import {
  AuthMissingError,
  ReauthNeededError,
  TransportError,
  UpstreamError,
} from '../../../src/errors/mailbox.errors';
import { GraphClient } from '../../../src/services/graph/graph-client.service';
import { RequestContext } from '../../../src/utils/request-context';
import { createFakeHttp, networkFailure, type FakeHandler } from '../../helpers/fake-http';

const graphSettings = loadConfig({}).graph;
const BASE = 'https://graph.microsoft.com/v1.0';

function setup(handler: FakeHandler) {
  const context = new RequestContext();
  const { http, requests } = createFakeHttp(handler);
  const client = new GraphClient(graphSettings, context, http);
  const asUser = <T>(fn: () => Promise<T>) => context.run({ userId: 'user-1', accessToken: 'test-access-token' }, fn);
  return { client, requests, asUser };
}

/**
 * Mailbox of `total` numbered items served `pageSize` at a time with nextLink continuation
 */
function pagedSource(total: number, pageSize: number, withNextLink = true): FakeHandler {
  return (request) => {
    const url = request.url ?? '';
    const skip = url.includes('$skip=') ? Number(url.split('$skip=')[1]) : 0;
    const value = Array.from({ length: Math.min(pageSize, total - skip) }, (_, index) => ({ id: `msg-${skip + index + 1}` }));
    const next = skip + pageSize;
    return {
      status: 200,
      data: {
        value,
        ...(withNextLink && next < total ? { '@odata.nextLink': `${BASE}/me/messages?$skip=${next}` } : {}),
      },
    };
  };
}

describe('GraphClient', () => {
  describe('get', () => {
    it('should fail with AuthMissingError when no token is bound', async () => {
      const { client, requests } = setup(() => ({ status: 200, data: {} }));

      await expect(client.get('me/messages')).rejects.toBeInstanceOf(AuthMissingError);
      expect(requests).toHaveLength(0);
    });

    it('should send the bound token and query parameters for a relative path', async () => {
      const { client, requests, asUser } = setup(() => ({ status: 200, data: { id: 'msg-1' } }));

      const result = await asUser(() => client.get<{ id: string }>('me/messages/msg-1', { $select: 'id,subject' }));

      expect(result).toEqual({ id: 'msg-1' });
      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe(`${BASE}/me/messages/msg-1`);
      expect(requests[0].params).toEqual({ $select: 'id,subject' });
      expect(requests[0].headers.Authorization).toBe('Bearer test-access-token');
      expect(requests[0].timeout).toBe(30_000);
    });

    it('should use a continuation URL verbatim and ignore parameters', async () => {
      const { client, requests, asUser } = setup(() => ({ status: 200, data: { value: [] } }));
      const nextLink = `${BASE}/me/messages?$skip=10&$top=10`;

      await asUser(() => client.get(nextLink, { $top: 99 }));

      expect(requests[0].url).toBe(nextLink);
      expect(requests[0].params).toBeUndefined();
    });

    it('should map 401 to ReauthNeededError', async () => {
      const { client, asUser } = setup(() => ({ status: 401, data: { error: { code: 'InvalidAuthenticationToken' } } }));

      await expect(asUser(() => client.get('me/messages'))).rejects.toBeInstanceOf(ReauthNeededError);
    });

    it('should map other error statuses to UpstreamError with the status', async () => {
      const { client, asUser } = setup(() => ({ status: 429 }));

      const error = await asUser(() => client.get('me/messages')).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error instanceof UpstreamError && error.upstreamStatus).toBe(429);
    });

    it('should map network failures to TransportError', async () => {
      const { client, asUser } = setup((request) => networkFailure(request, 'ETIMEDOUT'));

      const error = await asUser(() => client.get('me/messages')).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof TransportError && error.message).toBe('Could not reach Microsoft Graph (ETIMEDOUT)');
    });
  });

  describe('getPaginated', () => {
    it('should stop at maxCount and not request further pages', async () => {
      const { client, requests, asUser } = setup(pagedSource(100, 10));

      const items = await asUser(() => client.getPaginated<{ id: string }>('me/messages', 25, { $top: 10 }));

      expect(items).toHaveLength(25);
      expect(items[0].id).toBe('msg-1');
      expect(items[24].id).toBe('msg-25');
      expect(requests).toHaveLength(3);
    });

    it('should clear parameters on continuation requests', async () => {
      const { client, requests, asUser } = setup(pagedSource(100, 10));

      await asUser(() => client.getPaginated('me/messages', 15, { $top: 10, $orderby: 'receivedDateTime desc' }));

      expect(requests[0].params).toEqual({ $top: 10, $orderby: 'receivedDateTime desc' });
      expect(requests[1].url).toBe(`${BASE}/me/messages?$skip=10`);
      expect(requests[1].params).toBeUndefined();
    });

    it('should return only the first page when there is no continuation link', async () => {
      const { client, requests, asUser } = setup(pagedSource(7, 10, false));

      const items = await asUser(() => client.getPaginated('me/messages', 25));

      expect(items).toHaveLength(7);
      expect(requests).toHaveLength(1);
    });

    it('should stop when the source runs out before maxCount', async () => {
      const { client, requests, asUser } = setup(pagedSource(12, 10));

      const items = await asUser(() => client.getPaginated('me/messages', 50));

      expect(items).toHaveLength(12);
      expect(requests).toHaveLength(2);
    });

    it('should treat a missing value array as an empty page', async () => {
      const { client, asUser } = setup(() => ({ status: 200, data: {} }));

      await expect(asUser(() => client.getPaginated('me/messages', 10))).resolves.toEqual([]);
    });

    it('should propagate a failure on a later page instead of returning partial results', async () => {
      let calls = 0;
      const { client, asUser } = setup(() => {
        calls += 1;
        if (calls === 2) return { status: 503 };
        return {
          status: 200,
          data: { value: [{ id: 'msg-1' }], '@odata.nextLink': `${BASE}/me/messages?$skip=1` },
        };
      });

      await expect(asUser(() => client.getPaginated('me/messages', 10))).rejects.toBeInstanceOf(UpstreamError);
    });
  });
});
