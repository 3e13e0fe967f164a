import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config';
import { ValidationError } from '../../../src/errors/mailbox.errors';
import { EmailSearchService } from '../../../src/services/email/email-search.service';
import { MailboxService, clampCount } from '../../../src/services/email/mailbox.service';
import { FolderResolver } from '../../../src/services/graph/folder-resolver.service';
import { GraphClient } from '../../../src/services/graph/graph-client.service';
import { RequestContext } from '../../../src/utils/request-context';
import { createFakeHttp, type FakeHandler } from '../../helpers/fake-http';

const graphSettings = loadConfig({}).graph;

function setup(handler: FakeHandler) {
  const context = new RequestContext();
  const { http, requests } = createFakeHttp(handler);
  const graph = new GraphClient(graphSettings, context, http);
  const mailbox = new MailboxService(
    graph,
    new FolderResolver(graph),
    new EmailSearchService(graph, graphSettings.emailListFields),
    graphSettings
  );
  const asUser = <T>(fn: () => Promise<T>) => context.run({ userId: 'user-1', accessToken: 'test-access-token' }, fn);
  return { mailbox, requests, asUser };
}

describe('clampCount', () => {
  it('should keep counts between 1 and 50 with a default of 10', () => {
    expect(clampCount(undefined)).toBe(10);
    expect(clampCount(0)).toBe(1);
    expect(clampCount(-5)).toBe(1);
    expect(clampCount(75)).toBe(50);
    expect(clampCount(12.9)).toBe(12);
  });
});

describe('MailboxService', () => {
  it('should list the newest emails of a well-known folder', async () => {
    const { mailbox, requests, asUser } = setup(() => ({
      status: 200,
      data: {
        value: [
          {
            id: 'msg-1',
            subject: 'Hello',
            from: { emailAddress: { address: 'ana@example.com' } },
            receivedDateTime: '2026-03-01T09:00:00Z',
            isRead: true,
          },
        ],
      },
    }));

    const result = await asUser(() => mailbox.listEmails('sent', 5));

    expect(requests[0].url).toBe('https://graph.microsoft.com/v1.0/me/mailFolders/sentItems/messages');
    expect(requests[0].params).toEqual({
      $top: 5,
      $orderby: 'receivedDateTime desc',
      $select: graphSettings.emailListFields,
    });
    expect(result.text).toBe(
      'Found 1 emails in sent:\n\n1. 2026-03-01 09:00:00 - From: ana@example.com\n   Subject: Hello\n   ID: msg-1\n'
    );
  });

  it('should report an empty folder', async () => {
    const { mailbox, asUser } = setup(() => ({ status: 200, data: { value: [] } }));

    const result = await asUser(() => mailbox.listEmails('inbox'));

    expect(result).toEqual({ emails: [], text: 'No emails found in inbox.' });
  });

  it('should label search output with the winning strategy', async () => {
    const { mailbox, asUser } = setup(() => ({
      status: 200,
      data: { value: [{ id: 'msg-5', subject: 'Invoice', receivedDateTime: '2026-03-02T10:00:00Z', isRead: false }] },
    }));

    const result = await asUser(() => mailbox.searchEmails({ query: 'invoice', count: 3 }));

    expect(result.strategy).toBe('combined search');
    expect(result.text.split('\n')[0]).toBe('Found 1 emails (via combined search):');
    expect(result.text).toContain('1. [UNREAD] 2026-03-02 10:00:00 - From: Unknown');
  });

  it('should report when the search finds nothing at all', async () => {
    const { mailbox, asUser } = setup(() => ({ status: 200, data: { value: [] } }));

    const result = await asUser(() => mailbox.searchEmails({ subject: 'nothing' }));

    expect(result.strategy).toBe('recent emails fallback');
    expect(result.text).toBe('No emails found matching your search criteria.');
  });

  it('should read one email with the detail projection', async () => {
    const { mailbox, requests, asUser } = setup(() => ({
      status: 200,
      data: { id: 'AAMk/1=', subject: 'Plan', body: { contentType: 'text', content: 'Body text' } },
    }));

    const result = await asUser(() => mailbox.readEmail('AAMk/1='));

    expect(requests[0].url).toBe('https://graph.microsoft.com/v1.0/me/messages/AAMk%2F1%3D');
    expect(requests[0].params).toEqual({ $select: graphSettings.emailDetailFields });
    expect(result.text.split('\n').at(-1)).toBe('Body text');
  });

  it('should reject an empty email id before calling Graph', async () => {
    const { mailbox, requests, asUser } = setup(() => ({ status: 200 }));

    await expect(asUser(() => mailbox.readEmail('  '))).rejects.toBeInstanceOf(ValidationError);
    expect(requests).toHaveLength(0);
  });
});
