import type { AppConfig } from '../../config';
import { ValidationError } from '../../errors/mailbox.errors';
import type { GraphMessage, SearchStrategy } from '../../types/mail.types';
import type { FolderResolver } from '../graph/folder-resolver.service';
import type { GraphClient } from '../graph/graph-client.service';
import type { EmailSearchService } from './email-search.service';
import { formatDetail, formatList } from './email-formatter.service';

const MAX_COUNT = 50;

export interface SearchEmailsInput {
  query?: string;
  subject?: string;
  from?: string;
  hasAttachments?: boolean;
  unreadOnly?: boolean;
  folder?: string;
  count?: number;
}

export interface EmailListResult {
  emails: GraphMessage[];
  text: string;
}

export interface EmailSearchOutput extends EmailListResult {
  strategy: SearchStrategy;
}

export interface EmailDetailResult {
  email: GraphMessage;
  text: string;
}

export function clampCount(count: number | undefined): number {
  return Math.min(MAX_COUNT, Math.max(1, Math.trunc(count ?? 10)));
}

/**
 * Read-only mailbox operations for the user bound to the current request
 */
export class MailboxService {
  constructor(
    private readonly graph: GraphClient,
    private readonly folders: FolderResolver,
    private readonly searchService: EmailSearchService,
    private readonly fields: Pick<AppConfig['graph'], 'emailListFields' | 'emailDetailFields'>
  ) {}

  async listEmails(folder = 'inbox', count?: number): Promise<EmailListResult> {
    const maxCount = clampCount(count);
    const endpoint = await this.folders.resolve(folder);

    const emails = await this.graph.getPaginated<GraphMessage>(endpoint, maxCount, {
      $top: maxCount,
      $orderby: 'receivedDateTime desc',
      $select: this.fields.emailListFields,
    });

    const text =
      emails.length === 0 ? `No emails found in ${folder}.` : formatList(emails, `Found ${emails.length} emails in ${folder}:`);

    return { emails, text };
  }

  async searchEmails(input: SearchEmailsInput): Promise<EmailSearchOutput> {
    const maxCount = clampCount(input.count);
    const folderEndpoint = await this.folders.resolve(input.folder ?? 'inbox');

    const { items, strategy } = await this.searchService.search({
      query: input.query,
      subject: input.subject,
      from: input.from,
      hasAttachments: input.hasAttachments,
      unreadOnly: input.unreadOnly,
      folderEndpoint,
      maxCount,
    });

    const text =
      items.length === 0
        ? 'No emails found matching your search criteria.'
        : formatList(items, `Found ${items.length} emails (via ${strategy}):`);

    return { emails: items, strategy, text };
  }

  async readEmail(emailId: string): Promise<EmailDetailResult> {
    const id = emailId.trim();
    if (!id) {
      throw new ValidationError('Email ID is required.');
    }

    const email = await this.graph.get<GraphMessage>(`me/messages/${encodeURIComponent(id)}`, {
      $select: this.fields.emailDetailFields,
    });

    return { email, text: formatDetail(email) };
  }
}
