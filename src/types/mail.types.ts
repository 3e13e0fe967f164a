export interface GraphEmailAddress {
  name?: string;
  address?: string;
}

export interface GraphRecipient {
  emailAddress?: GraphEmailAddress;
}

export interface GraphItemBody {
  contentType?: 'text' | 'html';
  content?: string;
}

/**
 * Message resource as projected by $select
 */
export interface GraphMessage {
  id: string;
  subject?: string | null;
  from?: GraphRecipient | null;
  toRecipients?: GraphRecipient[];
  ccRecipients?: GraphRecipient[];
  bccRecipients?: GraphRecipient[];
  receivedDateTime?: string;
  bodyPreview?: string;
  body?: GraphItemBody;
  hasAttachments?: boolean;
  importance?: string;
  isRead?: boolean;
}

export interface GraphMailFolder {
  id: string;
  displayName?: string;
}

/**
 * Collection envelope; @odata.nextLink is present while more pages exist
 */
export interface GraphCollection<T> {
  value?: T[];
  '@odata.nextLink'?: string;
}

export type QueryParams = Record<string, string | number>;

export interface EmailSearchCriteria {
  query?: string;
  subject?: string;
  from?: string;
  hasAttachments?: boolean;
  unreadOnly?: boolean;
  folderEndpoint: string;
  maxCount: number;
}

export type SearchStrategy =
  | 'combined search'
  | 'subject search'
  | 'from search'
  | 'query search'
  | 'recent emails fallback';

export interface EmailSearchResult {
  items: GraphMessage[];
  strategy: SearchStrategy;
}
