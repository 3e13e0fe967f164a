import type {
  EmailSearchCriteria,
  EmailSearchResult,
  GraphMessage,
  QueryParams,
  SearchStrategy,
} from '../../types/mail.types';
import type { GraphClient } from '../graph/graph-client.service';

const MAX_PAGE_SIZE = 50;

type TierOutcome =
  | { kind: 'found'; items: GraphMessage[] }
  | { kind: 'empty' }
  | { kind: 'failed'; error: unknown };

interface SearchTier {
  strategy: SearchStrategy;
  search?: string;
  filter?: string;
}

// Individual fallback order: most selective first
const INDIVIDUAL_TERMS = [
  { key: 'subject', strategy: 'subject search' },
  { key: 'from', strategy: 'from search' },
  { key: 'query', strategy: 'query search' },
] as const;

/**
 * KQL term for one criterion; quotes inside the value would end the phrase early
 */
export function quoteTerm(key: 'query' | 'subject' | 'from', value: string): string {
  const phrase = `"${value.replace(/"/g, '')}"`;
  return key === 'query' ? phrase : `${key}:${phrase}`;
}

export function buildSearchExpression(criteria: Pick<EmailSearchCriteria, 'query' | 'subject' | 'from'>): string | undefined {
  const terms: string[] = [];
  if (criteria.query) terms.push(quoteTerm('query', criteria.query));
  if (criteria.subject) terms.push(quoteTerm('subject', criteria.subject));
  if (criteria.from) terms.push(quoteTerm('from', criteria.from));
  return terms.length > 0 ? terms.join(' AND ') : undefined;
}

export function buildFilterExpression(
  criteria: Pick<EmailSearchCriteria, 'hasAttachments' | 'unreadOnly'>
): string | undefined {
  const filters: string[] = [];
  if (criteria.hasAttachments === true) filters.push('hasAttachments eq true');
  if (criteria.unreadOnly === true) filters.push('isRead eq false');
  return filters.length > 0 ? filters.join(' and ') : undefined;
}

/**
 * Progressive mailbox search.
 *
 * 1. combined: every term plus the boolean filters in one request
 * 2. individual: subject, then from, then query, each on its own
 * 3. recent emails: unfiltered, newest first
 *
 * The first tier with results wins. Failures in tiers 1-2 fall through; a failure in the last
 * tier goes to the caller.
 */
export class EmailSearchService {
  constructor(
    private readonly graph: GraphClient,
    private readonly listFields: string
  ) {}

  async search(criteria: EmailSearchCriteria): Promise<EmailSearchResult> {
    for (const tier of this.planTiers(criteria)) {
      const outcome = await this.attempt(tier, criteria);

      switch (outcome.kind) {
        case 'found':
          return { items: outcome.items, strategy: tier.strategy };
        case 'failed':
          console.warn(`${capitalize(tier.strategy)} failed: ${errorMessage(outcome.error)}`);
          break;
        case 'empty':
          break;
      }
    }

    const items = await this.fetch(criteria, {});
    return { items, strategy: 'recent emails fallback' };
  }

  private planTiers(criteria: EmailSearchCriteria): SearchTier[] {
    // Runs even with no terms or filters, in which case it is the plain recent-mail request
    const tiers: SearchTier[] = [
      { strategy: 'combined search', search: buildSearchExpression(criteria), filter: buildFilterExpression(criteria) },
    ];

    for (const { key, strategy } of INDIVIDUAL_TERMS) {
      const value = criteria[key];
      if (value) {
        tiers.push({ strategy, search: quoteTerm(key, value) });
      }
    }

    return tiers;
  }

  private async attempt(tier: SearchTier, criteria: EmailSearchCriteria): Promise<TierOutcome> {
    try {
      const items = await this.fetch(criteria, tier);
      return items.length > 0 ? { kind: 'found', items } : { kind: 'empty' };
    } catch (error) {
      return { kind: 'failed', error };
    }
  }

  private fetch(criteria: EmailSearchCriteria, expressions: { search?: string; filter?: string }): Promise<GraphMessage[]> {
    const params: QueryParams = {
      $top: Math.min(MAX_PAGE_SIZE, criteria.maxCount),
      $orderby: 'receivedDateTime desc',
      $select: this.listFields,
    };
    if (expressions.search) params.$search = expressions.search;
    if (expressions.filter) params.$filter = expressions.filter;

    return this.graph.getPaginated<GraphMessage>(criteria.folderEndpoint, criteria.maxCount, params);
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
