import { z } from 'zod';
import type { EntityKind } from '@deckhand/state-core';
import { TransportError } from './errors';
import type { CredentialsProvider, ResyncPort } from './types';

export type HttpResyncClientOptions = Readonly<{
  baseUrl: string;
  fetchImpl?: typeof fetch;
  credentials?: CredentialsProvider;
  pageSize?: number;
}>;

const resyncPageSchema = z.object({
  envelopes: z.array(z.unknown()),
  hasMore: z.boolean(),
  nextSince: z.number().int().nonnegative().nullable(),
});

type ResyncPage = z.infer<typeof resyncPageSchema>;

const DEFAULT_PAGE_SIZE = 500;

const normalizeBaseUrl = (baseUrl: string): string =>
  baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

const safeParseJson = async (response: Response): Promise<unknown> => {
  try {
    const parsed: unknown = await response.json();
    return parsed;
  } catch {
    return null;
  }
};

/**
 * Fetches everything newer than a revision for one kind, following
 * `nextSince` until the server reports no more pages.
 */
export class HttpResyncClient implements ResyncPort {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly credentials: CredentialsProvider;
  private readonly pageSize: number;

  constructor(options: HttpResyncClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.credentials = options.credentials ?? (() => Promise.resolve(null));
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async resync(
    kind: EntityKind,
    sinceRevision: number
  ): Promise<ReadonlyArray<unknown>> {
    const collected: unknown[] = [];
    let since = sinceRevision;
    let keepPulling = true;
    while (keepPulling) {
      const page = await this.fetchPage(kind, since);
      collected.push(...page.envelopes);
      if (page.hasMore && page.nextSince === null) {
        throw new TransportError('Resync response missing nextSince');
      }
      if (page.nextSince !== null) {
        if (page.hasMore && page.nextSince <= since) {
          throw new TransportError('Resync cursor did not advance');
        }
        since = page.nextSince;
      }
      keepPulling = page.hasMore;
    }
    return collected;
  }

  private async fetchPage(kind: EntityKind, since: number): Promise<ResyncPage> {
    const query = new URLSearchParams({
      kind,
      since: String(since),
      limit: String(this.pageSize),
    });
    const token = await this.credentials();
    const headers: Record<string, string> = token
      ? { authorization: `Bearer ${token}` }
      : {};
    let response: Response;
    try {
      response = await this.fetchImpl(
        `${this.baseUrl}/sync/resync?${query.toString()}`,
        { headers }
      );
    } catch (error) {
      throw new TransportError('Resync request failed', { cause: error });
    }
    if (!response.ok) {
      throw new TransportError(
        `Resync failed with status ${response.status}`
      );
    }
    const body = await safeParseJson(response);
    const parsed = resyncPageSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError('Invalid resync response');
    }
    return parsed.data;
  }
}
