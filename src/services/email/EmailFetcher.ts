/**
 * EmailFetcher class for retrieving newsletter messages via Gmail API
 */

import { gmail_v1 } from 'googleapis';
import { NewsletterSource } from '../../types/models';
import { normalizeNewerThan } from '../../models/validation';

export interface RawEmailData {
  id: string;
  threadId: string;
  labelIds: string[];
  snippet: string;
  payload: gmail_v1.Schema$MessagePart;
  internalDate: string;
  historyId: string;
  sizeEstimate: number;
}

// Gmail caps a single list page at this many ids
const MAX_PAGE_SIZE = 100;

/**
 * Builds a Gmail search query for one newsletter, e.g.
 * in:inbox from:"dan@tldrnewsletter.com" from:"TLDR AI" newer_than:2d
 *
 * See https://support.google.com/mail/answer/7190 for the operators.
 */
export function buildNewsletterQuery(source: NewsletterSource, newerThan: string | number): string {
  return `in:inbox from:"${source.email}" from:"${source.name}" newer_than:${normalizeNewerThan(newerThan)}`;
}

export class EmailFetcher {
  private rateLimiter: RateLimiter;

  constructor(private readonly gmail: gmail_v1.Gmail) {
    this.rateLimiter = new RateLimiter();
  }

  /**
   * Lists message IDs matching a query, following pages until the cap is reached
   * @param query - Gmail search query
   * @param maxResults - Maximum number of IDs to return
   * @returns Message IDs in the order Gmail returns them
   */
  async listMessageIds(query: string, maxResults: number = 100): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      await this.rateLimiter.waitForSlot();

      try {
        const response = await this.gmail.users.messages.list({
          userId: 'me',
          q: query,
          maxResults: Math.min(maxResults, MAX_PAGE_SIZE),
          pageToken
        });

        for (const message of response.data.messages || []) {
          if (!message.id) continue;
          ids.push(message.id);
          if (ids.length >= maxResults) {
            return ids;
          }
        }

        pageToken = response.data.nextPageToken || undefined;
      } catch (error) {
        this.handleApiError(error);
        throw error;
      }
    } while (pageToken);

    if (ids.length === 0) {
      console.log(`📭 No messages found for query: ${query}`);
    }

    return ids;
  }

  /**
   * Fetches full email data for a specific message ID
   * @param messageId - Gmail message ID
   * @returns Promise resolving to raw email data
   */
  async fetchEmailById(messageId: string): Promise<RawEmailData> {
    await this.rateLimiter.waitForSlot();

    try {
      const response = await this.gmail.users.messages.get({
        userId: 'me',
        id: messageId,
        format: 'full'
      });

      const message = response.data;
      if (!message.id || !message.payload) {
        throw new Error(`Invalid message data for ID: ${messageId}`);
      }

      return {
        id: message.id,
        threadId: message.threadId || '',
        labelIds: message.labelIds || [],
        snippet: message.snippet || '',
        payload: message.payload,
        internalDate: message.internalDate || '0',
        historyId: message.historyId || '',
        sizeEstimate: message.sizeEstimate || 0
      };
    } catch (error) {
      this.handleApiError(error);
      throw error;
    }
  }

  /**
   * Logs a hint for well-known Gmail API failures; retrying is left to the caller
   * @param error - Error from Gmail API
   */
  private handleApiError(error: unknown): void {
    const status = apiStatus(error);

    if (status === 429) {
      console.warn('Gmail API rate limit exceeded');
    } else if (status === 401) {
      console.warn('Gmail API authentication failed, tokens may need refresh');
    } else if (status !== undefined && status >= 500) {
      console.warn(`Gmail API server error (${status})`);
    }
  }
}

function apiStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const code = 'code' in error ? Number(error.code) : NaN;
  if (!Number.isNaN(code)) {
    return code;
  }
  const status = 'status' in error ? Number(error.status) : NaN;
  return Number.isNaN(status) ? undefined : status;
}

/**
 * Rate limiter to respect Gmail API quotas
 */
export class RateLimiter {
  private requests: number[] = [];

  constructor(
    private readonly maxRequestsPerSecond = 10, // Conservative limit
    private readonly windowMs = 1000
  ) {}

  async waitForSlot(): Promise<void> {
    const now = Date.now();

    // Remove requests older than the window
    this.requests = this.requests.filter(time => now - time < this.windowMs);

    // If we're at the limit, wait
    if (this.requests.length >= this.maxRequestsPerSecond) {
      const oldestRequest = Math.min(...this.requests);
      const waitTime = this.windowMs - (now - oldestRequest) + 10; // Add small buffer

      if (waitTime > 0) {
        await new Promise(resolve => setTimeout(resolve, waitTime));
        return this.waitForSlot(); // Recursive call after waiting
      }
    }

    // Record this request
    this.requests.push(now);
  }
}
