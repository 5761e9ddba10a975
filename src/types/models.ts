/**
 * Core data models for the newsletter digest pipeline
 */

export interface RawDocument {
  readonly messageId: string;
  readonly html: string;
  readonly subject: string;
  readonly sender: string;
}

export interface ContentBlock {
  readonly sender: string;
  readonly subject: string;
  readonly heading?: string; // Nearest heading before the block in document order
  readonly content: string; // Normalized plain text, always longer than one character
  readonly links: readonly string[]; // Resolved destinations, insertion order, no duplicates
}

export interface ScoredBlock {
  readonly block: ContentBlock;
  readonly scores: Readonly<Record<string, number>>; // interest -> cosine similarity (4 dp)
  readonly bestInterest: string;
  readonly bestScore: number;
}

export interface NewsletterSource {
  email: string;
  name: string;
}

export interface ScorerOptions {
  includeHeading: boolean;
  batchSize: number;
}

export interface DigestConfig {
  newsletters: NewsletterSource[];
  newerThan: string;
  interests: string[];
  threshold: number;
  scorer: ScorerOptions;
  maxResults: number;
  subject: string;
  schedule?: string;
  emailFrom: string;
  emailTo: string;
  openai: {
    apiKey: string;
    embeddingModel: string;
    summaryModel: string;
  };
  google: {
    credentialsPath: string;
    tokenPath: string;
  };
}

export interface DigestRunReport {
  runId: string;
  messagesListed: number;
  messagesProcessed: number;
  messagesSkipped: number; // No text/html part
  messagesFailed: number;
  blocksProduced: number;
  blocksKept: number;
  kept: ScoredBlock[];
  summary?: string;
  sentMessageId?: string;
}
