import { v4 as uuidv4 } from 'uuid';
import { ContentBlock, DigestConfig, DigestRunReport } from '../../types/models';
import { EmailDeliveryService, EmailFetcher, EmailParser, buildNewsletterQuery, formatDigestText } from '../email';
import { HtmlSanitizer } from '../extraction/HtmlSanitizer';
import { ContentSegmenter } from '../extraction/ContentSegmenter';
import { RelevanceScorer } from '../ml/RelevanceScorer';
import { filterScoredBlocks } from '../ml/BlockSelector';
import { EmailSummaryService } from '../ml/EmailSummaryService';
import { VectorEmbeddingService } from '../embedding/VectorEmbeddingService';
import { createGmailClient } from '../auth';

export interface DigestDependencies {
  fetcher: Pick<EmailFetcher, 'listMessageIds' | 'fetchEmailById'>;
  parser: EmailParser;
  sanitizer: HtmlSanitizer;
  segmenter: ContentSegmenter;
  scorer: RelevanceScorer;
  summaryService: Pick<EmailSummaryService, 'generateSummary'>;
  deliveryService: Pick<EmailDeliveryService, 'sendEmail'>;
}

export interface DigestRunOptions {
  dryRun?: boolean; // Score and select, but neither summarise nor send
}

type ExtractionOutcome =
  | { status: 'processed'; blocks: ContentBlock[] }
  | { status: 'skipped' }
  | { status: 'failed' };

/**
 * Runs the newsletter digest once over the current mailbox snapshot:
 * list → fetch → sanitize → segment → score → select → summarise → send
 */
export class DigestService {
  constructor(
    private readonly config: DigestConfig,
    private readonly deps: DigestDependencies
  ) {}

  /**
   * Collects message IDs for every configured newsletter, without duplicates
   */
  async collectMessageIds(): Promise<string[]> {
    const ids: string[] = [];

    for (const newsletter of this.config.newsletters) {
      const query = buildNewsletterQuery(newsletter, this.config.newerThan);
      console.log(`📬 Querying ${newsletter.name}: ${query}`);

      const found = await this.deps.fetcher.listMessageIds(query, this.config.maxResults);
      for (const id of found) {
        if (!ids.includes(id)) ids.push(id);
      }
    }

    return ids;
  }

  /**
   * Extracts the content blocks of one message. Failures stay inside this
   * message so the rest of the batch still runs.
   */
  async extractBlocks(messageId: string): Promise<ExtractionOutcome> {
    try {
      const raw = await this.deps.fetcher.fetchEmailById(messageId);
      const document = this.deps.parser.toRawDocument(raw);

      if (!document) {
        console.warn(`Skipping message ${messageId}: no text/html part`);
        return { status: 'skipped' };
      }

      const cleaned = this.deps.sanitizer.sanitize(document.html);
      const blocks = this.deps.segmenter.segment(cleaned, document.subject, document.sender);
      console.log(`Extracted ${blocks.length} blocks from "${document.subject}" (${messageId})`);
      return { status: 'processed', blocks };
    } catch (error) {
      console.error(`❌ Failed to process message ${messageId}:`, error);
      return { status: 'failed' };
    }
  }

  async run(options: DigestRunOptions = {}): Promise<DigestRunReport> {
    const runId = uuidv4();
    console.log(`[DIGEST] Run ${runId} started${options.dryRun ? ' (dry run)' : ''}`);

    const messageIds = await this.collectMessageIds();
    const report: DigestRunReport = {
      runId,
      messagesListed: messageIds.length,
      messagesProcessed: 0,
      messagesSkipped: 0,
      messagesFailed: 0,
      blocksProduced: 0,
      blocksKept: 0,
      kept: []
    };

    const blocks: ContentBlock[] = [];
    for (const messageId of messageIds) {
      const outcome = await this.extractBlocks(messageId);
      if (outcome.status === 'processed') {
        report.messagesProcessed++;
        blocks.push(...outcome.blocks);
      } else if (outcome.status === 'skipped') {
        report.messagesSkipped++;
      } else {
        report.messagesFailed++;
      }
    }
    report.blocksProduced = blocks.length;

    console.log(`🧮 Scoring ${blocks.length} blocks against ${this.config.interests.length} interests`);
    const scored = await this.deps.scorer.score(blocks, this.config.interests);
    report.kept = filterScoredBlocks(scored, this.config.threshold);
    report.blocksKept = report.kept.length;
    console.log(`🧮 Kept ${report.blocksKept}/${report.blocksProduced} blocks at threshold ${this.config.threshold}`);

    if (options.dryRun) {
      console.log(`[DIGEST] Run ${runId} finished (dry run)`);
      return report;
    }

    if (report.kept.length === 0) {
      console.warn(`[DIGEST] Run ${runId}: no block reached the threshold, nothing to send`);
      return report;
    }

    report.summary = await this.deps.summaryService.generateSummary(report.kept.map(item => item.block.content));
    report.sentMessageId = await this.deps.deliveryService.sendEmail({
      from: this.config.emailFrom,
      to: this.config.emailTo,
      subject: this.config.subject,
      text: formatDigestText(report.summary, report.kept)
    });

    console.log(`✅ [DIGEST] Run ${runId} complete: ${report.blocksKept} blocks from ${report.messagesProcessed} messages`);
    return report;
  }
}

/**
 * Wires the digest run against Gmail and OpenAI. The Gmail client and the
 * embedding service are created once here and shared by the whole run.
 */
export async function createDigestService(config: DigestConfig): Promise<DigestService> {
  const gmail = await createGmailClient(config.google);

  return new DigestService(config, {
    fetcher: new EmailFetcher(gmail),
    parser: new EmailParser(),
    sanitizer: new HtmlSanitizer(),
    segmenter: new ContentSegmenter(),
    scorer: new RelevanceScorer(
      () => new VectorEmbeddingService(config.openai.apiKey, config.openai.embeddingModel),
      config.scorer
    ),
    summaryService: new EmailSummaryService(config.openai.apiKey, config.openai.summaryModel),
    deliveryService: new EmailDeliveryService(gmail)
  });
}
