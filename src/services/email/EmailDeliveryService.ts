import { gmail_v1 } from 'googleapis';
import MailComposer from 'nodemailer/lib/mail-composer';
import { ScoredBlock } from '../../types/models';

export interface OutgoingEmail {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/**
 * Formats the digest body: the summary followed by where each kept block came from
 */
export function formatDigestText(summary: string, kept: readonly ScoredBlock[]): string {
  const sources = kept.map(({ block, bestInterest, bestScore }) => {
    const title = block.heading || block.subject;
    const lines = [`• ${title} (${block.sender}) [${bestInterest} ${(bestScore * 100).toFixed(0)}%]`];
    for (const link of block.links) {
      lines.push(`  ${link}`);
    }
    return lines.join('\n');
  });

  if (sources.length === 0) {
    return summary.trim();
  }

  return `${summary.trim()}\n\n---\nSources\n\n${sources.join('\n')}\n`;
}

export class EmailDeliveryService {
  constructor(private readonly gmail: gmail_v1.Gmail) {}

  /**
   * Builds an RFC 822 message and encodes it as base64url, the form Gmail's send endpoint takes
   */
  async composeRawMessage(email: OutgoingEmail): Promise<string> {
    const composer = new MailComposer({
      from: email.from,
      to: email.to,
      subject: email.subject,
      text: email.text
    });

    const message = await new Promise<Buffer>((resolve, reject) => {
      composer.compile().build((error, built) => {
        if (error) reject(error);
        else resolve(built);
      });
    });

    return message.toString('base64url');
  }

  /**
   * Sends an email from the authenticated mailbox
   * @returns Gmail's ID for the sent message
   */
  async sendEmail(email: OutgoingEmail): Promise<string> {
    try {
      const raw = await this.composeRawMessage(email);
      const response = await this.gmail.users.messages.send({
        userId: 'me',
        requestBody: { raw }
      });

      const messageId = response.data.id;
      if (!messageId) {
        throw new Error('Gmail did not return an ID for the sent message');
      }

      console.log(`✉️  Digest email sent to ${email.to} (Message ID: ${messageId})`);
      return messageId;
    } catch (error) {
      console.error(`❌ Failed to send digest email to ${email.to}:`, error);
      throw error;
    }
  }
}
