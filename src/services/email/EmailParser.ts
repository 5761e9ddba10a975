/**
 * EmailParser to extract newsletter HTML and provenance from Gmail message format
 */

import { gmail_v1 } from 'googleapis';
import { RawDocument } from '../../types/models';
import { RawEmailData } from './EmailFetcher';

export class EmailParser {
  /**
   * Converts a Gmail message into the document the extraction pipeline reads
   * @param rawEmail - Raw email data from Gmail API
   * @returns The document, or null when the message has no text/html part
   */
  toRawDocument(rawEmail: RawEmailData): RawDocument | null {
    const headers = rawEmail.payload.headers || [];
    const html = this.extractHtml(rawEmail.payload);

    // Plain-text-only newsletters are not supported yet
    if (html === undefined) {
      return null;
    }

    return {
      messageId: rawEmail.id,
      html,
      subject: this.getHeader(headers, 'Subject', '(no subject)'),
      sender: this.getHeader(headers, 'From', '')
    };
  }

  /**
   * Gets header value by name (case-insensitive)
   * @param headers - Message headers
   * @param name - Header name
   * @param fallback - Value when the header is missing
   */
  getHeader(headers: gmail_v1.Schema$MessagePartHeader[], name: string, fallback: string = ''): string {
    const wanted = name.toLowerCase();
    const header = headers.find(h => (h.name || '').toLowerCase() === wanted);
    return header?.value ?? fallback;
  }

  /**
   * Finds the first text/html part, depth-first, and decodes it
   * @param part - Gmail message part
   * @returns Trimmed HTML, or undefined if no part carries HTML
   */
  extractHtml(part: gmail_v1.Schema$MessagePart): string | undefined {
    if (part.mimeType === 'text/html' && part.body?.data) {
      return this.decodeBase64Url(part.body.data).trim();
    }

    for (const child of part.parts || []) {
      const html = this.extractHtml(child);
      if (html !== undefined) {
        return html;
      }
    }

    return undefined;
  }

  /**
   * Decodes base64url encoded data
   * @throws Error when the data is not valid base64url
   */
  private decodeBase64Url(data: string): string {
    // Convert base64url to base64
    const base64 = data.replace(/-/g, '+').replace(/_/g, '/');
    // Add padding if needed
    const padded = base64 + '='.repeat((4 - base64.length % 4) % 4);

    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(padded)) {
      throw new Error('Invalid base64url data in message body');
    }

    return Buffer.from(padded, 'base64').toString('utf-8');
  }
}
