/**
 * ContentSegmenter splits sanitized newsletter HTML into heading-attributed blocks
 */

import * as cheerio from 'cheerio';
import { AnyNode, Element, hasChildren, isTag, isText } from 'domhandler';
import { ContentBlock } from '../../types/models';
import { normalizeText, resolveTrackingUrl } from './text';

export interface SegmenterOptions {
  blockSelector?: string;
  headingSelector?: string;
}

interface BlockCandidate {
  element: Element;
  heading?: Element;
}

export class ContentSegmenter {
  private readonly blockSelector: string;
  private readonly headingSelector: string;

  constructor(options: SegmenterOptions = {}) {
    // Newsletter builders wrap each paragraph in a container with this class
    this.blockSelector = options.blockSelector || 'div.text-block';
    this.headingSelector = options.headingSelector || 'h1';
  }

  /**
   * Splits sanitized HTML into content blocks in document order
   * @param sanitizedHtml - Output of HtmlSanitizer.sanitize
   * @param subject - Subject of the owning message
   * @param sender - Sender of the owning message
   */
  segment(sanitizedHtml: string, subject: string, sender: string): ContentBlock[] {
    const $ = cheerio.load(sanitizedHtml);
    const blocks: ContentBlock[] = [];

    for (const candidate of this.findBlocks($)) {
      const block = $(candidate.element);

      // A heading's own container is not body content
      if (block.find(this.headingSelector).length > 0) {
        continue;
      }

      const content = normalizeText(this.collectText(candidate.element));
      if (content.length <= 1) {
        continue;
      }

      const links: string[] = [];
      block.find('a[href]').each((_, anchor) => {
        const url = resolveTrackingUrl($(anchor).attr('href') ?? '');
        if (url && !links.includes(url)) {
          links.push(url);
        }
      });

      blocks.push({
        sender,
        subject,
        ...(candidate.heading ? { heading: normalizeText(this.collectText(candidate.heading)) } : {}),
        content,
        links
      });
    }

    return blocks;
  }

  /**
   * Walks the document once in order, pairing each block with the most
   * recent heading seen before it
   */
  private findBlocks($: cheerio.CheerioAPI): BlockCandidate[] {
    const blockElements = new Set($(this.blockSelector).toArray());
    const headingElements = new Set($(this.headingSelector).toArray());
    const candidates: BlockCandidate[] = [];
    let lastHeading: Element | undefined;

    const visit = (nodes: AnyNode[]): void => {
      for (const node of nodes) {
        if (!isTag(node)) continue;

        if (blockElements.has(node)) {
          candidates.push({ element: node, heading: lastHeading });
        }
        if (headingElements.has(node)) {
          lastHeading = node;
        }
        visit(node.children);
      }
    };

    visit($.root().contents().toArray());
    return candidates;
  }

  /**
   * Joins the trimmed text runs under a node with single spaces
   */
  private collectText(node: AnyNode): string {
    const runs: string[] = [];

    const visit = (current: AnyNode): void => {
      if (isText(current)) {
        const run = current.data.trim();
        if (run) runs.push(run);
      } else if (hasChildren(current)) {
        current.children.forEach(visit);
      }
    };

    visit(node);
    return runs.join(' ');
  }
}
