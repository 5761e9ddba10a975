/**
 * HtmlSanitizer strips non-content markup from newsletter email HTML
 */

import * as cheerio from 'cheerio';
import { AnyNode, hasChildren, isComment, isText } from 'domhandler';

// Tracking pixels and preheaders hide behind these
const HIDDEN_ATTR_SELECTORS = ['[hidden]', '[aria-hidden="true"]'];
const HIDDEN_STYLE_HINTS = [
  'display:none',
  'visibility:hidden',
  'opacity:0',
  'max-height:0',
  'maxheight:0',
  'height:0',
  'width:0',
  'font-size:0',
  'line-height:0'
];

// Layout wrappers: drop the tag, keep the children
const UNWRAP_SELECTORS = ['table', 'thead', 'tbody', 'tr', 'td', 'th', 'br', 'strong'];

// Dropped along with everything inside them
const DROP_SELECTORS = ['style', 'script', 'meta', 'link', 'head', 'img'];

const ZERO_WIDTH_CHARS = /[\u200B-\u200D\uFEFF]/g;

// Unwrapping tables can leave nesting the parser never builds (<p> in <p>,
// <a> in <a>); re-cleaning until the output is stable settles it
const MAX_CLEAN_PASSES = 3;

/**
 * Checks an inline style for one of the hiding hints. Case and whitespace
 * are ignored, so "Display: None" matches.
 */
export function isHiddenInlineStyle(style: string | undefined): boolean {
  const compact = (style || '').toLowerCase().replace(/\s+/g, '');
  return HIDDEN_STYLE_HINTS.some(hint => compact.includes(hint));
}

export class HtmlSanitizer {
  /**
   * Sanitizes an email HTML document
   * @param html - Raw, possibly malformed, email HTML
   * @returns Inner HTML of the document body; empty string if nothing survives
   */
  sanitize(html: string): string {
    if (typeof html !== 'string' || html.length === 0) {
      return '';
    }

    try {
      let output = this.clean(html);
      for (let pass = 1; pass < MAX_CLEAN_PASSES; pass++) {
        const next = this.clean(output);
        if (next === output) break;
        output = next;
      }
      return output;
    } catch (error) {
      console.error('❌ Failed to sanitize email HTML:', error);
      return '';
    }
  }

  private clean(html: string): string {
    // parse5 under the hood, which recovers from broken markup the way browsers do
    const $ = cheerio.load(html);
    const roots = $.root().contents().toArray();

    $(this.collectNodes(roots, isComment)).remove();

    $(HIDDEN_ATTR_SELECTORS.join(', ')).remove();
    $('[style]')
      .filter((_, el) => isHiddenInlineStyle($(el).attr('style')))
      .remove();

    for (const node of this.collectNodes($.root().contents().toArray(), isText)) {
      if (!isText(node)) continue;
      const stripped = node.data.replace(ZERO_WIDTH_CHARS, '');
      if (stripped !== node.data) {
        node.data = stripped;
      }
    }

    for (const selector of UNWRAP_SELECTORS) {
      $(selector).each((_, el) => {
        const wrapper = $(el);
        wrapper.replaceWith(wrapper.contents());
      });
    }

    $(DROP_SELECTORS.join(', ')).remove();

    const body = $('body');
    const output = body.length > 0 ? body.html() : $.html();

    // Whitespace ahead of the first tag is dropped on re-parse, so trimming
    // keeps a second pass from changing the output
    return (output ?? '').trim();
  }

  /**
   * Collects every node in document order that satisfies the predicate
   */
  private collectNodes(nodes: AnyNode[], predicate: (node: AnyNode) => boolean, found: AnyNode[] = []): AnyNode[] {
    for (const node of nodes) {
      if (predicate(node)) {
        found.push(node);
      }
      if (hasChildren(node)) {
        this.collectNodes(node.children, predicate, found);
      }
    }
    return found;
  }
}
