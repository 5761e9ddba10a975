/**
 * Text and link helpers shared by the extraction services
 */

// Lookahead so URLs nested in another URL's query string are found too
const EMBEDDED_URL = /(?=(https?:\/\/[^\s"'<>]+))/g;
const PERCENT_RUN = /(?:%[0-9a-fA-F]{2})+/g;

/**
 * Collapses whitespace (non-breaking spaces included) to single spaces and trims
 */
export function normalizeText(text: string | undefined): string {
  return (text || '').replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Percent-decodes a string as UTF-8; bytes that do not form valid UTF-8 become U+FFFD
 */
export function decodePercentEncoding(value: string): string {
  return value.replace(PERCENT_RUN, run => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf-8'));
}

/**
 * Finds the real destination behind a tracking link.
 *
 * Mail tracking services wrap the destination in a redirect parameter,
 * sometimes several times over; the innermost destination comes last.
 *
 * @returns The last embedded http(s) URL, or the href unchanged when none is found
 */
export function resolveTrackingUrl(href: string): string {
  const decoded = decodePercentEncoding(href);

  let destination: string | undefined;
  for (const match of decoded.matchAll(EMBEDDED_URL)) {
    destination = match[1];
  }

  return destination ?? href;
}
