/**
 * Email services exports
 */

export { EmailFetcher, RateLimiter, buildNewsletterQuery, type RawEmailData } from './EmailFetcher';
export { EmailParser } from './EmailParser';
export { EmailDeliveryService, formatDigestText, type OutgoingEmail } from './EmailDeliveryService';
