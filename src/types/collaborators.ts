import type { ClassifiedLink, DeduplicatedLink, GrantDetails, SiteLinks } from './grant.js';
import type { DigestGrant } from './digest.js';

/**
 * Narrow seams to the parts of the pipeline that talk to the outside world.
 * Scraping, classification, extraction, templating and SMTP all live behind these.
 */

export interface LinkSource {
  readonly name: string;
  /** site -> links found on it */
  collectLinks(): Promise<Record<string, SiteLinks>>;
}

export interface LinkClassifier {
  readonly name: string;
  classify(links: DeduplicatedLink[]): Promise<ClassifiedLink[]>;
}

export interface GrantExtractor {
  readonly name: string;
  /** Rejects when the page could not be extracted. */
  extract(url: string, linkText: string | null): Promise<GrantDetails>;
}

export interface DigestRenderContext {
  recipientId: string;
  displayName: string;
  grants: DigestGrant[];
  keywords: string[];
  processingDate: string;
}

export interface RenderedDigest {
  subject: string;
  text: string;
  html: string | null;
}

export interface DigestRenderer {
  render(context: DigestRenderContext): RenderedDigest;
}

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string | null;
}

export interface MailReceipt {
  messageId: string;
}

export interface MailTransport {
  readonly name: string;
  send(message: MailMessage): Promise<MailReceipt>;
}
