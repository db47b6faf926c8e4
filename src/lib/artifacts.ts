import { formatTimestamp } from '../utils/time-parser.js';
import { siteFileStem } from '../core/utils/url-utils.js';

/**
 * File names of the artifacts each stage writes into its folder.
 */

const stamped = (prefix: string) => ({
  prefix,
  pattern: new RegExp(`^${prefix}_\\d{8}_\\d{6}\\.json$`),
  filename: (now: Date): string => `${prefix}_${formatTimestamp(now)}.json`
});

export const SITE_LINKS_PATTERN = /^(.+)_links\.json$/;

export function siteLinksFilename(site: string): string {
  return `${siteFileStem(site)}_links.json`;
}

export function siteFromLinksFilename(filename: string): string | null {
  const match = filename.match(SITE_LINKS_PATTERN);
  return match ? match[1] : null;
}

export const DEDUPLICATED_LINKS = stamped('deduplicated_links');
export const CLASSIFIED_LINKS = stamped('classified_links');
export const EXTRACTED_GRANTS = stamped('extracted_grants');
export const MATCHED_GRANTS = stamped('grants_by_keywords_emails');
export const EMAIL_DIGESTS = stamped('email_digests');
export const SEND_REPORT = stamped('send_report');
