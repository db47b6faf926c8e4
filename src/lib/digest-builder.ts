import type { DigestRenderer } from '../types/collaborators.js';
import type {
  DeadlineStatus,
  DigestDocument,
  DigestGrant,
  MatchOutput,
  MatchedGrant,
  RecipientDigest
} from '../types/digest.js';
import { daysBetween, parseDeadline } from '../utils/time-parser.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('digest-builder');

export const CRITICAL_DAYS = 15;
export const WARNING_DAYS = 30;

export interface DeadlineInfo {
  parsedDeadline: string | null;
  daysToDeadline: number | null;
  deadlineStatus: DeadlineStatus;
  deadlineLabel: string;
}

export function describeDeadline(deadline: string | null, processingDate: string): DeadlineInfo {
  const parsedDeadline = parseDeadline(deadline);
  if (parsedDeadline === null) {
    return {
      parsedDeadline: null,
      daysToDeadline: null,
      deadlineStatus: 'missing',
      deadlineLabel: 'No deadline given, check manually'
    };
  }

  const days = daysBetween(processingDate, parsedDeadline);
  const base = { parsedDeadline, daysToDeadline: days };
  if (days < 0) {
    return { ...base, deadlineStatus: 'past', deadlineLabel: `Expired (${Math.abs(days)} days ago)` };
  }
  if (days < CRITICAL_DAYS) {
    return { ...base, deadlineStatus: 'critical', deadlineLabel: `Closes in ${days} days` };
  }
  if (days < WARNING_DAYS) {
    return { ...base, deadlineStatus: 'warning', deadlineLabel: `Closes in ${days} days` };
  }
  return { ...base, deadlineStatus: 'ok', deadlineLabel: `Closes in ${days} days` };
}

/**
 * Regroup the match output (grant -> recipients) as recipient -> grants.
 * The match output is already the filtered send set, so nothing is dropped here.
 */
export function groupMatchesByRecipient(
  results: MatchedGrant[],
  processingDate: string
): Map<string, DigestGrant[]> {
  const grouped = new Map<string, DigestGrant[]>();

  for (const grant of results) {
    const deadline = describeDeadline(grant.deadline, processingDate);
    for (const interest of grant.recipients) {
      const digestGrant: DigestGrant = {
        grantId: grant.grantId,
        url: grant.url,
        title: grant.title,
        organization: grant.organization,
        abstract: grant.abstract,
        deadline: grant.deadline,
        fundingAmount: grant.fundingAmount,
        matchedKeywords: [...new Set(interest.matchedKeywords)].sort(),
        ...deadline
      };
      const list = grouped.get(interest.recipientId);
      if (list) {
        list.push(digestGrant);
      } else {
        grouped.set(interest.recipientId, [digestGrant]);
      }
    }
  }

  return grouped;
}

export function displayNameFor(recipientId: string): string {
  const [local] = recipientId.split('@');
  return local || recipientId;
}

export interface BuildDigestsOptions {
  /** YYYY-MM-DD */
  processingDate: string;
  sourceFile: string;
  renderer: DigestRenderer;
  builtAt: string;
}

/**
 * One rendered digest per recipient, recipients in sorted order.
 */
export function buildDigests(match: MatchOutput, options: BuildDigestsOptions): DigestDocument {
  const grouped = groupMatchesByRecipient(match.results, options.processingDate);
  if (grouped.size === 0) {
    log.normal('No matched recipients in source data; digest will be empty');
  }

  const digests: RecipientDigest[] = [];
  let totalGrants = 0;

  for (const recipientId of [...grouped.keys()].sort()) {
    const grants = grouped.get(recipientId) ?? [];
    const keywords = [...new Set(grants.flatMap(grant => grant.matchedKeywords))].sort();
    const displayName = displayNameFor(recipientId);
    const rendered = options.renderer.render({
      recipientId,
      displayName,
      grants,
      keywords,
      processingDate: options.processingDate
    });

    digests.push({
      recipientId,
      displayName,
      totalGrants: grants.length,
      keywords,
      subject: rendered.subject,
      textBody: rendered.text,
      htmlBody: rendered.html,
      grants
    });
    totalGrants += grants.length;
  }

  log.normal(`Built ${digests.length} digests covering ${totalGrants} grants`);

  return {
    processingDate: options.processingDate,
    builtAt: options.builtAt,
    sourceFile: options.sourceFile,
    totalRecipients: digests.length,
    totalGrants,
    digests
  };
}
