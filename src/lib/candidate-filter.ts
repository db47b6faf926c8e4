import type {
  Candidate,
  ExclusionCounts,
  ExclusionReason,
  FilterDecision,
  FilterPolicy,
  FilterReport,
  FilterStats,
  RecipientFilterReport
} from '../types/candidate.js';
import type { DeliveryLookup } from '../types/delivery.js';
import { normalizeRecipientId } from '../core/utils/url-utils.js';
import { parseDeadline } from '../utils/time-parser.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('candidate-filter');

export const DEFAULT_FILTER_POLICY: Readonly<FilterPolicy> = Object.freeze({
  excludeAlreadySent: true,
  excludeFailedExtraction: true,
  excludeExpiredDeadline: true
});

export interface FilterFlags {
  /** --include-sent */
  includeSent?: boolean;
  /** --retry-failed */
  retryFailed?: boolean;
  /** --include-expired */
  includeExpired?: boolean;
}

/**
 * Map CLI flags onto the three exclusion policies. Each flag turns exactly one off.
 */
export function policyFromFlags(flags: FilterFlags = {}): FilterPolicy {
  return {
    excludeAlreadySent: !flags.includeSent,
    excludeFailedExtraction: !flags.retryFailed,
    excludeExpiredDeadline: !flags.includeExpired
  };
}

export function emptyExclusionCounts(): ExclusionCounts {
  return { already_sent: 0, failed_extraction: 0, deadline_expired: 0 };
}

/**
 * Group candidates by interested recipient. A candidate listing the same
 * recipient twice is considered once for that recipient.
 */
export function groupByRecipient(candidates: Candidate[]): Map<string, Candidate[]> {
  const grouped = new Map<string, Candidate[]>();
  for (const candidate of candidates) {
    const recipients = new Set(candidate.recipients.map(interest => normalizeRecipientId(interest.recipientId)));
    for (const recipientId of recipients) {
      const list = grouped.get(recipientId);
      if (list) {
        list.push(candidate);
      } else {
        grouped.set(recipientId, [candidate]);
      }
    }
  }
  return grouped;
}

/**
 * Decides, per (candidate, recipient), whether a grant is due for sending.
 *
 * Rules run in a fixed order and the first match is the only reason recorded:
 *   1. already_sent       confirmed delivery to this recipient (failed attempts never count)
 *   2. failed_extraction  extraction did not succeed
 *   3. deadline_expired   deadline strictly before the processing date (no deadline never expires)
 *
 * Filtering reads the delivery history and nothing else, so recipients are
 * independent of each other and a dry run yields the same report as a real one.
 */
export class CandidateFilter {
  private readonly policy: FilterPolicy;

  constructor(
    private readonly history: DeliveryLookup,
    /** YYYY-MM-DD */
    private readonly processingDate: string,
    policy: Partial<FilterPolicy> = {}
  ) {
    this.policy = { ...DEFAULT_FILTER_POLICY, ...policy };
  }

  get activePolicy(): FilterPolicy {
    return { ...this.policy };
  }

  exclusionReason(candidate: Candidate, recipientId: string): ExclusionReason | null {
    if (this.policy.excludeAlreadySent && this.history.wasDelivered(candidate.grantId, recipientId).delivered) {
      return 'already_sent';
    }

    if (this.policy.excludeFailedExtraction && !candidate.extractionSuccess) {
      return 'failed_extraction';
    }

    if (this.policy.excludeExpiredDeadline) {
      const deadline = parseDeadline(candidate.deadline);
      if (deadline !== null && deadline < this.processingDate) {
        return 'deadline_expired';
      }
    }

    return null;
  }

  decide(candidate: Candidate, recipientId: string): FilterDecision {
    const reason = this.exclusionReason(candidate, recipientId);
    return reason === null
      ? { grantId: candidate.grantId, recipientId, included: true }
      : { grantId: candidate.grantId, recipientId, included: false, reason };
  }

  filterRecipient(recipientId: string, candidates: Candidate[]): RecipientFilterReport {
    const normalized = normalizeRecipientId(recipientId);
    const excluded = emptyExclusionCounts();
    const decisions: FilterDecision[] = [];
    const included: Candidate[] = [];

    for (const candidate of candidates) {
      const decision = this.decide(candidate, normalized);
      decisions.push(decision);
      if (decision.included) {
        included.push(candidate);
      } else {
        excluded[decision.reason]++;
      }
    }

    if (included.length < candidates.length) {
      log.verbose(
        `${normalized}: kept ${included.length}/${candidates.length} ` +
          `(already sent ${excluded.already_sent}, failed extraction ${excluded.failed_extraction}, ` +
          `expired ${excluded.deadline_expired})`
      );
    }

    return {
      recipientId: normalized,
      totalCandidates: candidates.length,
      includedCount: included.length,
      excluded,
      decisions,
      included
    };
  }

  /**
   * Filter every recipient's candidates and roll the statistics up.
   * Recipients are reported in sorted order.
   */
  filterAll(candidates: Candidate[]): FilterReport {
    const grouped = groupByRecipient(candidates);
    const recipients = [...grouped.keys()]
      .sort()
      .map(recipientId => this.filterRecipient(recipientId, grouped.get(recipientId) ?? []));

    const totals = {
      recipients: recipients.length,
      totalCandidates: 0,
      includedCount: 0,
      excluded: emptyExclusionCounts()
    };
    for (const report of recipients) {
      totals.totalCandidates += report.totalCandidates;
      totals.includedCount += report.includedCount;
      totals.excluded.already_sent += report.excluded.already_sent;
      totals.excluded.failed_extraction += report.excluded.failed_extraction;
      totals.excluded.deadline_expired += report.excluded.deadline_expired;
    }

    log.normal(
      `Filtered ${totals.totalCandidates} candidate pairs for ${totals.recipients} recipients: ` +
        `${totals.includedCount} included`
    );

    return {
      processingDate: this.processingDate,
      policy: this.activePolicy,
      recipients,
      totals
    };
  }
}

/**
 * The statistics part of a report, as persisted in the match output and shown in the admin alert.
 */
export function toFilterStats(report: FilterReport): FilterStats {
  return {
    processingDate: report.processingDate,
    policy: report.policy,
    recipients: report.recipients.map(recipient => ({
      recipientId: recipient.recipientId,
      totalCandidates: recipient.totalCandidates,
      includedCount: recipient.includedCount,
      excluded: { ...recipient.excluded }
    })),
    totals: {
      recipients: report.totals.recipients,
      totalCandidates: report.totals.totalCandidates,
      includedCount: report.totals.includedCount,
      excluded: { ...report.totals.excluded }
    }
  };
}
