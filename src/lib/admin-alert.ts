import type { FilterStats } from '../types/candidate.js';
import type { MatchOutput } from '../types/digest.js';
import type { ExtractionStats } from '../types/grant.js';
import type { SendReport } from '../types/send.js';
import { formatPercent } from '../utils/logger.js';

export interface AdminAlertStats {
  mode: SendReport['mode'];
  digestFile: string;
  totalExtractedGrants: number | null;
  extractionSuccess: number | null;
  extractionSuccessRate: number | null;
  totalRecipients: number;
  successfulSends: number;
  failedSends: { recipient: string; error: string }[];
  skippedAlreadySent: number;
  filterTotals: FilterStats['totals'] | null;
}

/**
 * Collect the numbers an operator needs after a send. The match output is
 * optional: without it extraction and filter figures are reported as unknown.
 */
export function collectAdminAlertStats(report: SendReport, match: MatchOutput | null): AdminAlertStats {
  const extraction: ExtractionStats | null = match?.extractionStats ?? null;
  return {
    mode: report.mode,
    digestFile: report.digestFile,
    totalExtractedGrants: extraction?.total ?? null,
    extractionSuccess: extraction?.extractionSuccess ?? null,
    extractionSuccessRate: extraction ? formatPercent(extraction.extractionSuccess, extraction.total) : null,
    totalRecipients: report.totalDigests,
    successfulSends: report.delivered,
    failedSends: report.results
      .filter(result => result.outcome === 'failed')
      .map(result => ({ recipient: result.recipientId, error: result.error ?? 'unknown error' })),
    skippedAlreadySent: report.skippedAlreadySent,
    filterTotals: match?.filterStats.totals ?? null
  };
}

const orUnknown = (value: number | null, suffix = ''): string => (value === null ? 'unknown' : `${value}${suffix}`);

export function renderAdminAlert(stats: AdminAlertStats, processingDate: string): { subject: string; text: string } {
  const failed = stats.failedSends.length;
  const subject =
    `[Grant digest] ${processingDate}: ${stats.successfulSends} sent, ${failed} failed` +
    (stats.mode === 'live' ? '' : ` (${stats.mode})`);

  const lines = [
    `Digest file: ${stats.digestFile}`,
    `Mode: ${stats.mode}`,
    '',
    'Extraction',
    `  Grants extracted: ${orUnknown(stats.totalExtractedGrants)}`,
    `  Successful: ${orUnknown(stats.extractionSuccess)} (${orUnknown(stats.extractionSuccessRate, '%')})`,
    '',
    'Delivery',
    `  Recipients: ${stats.totalRecipients}`,
    `  Sent: ${stats.successfulSends}`,
    `  Failed: ${failed}`,
    `  Already sent from this digest: ${stats.skippedAlreadySent}`
  ];

  for (const failure of stats.failedSends) {
    lines.push(`    ${failure.recipient}: ${failure.error}`);
  }

  if (stats.filterTotals) {
    const { excluded } = stats.filterTotals;
    lines.push(
      '',
      'Candidate filter',
      `  Candidate pairs: ${stats.filterTotals.totalCandidates}`,
      `  Included: ${stats.filterTotals.includedCount}`,
      `  Excluded as already sent: ${excluded.already_sent}`,
      `  Excluded for failed extraction: ${excluded.failed_extraction}`,
      `  Excluded as expired: ${excluded.deadline_expired}`
    );
  }

  return { subject, text: lines.join('\n') + '\n' };
}
