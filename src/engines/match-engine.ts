import { EXTRACTED_GRANTS, MATCHED_GRANTS } from '../lib/artifacts.js';
import { CandidateFilter, toFilterStats } from '../lib/candidate-filter.js';
import type { KeywordMatcher } from '../lib/keyword-matcher.js';
import { writeArtifact } from '../providers/stage-files.js';
import type { Candidate, FilterPolicy, FilterReport } from '../types/candidate.js';
import type { DeliveryLookup } from '../types/delivery.js';
import type { MatchOutput, MatchedGrant } from '../types/digest.js';
import { ExtractedGrantsSchema } from '../types/grant.js';
import { formatPercent, logger } from '../utils/logger.js';
import { readStageInput } from './stage-input.js';
import type { StageContext, StageEngine, StageOutcome } from './types.js';

const log = logger.createContext('match-engine');

export interface MatchResult extends StageOutcome {
  totalGrants: number;
  grantsWithKeywordMatches: number;
  grantsToSend: number;
  recipientsToSend: number;
  report: FilterReport;
}

/**
 * Turn matched grants into the final send set: this is the only place the
 * recipient candidate filter runs. Later stages take its output as is.
 */
export class MatchEngine implements StageEngine<MatchResult> {
  readonly stage = 'match-keywords';

  constructor(
    private readonly matcher: KeywordMatcher,
    private readonly history: DeliveryLookup,
    private readonly policy: Partial<FilterPolicy> = {}
  ) {}

  async run(context: StageContext): Promise<MatchResult> {
    const input = await readStageInput(context, 'extract', EXTRACTED_GRANTS, ExtractedGrantsSchema);
    const grants = input.data.grants;

    const candidates: Candidate[] = [];
    for (const grant of grants) {
      const recipients = this.matcher.matchGrant(grant);
      if (recipients.length === 0) continue;
      candidates.push({
        grantId: grant.grantId,
        url: grant.url,
        title: grant.title,
        organization: grant.organization,
        abstract: grant.abstract,
        deadline: grant.deadline,
        fundingAmount: grant.fundingAmount,
        extractionSuccess: grant.extractionSuccess,
        recipients
      });
    }
    log.normal(`${candidates.length} of ${grants.length} grants match at least one recipient's keywords`);

    const filter = new CandidateFilter(this.history, context.processingDate, this.policy);
    const report = filter.filterAll(candidates);
    const results = toSendSet(candidates, report);

    const recipientsToSend = report.recipients.filter(recipient => recipient.includedCount > 0).length;
    const output: MatchOutput = {
      processingDate: context.processingDate,
      sourceFile: input.path,
      totalGrants: grants.length,
      grantsWithKeywordMatches: candidates.length,
      matchRate: formatPercent(candidates.length, grants.length),
      totalRecipients: recipientsToSend,
      extractionStats: input.data.stats,
      filterStats: toFilterStats(report),
      results
    };
    const path = await writeArtifact(context.stageDir, MATCHED_GRANTS.filename(context.now()), output);

    const { excluded } = report.totals;
    return {
      outputs: [path],
      totalGrants: grants.length,
      grantsWithKeywordMatches: candidates.length,
      grantsToSend: results.length,
      recipientsToSend,
      report,
      summary:
        `${report.totals.includedCount} grant/recipient pairs to send to ${recipientsToSend} recipients ` +
        `(excluded: ${excluded.already_sent} already sent, ${excluded.failed_extraction} failed extraction, ` +
        `${excluded.deadline_expired} expired)`
    };
  }
}

/**
 * Grants with their included recipients only; grants nobody receives are dropped.
 */
function toSendSet(candidates: Candidate[], report: FilterReport): MatchedGrant[] {
  const includedPairs = new Set<string>();
  for (const recipient of report.recipients) {
    for (const candidate of recipient.included) {
      includedPairs.add(`${candidate.grantId}\n${recipient.recipientId}`);
    }
  }

  const results: MatchedGrant[] = [];
  for (const candidate of candidates) {
    const recipients = candidate.recipients.filter(interest =>
      includedPairs.has(`${candidate.grantId}\n${interest.recipientId}`)
    );
    if (recipients.length === 0) continue;
    results.push({
      grantId: candidate.grantId,
      url: candidate.url,
      title: candidate.title,
      organization: candidate.organization,
      abstract: candidate.abstract,
      deadline: candidate.deadline,
      fundingAmount: candidate.fundingAmount,
      extractionSuccess: candidate.extractionSuccess,
      recipients
    });
  }
  return results;
}
