import { collectAdminAlertStats, renderAdminAlert } from '../lib/admin-alert.js';
import { EMAIL_DIGESTS, SEND_REPORT } from '../lib/artifacts.js';
import type { DeliveryHistoryStore } from '../lib/delivery-history.js';
import type { RunFolderManager } from '../lib/run-folder-manager.js';
import { readArtifact, writeArtifact } from '../providers/stage-files.js';
import type { MailTransport } from '../types/collaborators.js';
import type { DeliveryRecordInput } from '../types/delivery.js';
import {
  DigestDocumentSchema,
  MatchOutputSchema,
  type MatchOutput,
  type RecipientDigest
} from '../types/digest.js';
import type { RecipientSendResult, SendMode, SendReport } from '../types/send.js';
import { normalizeRecipientId } from '../core/utils/url-utils.js';
import { errorMessage } from '../utils/errors.js';
import { toIsoDate } from '../utils/time-parser.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('send-engine');

export interface SendOptions {
  /** Log instead of sending; the delivery history must be opened read-only */
  dryRun?: boolean;
  /** Redirect every digest to these addresses and record nothing */
  testRecipients?: string[];
  /** Digest to send instead of the newest one across all runs */
  digestPath?: string;
}

export interface SendEngineDeps {
  runs: RunFolderManager;
  /** Loaded store */
  history: DeliveryHistoryStore;
  transport: MailTransport;
  reportsDir: string;
  adminEmail: string | null;
  now?: () => Date;
}

export interface SendResult {
  digestPath: string;
  reportPath: string;
  report: SendReport;
  summary: string;
}

/**
 * Sends the newest digest and writes confirmed outcomes back to the delivery
 * history. Only a live send records anything; dry runs and test sends leave the
 * history untouched.
 */
export class SendEngine {
  private readonly now: () => Date;

  constructor(
    private readonly deps: SendEngineDeps,
    private readonly options: SendOptions = {}
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  get mode(): SendMode {
    if (this.options.dryRun) return 'dry-run';
    if ((this.options.testRecipients ?? []).length > 0) return 'test';
    return 'live';
  }

  async send(): Promise<SendResult> {
    if (this.options.dryRun && !this.deps.history.readOnly) {
      throw new Error('Dry runs must open the delivery history read-only');
    }

    const startedAt = this.now().toISOString();
    const digestPath = await this.resolveDigestPath();
    const document = await readArtifact(digestPath, DigestDocumentSchema);
    log.normal(`Sending ${document.digests.length} digests from ${digestPath} (${this.mode})`);

    const results: RecipientSendResult[] = [];
    let recordsWritten = 0;

    for (const digest of document.digests) {
      if (digest.grants.length === 0) {
        log.verbose(`${digest.recipientId}: empty digest, skipping`);
        results.push(skipped(digest, 'empty'));
        continue;
      }
      if (this.mode !== 'test' && this.alreadySent(digest, document.builtAt)) {
        logger.skip(digest.recipientId, 'already sent from this digest');
        results.push(skipped(digest, 'already-sent'));
        continue;
      }

      const result = await this.sendDigest(digest);
      results.push(result);

      if (this.mode === 'live') {
        recordsWritten += await this.record(digest, result);
      }
    }

    const delivered = results.filter(result => result.outcome === 'delivered').length;
    const failed = results.filter(result => result.outcome === 'failed').length;
    const report: SendReport = {
      mode: this.mode,
      digestFile: digestPath,
      startedAt,
      finishedAt: startedAt,
      totalDigests: document.digests.length,
      delivered,
      failed,
      skippedEmpty: results.filter(result => result.skipReason === 'empty').length,
      skippedAlreadySent: results.filter(result => result.skipReason === 'already-sent').length,
      deliveryRecordsWritten: recordsWritten,
      adminAlert: 'not-configured',
      results
    };

    report.adminAlert = await this.sendAdminAlert(report, document.sourceFile);
    report.finishedAt = this.now().toISOString();

    const reportPath = await writeArtifact(this.deps.reportsDir, SEND_REPORT.filename(this.now()), report);
    log.normal(`Send report written to ${reportPath}`);

    return {
      digestPath,
      reportPath,
      report,
      summary:
        `${delivered} sent, ${failed} failed, ${report.skippedEmpty + report.skippedAlreadySent} skipped` +
        (this.mode === 'live' ? '' : ` (${this.mode}, nothing recorded)`)
    };
  }

  private async resolveDigestPath(): Promise<string> {
    if (this.options.digestPath) {
      return this.options.digestPath;
    }
    const latest = await this.deps.runs.findLatestArtifact('build-digest', EMAIL_DIGESTS.pattern);
    if (!latest) {
      throw new Error('No email_digests_*.json found in any run; run "build-digest" first');
    }
    return latest.path;
  }

  /**
   * Every grant of the digest was recorded delivered to this recipient after the
   * digest was built, so a previous send of this same file went through.
   */
  private alreadySent(digest: RecipientDigest, builtAt: string | null): boolean {
    if (builtAt === null) return false;
    return digest.grants.every(grant => {
      const entry = this.deps.history.entry(grant.grantId, digest.recipientId);
      return entry !== null && entry.outcome === 'delivered' && entry.sentAt >= builtAt;
    });
  }

  private async sendDigest(digest: RecipientDigest): Promise<RecipientSendResult> {
    const testRecipients = this.options.testRecipients ?? [];
    const to = this.mode === 'test' ? testRecipients : [digest.recipientId];
    const subject = this.mode === 'test' ? `[TEST for ${digest.recipientId}] ${digest.subject}` : digest.subject;
    const base = { recipientId: digest.recipientId, to, grantCount: digest.grants.length, skipReason: null };

    try {
      const receipt = await this.deps.transport.send({
        to: to.join(', '),
        subject,
        text: digest.textBody,
        html: digest.htmlBody
      });
      logger.success(digest.recipientId, `${digest.grants.length} grants sent`);
      return { ...base, outcome: 'delivered', messageId: receipt.messageId, error: null };
    } catch (error) {
      logger.failure(digest.recipientId, 'send failed');
      log.error(`${digest.recipientId}: ${errorMessage(error)}`);
      return { ...base, outcome: 'failed', messageId: null, error: errorMessage(error) };
    }
  }

  private async record(digest: RecipientDigest, result: RecipientSendResult): Promise<number> {
    if (result.outcome === 'skipped') return 0;

    const sentAt = this.now().toISOString();
    const records: DeliveryRecordInput[] = digest.grants.map(grant => ({
      grantId: grant.grantId,
      grantUrl: grant.url,
      recipientId: normalizeRecipientId(digest.recipientId),
      outcome: result.outcome === 'delivered' ? 'delivered' : 'failed',
      channelId: result.messageId,
      sentAt
    }));

    try {
      await this.deps.history.recordDeliveries(records);
    } catch (error) {
      if (result.outcome === 'delivered') {
        log.error(`${digest.recipientId} received the digest but its delivery could not be recorded`);
      }
      throw error;
    }
    return records.length;
  }

  private async sendAdminAlert(report: SendReport, matchFile: string): Promise<SendReport['adminAlert']> {
    if (!this.deps.adminEmail) {
      return 'not-configured';
    }
    if (this.mode === 'test') {
      return 'skipped';
    }

    const alert = renderAdminAlert(
      collectAdminAlertStats(report, await this.loadMatchOutput(matchFile)),
      toIsoDate(this.now())
    );
    try {
      await this.deps.transport.send({ to: this.deps.adminEmail, subject: alert.subject, text: alert.text });
      log.normal(`Admin alert sent to ${this.deps.adminEmail}`);
      return 'sent';
    } catch (error) {
      log.error(`Failed to send admin alert: ${errorMessage(error)}`);
      return 'failed';
    }
  }

  private async loadMatchOutput(path: string): Promise<MatchOutput | null> {
    try {
      return await readArtifact(path, MatchOutputSchema);
    } catch (error) {
      log.error(`Admin alert without filter statistics: ${errorMessage(error)}`);
      return null;
    }
  }
}

function skipped(digest: RecipientDigest, reason: NonNullable<RecipientSendResult['skipReason']>): RecipientSendResult {
  return {
    recipientId: digest.recipientId,
    to: [],
    grantCount: digest.grants.length,
    outcome: 'skipped',
    skipReason: reason,
    messageId: null,
    error: null
  };
}
