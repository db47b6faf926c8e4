import type { TrackerConfig } from '../lib/config.js';
import { ExtractionCache } from '../lib/extraction-cache.js';
import { KeywordMatcher } from '../lib/keyword-matcher.js';
import { RunFolderManager } from '../lib/run-folder-manager.js';
import { SeenUrlStore } from '../lib/seen-url-store.js';
import { AcceptAllClassifier } from '../providers/accept-all-classifier.js';
import { FileLinkSource } from '../providers/file-link-source.js';
import { ImportedGrantExtractor } from '../providers/imported-grant-extractor.js';
import { LogTransport } from '../providers/log-transport.js';
import { PlainTextDigestRenderer } from '../providers/plain-text-renderer.js';
import { SmtpTransport } from '../providers/smtp-transport.js';
import type { MailTransport } from '../types/collaborators.js';
import { ConfigError } from '../utils/errors.js';
import type { PipelineServices } from './pipeline.js';

/**
 * Services wired from the environment configuration with the file-backed collaborators.
 */
export function createDefaultServices(config: TrackerConfig, now: () => Date = () => new Date()): PipelineServices {
  const transportFor = (dryRun: boolean): MailTransport => {
    if (dryRun) {
      return new LogTransport();
    }
    if (!config.smtp) {
      throw new ConfigError('SMTP_HOST is not set; configure SMTP or use --dry-run');
    }
    if (!config.mailFrom) {
      throw new ConfigError('MAIL_FROM (or SMTP_USER) is required to send mail');
    }
    return new SmtpTransport({ smtp: config.smtp, from: config.mailFrom });
  };

  return {
    runs: new RunFolderManager({ dataDir: config.dataDir, now }),
    seenUrls: new SeenUrlStore({ path: config.paths.seenUrls, now }),
    extractionCache: new ExtractionCache({ path: config.paths.grantCache, now }),
    deliveryHistoryPath: config.paths.deliveryHistory,
    linkSource: new FileLinkSource(config.linksFile),
    classifier: new AcceptAllClassifier(),
    extractor: new ImportedGrantExtractor(config.extractedGrantsFile),
    loadKeywords: () => KeywordMatcher.fromFile(config.keywordsFile),
    renderer: new PlainTextDigestRenderer(),
    transportFor,
    sendReportsDir: config.paths.sendReports,
    adminEmail: config.adminEmail,
    now
  };
}
