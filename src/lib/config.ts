import { join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { LogLevel, parseLogLevel } from '../utils/logger.js';
import { RUN_INDEX_FILENAME } from './run-folder-manager.js';
import { SEEN_URLS_FILENAME } from './seen-url-store.js';
import { DELIVERY_HISTORY_FILENAME } from './delivery-history.js';
import { GRANT_CACHE_FILENAME } from './extraction-cache.js';

export const SEND_REPORTS_DIRNAME = 'send_reports';

// Values copied from dashboards often arrive quoted, and empty means unset
const trimQuotes = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim().replace(/^["']|["']$/g, '');
  return trimmed === '' ? undefined : trimmed;
};

const optionalString = z.preprocess(trimQuotes, z.string().optional());

const EnvSchema = z.object({
  GRANTS_DATA_DIR: z.preprocess(trimQuotes, z.string().default('intermediate_outputs')),
  GRANTS_INPUT_DIR: z.preprocess(trimQuotes, z.string().default('input')),
  KEYWORDS_FILE: optionalString,
  LINKS_FILE: optionalString,
  EXTRACTED_GRANTS_FILE: optionalString,
  SMTP_HOST: optionalString,
  SMTP_PORT: z.preprocess(trimQuotes, z.coerce.number().int().min(1).max(65535).default(587)),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  MAIL_FROM: z.preprocess(trimQuotes, z.string().email().optional()),
  ADMIN_EMAIL: z.preprocess(trimQuotes, z.string().email().optional()),
  LOG_LEVEL: optionalString
});

export interface SmtpConfig {
  host: string;
  port: number;
  /** Implicit TLS on 465, STARTTLS otherwise */
  secure: boolean;
  user: string | null;
  pass: string | null;
}

export interface TrackerConfig {
  dataDir: string;
  inputDir: string;
  keywordsFile: string;
  linksFile: string;
  extractedGrantsFile: string;
  smtp: SmtpConfig | null;
  mailFrom: string | null;
  adminEmail: string | null;
  logLevel: LogLevel;
  paths: {
    runIndex: string;
    seenUrls: string;
    deliveryHistory: string;
    grantCache: string;
    sendReports: string;
  };
}

/**
 * Build the configuration from environment variables.
 * Relative paths are resolved against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): TrackerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration (${details})`);
  }

  const vars = parsed.data;
  const dataDir = resolve(cwd, vars.GRANTS_DATA_DIR);
  const inputDir = resolve(cwd, vars.GRANTS_INPUT_DIR);
  const inInput = (value: string | undefined, fallback: string): string =>
    value ? resolve(cwd, value) : join(inputDir, fallback);

  if (!vars.SMTP_HOST && (vars.SMTP_USER || vars.SMTP_PASS)) {
    throw new ConfigError('SMTP_USER/SMTP_PASS are set but SMTP_HOST is missing');
  }

  const smtp: SmtpConfig | null = vars.SMTP_HOST
    ? {
        host: vars.SMTP_HOST,
        port: vars.SMTP_PORT,
        secure: vars.SMTP_PORT === 465,
        user: vars.SMTP_USER ?? null,
        pass: vars.SMTP_PASS ?? null
      }
    : null;

  return {
    dataDir,
    inputDir,
    keywordsFile: inInput(vars.KEYWORDS_FILE, 'keywords.json'),
    linksFile: inInput(vars.LINKS_FILE, 'links.json'),
    extractedGrantsFile: inInput(vars.EXTRACTED_GRANTS_FILE, 'extracted_grants.json'),
    smtp,
    mailFrom: vars.MAIL_FROM ?? vars.SMTP_USER ?? null,
    adminEmail: vars.ADMIN_EMAIL ?? null,
    logLevel: parseLogLevel(vars.LOG_LEVEL),
    paths: {
      runIndex: join(dataDir, RUN_INDEX_FILENAME),
      seenUrls: join(dataDir, SEEN_URLS_FILENAME),
      deliveryHistory: join(dataDir, DELIVERY_HISTORY_FILENAME),
      grantCache: join(dataDir, GRANT_CACHE_FILENAME),
      sendReports: join(dataDir, SEND_REPORTS_DIRNAME)
    }
  };
}
