import type { MailMessage, MailReceipt, MailTransport } from '../types/collaborators.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('dry-run-mail');

/**
 * Transport for dry runs: logs what would be sent and accepts every message.
 */
export class LogTransport implements MailTransport {
  readonly name = 'log';
  readonly sent: MailMessage[] = [];

  async send(message: MailMessage): Promise<MailReceipt> {
    this.sent.push(message);
    log.normal(`[dry run] would send "${message.subject}" to ${message.to}`);
    log.debug(message.text);
    return { messageId: `dry-run-${this.sent.length}` };
  }
}
