import type { LinkClassifier } from '../types/collaborators.js';
import type { ClassifiedLink, DeduplicatedLink } from '../types/grant.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('classifier');

/**
 * Marks every link relevant. Used when no real classifier is configured.
 */
export class AcceptAllClassifier implements LinkClassifier {
  readonly name = 'accept-all';

  async classify(links: DeduplicatedLink[]): Promise<ClassifiedLink[]> {
    log.normal(`No classifier configured: treating all ${links.length} links as relevant`);
    return links.map(link => ({ url: link.url, text: link.text, relevant: true, reason: 'unclassified' }));
  }
}
