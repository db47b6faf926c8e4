import { JsonDocumentStore } from '../providers/json-store.js';
import {
  DELIVERY_HISTORY_VERSION,
  DeliveryHistoryDocumentSchema,
  type DeliveryEntry,
  type DeliveryHistoryDocument,
  type DeliveryLookup,
  type DeliveryLookupResult,
  type DeliveryRecordInput,
  type DeliveryStats
} from '../types/delivery.js';
import { normalizeRecipientId } from '../core/utils/url-utils.js';
import { DeliveryWriteConflict, DryRunWriteViolation, StoreWriteConflict } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('delivery-history');

export const DELIVERY_HISTORY_FILENAME = 'sent_grants_history.json';

export interface DeliveryHistoryStoreOptions {
  path: string;
  /** Dry runs open the store read-only: any write attempt throws DryRunWriteViolation */
  readOnly?: boolean;
  now?: () => Date;
}

function applyDelivery(document: DeliveryHistoryDocument, input: DeliveryRecordInput, sentAt: string): void {
  const recipientId = normalizeRecipientId(input.recipientId);
  const byRecipient = (document.deliveries[input.grantId] ??= {});
  const existing: DeliveryEntry | undefined = byRecipient[recipientId];
  const attempts = (existing?.attempts ?? 0) + 1;

  if (input.outcome === 'delivered') {
    byRecipient[recipientId] = {
      ...existing,
      grantUrl: input.grantUrl,
      outcome: 'delivered',
      sentAt,
      channelId: input.channelId,
      attempts
    };
    return;
  }

  // A failed attempt never clears an earlier confirmed delivery
  if (existing?.outcome === 'delivered') {
    byRecipient[recipientId] = { ...existing, attempts, lastFailedAt: sentAt };
    return;
  }

  byRecipient[recipientId] = {
    ...existing,
    grantUrl: input.grantUrl,
    outcome: 'failed',
    sentAt,
    channelId: input.channelId,
    attempts,
    lastFailedAt: sentAt
  };
}

/**
 * Permanent record of which grant went to which recipient, keyed by
 * (grant id, recipient id). Only confirmed transport outcomes are ever written.
 */
export class DeliveryHistoryStore implements DeliveryLookup {
  private readonly store: JsonDocumentStore<DeliveryHistoryDocument>;
  private readonly now: () => Date;
  private snapshot: DeliveryHistoryDocument | null = null;

  constructor(private readonly options: DeliveryHistoryStoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.store = new JsonDocumentStore<DeliveryHistoryDocument>({
      name: 'delivery history',
      path: options.path,
      schema: DeliveryHistoryDocumentSchema,
      now: this.now,
      createEmpty: nowIso => ({
        version: DELIVERY_HISTORY_VERSION,
        revision: 0,
        updatedAt: nowIso,
        deliveries: {}
      })
    });
  }

  static async open(options: DeliveryHistoryStoreOptions): Promise<DeliveryHistoryStore> {
    const history = new DeliveryHistoryStore(options);
    await history.load();
    return history;
  }

  get path(): string {
    return this.store.path;
  }

  get readOnly(): boolean {
    return this.options.readOnly ?? false;
  }

  /**
   * (Re)load from disk. Throws HistoryStoreCorrupt when the document cannot be read.
   */
  async load(): Promise<void> {
    this.snapshot = await this.store.load();
    const stats = this.stats();
    log.verbose(`Loaded ${stats.recordCount} delivery records for ${stats.distinctGrantCount} grants`);
  }

  wasDelivered(grantId: string, recipientId: string): DeliveryLookupResult {
    const entry = this.entry(grantId, recipientId);
    if (!entry) {
      return { delivered: false, outcome: null };
    }
    return { delivered: entry.outcome === 'delivered', outcome: entry.outcome };
  }

  entry(grantId: string, recipientId: string): DeliveryEntry | null {
    return this.requireSnapshot().deliveries[grantId]?.[normalizeRecipientId(recipientId)] ?? null;
  }

  /** Grant URLs confirmed delivered to a recipient */
  deliveredGrantUrls(recipientId: string): string[] {
    const normalized = normalizeRecipientId(recipientId);
    const urls: string[] = [];
    for (const byRecipient of Object.values(this.requireSnapshot().deliveries)) {
      const entry = byRecipient[normalized];
      if (entry?.outcome === 'delivered') {
        urls.push(entry.grantUrl);
      }
    }
    return urls.sort();
  }

  async recordDelivery(input: DeliveryRecordInput): Promise<void> {
    await this.recordDeliveries([input]);
  }

  /**
   * Append delivery outcomes in one atomic swap of the store.
   */
  async recordDeliveries(inputs: DeliveryRecordInput[]): Promise<void> {
    if (this.readOnly) {
      throw new DryRunWriteViolation('recordDelivery');
    }
    if (inputs.length === 0) {
      return;
    }

    try {
      const { document } = await this.store.update(current => {
        const fallbackSentAt = this.now().toISOString();
        for (const input of inputs) {
          applyDelivery(current, input, input.sentAt ?? fallbackSentAt);
        }
      });
      this.snapshot = document;
    } catch (error) {
      if (error instanceof StoreWriteConflict) {
        throw new DeliveryWriteConflict(this.path, { cause: error });
      }
      throw error;
    }

    const delivered = inputs.filter(input => input.outcome === 'delivered').length;
    log.debug(`Recorded ${delivered} delivered and ${inputs.length - delivered} failed outcomes`);
  }

  stats(): DeliveryStats {
    const document = this.requireSnapshot();
    const recipients = new Set<string>();
    let recordCount = 0;
    let distinctGrantCount = 0;

    for (const byRecipient of Object.values(document.deliveries)) {
      const ids = Object.keys(byRecipient);
      if (ids.length > 0) {
        distinctGrantCount++;
      }
      recordCount += ids.length;
      ids.forEach(id => recipients.add(id));
    }

    return {
      recordCount,
      distinctGrantCount,
      distinctRecipientCount: recipients.size,
      lastUpdated: document.revision > 0 ? document.updatedAt : null
    };
  }

  private requireSnapshot(): DeliveryHistoryDocument {
    if (!this.snapshot) {
      throw new Error('Delivery history not loaded; call load() first');
    }
    return this.snapshot;
  }
}
