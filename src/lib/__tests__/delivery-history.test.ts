import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, relative } from 'path';
import { DeliveryHistoryStore, DELIVERY_HISTORY_FILENAME } from '../delivery-history.js';
import { CandidateFilter } from '../candidate-filter.js';
import { JsonDocumentStore } from '../../providers/json-store.js';
import { mkGrantId } from '../../core/utils/url-utils.js';
import {
  DeliveryWriteConflict,
  DryRunWriteViolation,
  HistoryStoreCorrupt,
  StoreWriteConflict
} from '../../utils/errors.js';
import type { DeliveryRecordInput } from '../../types/delivery.js';

const GRANT_URL = 'https://grants.example/call/42';
const GRANT_ID = mkGrantId(GRANT_URL);

function record(overrides: Partial<DeliveryRecordInput> = {}): DeliveryRecordInput {
  return {
    grantId: GRANT_ID,
    grantUrl: GRANT_URL,
    recipientId: 'a@x.com',
    outcome: 'delivered',
    channelId: 'msg-1',
    ...overrides
  };
}

describe('DeliveryHistoryStore', () => {
  let dir: string;
  let path: string;
  let clock: Date;

  const open = (readOnly = false) => DeliveryHistoryStore.open({ path, readOnly, now: () => clock });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'delivery-history-test-'));
    path = join(dir, DELIVERY_HISTORY_FILENAME);
    clock = new Date('2026-01-01T09:00:00.000Z');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  test('should report nothing delivered for an empty store', async () => {
    const history = await open();

    expect(history.wasDelivered(GRANT_ID, 'a@x.com')).toEqual({ delivered: false, outcome: null });
    expect(history.stats()).toEqual({
      recordCount: 0,
      distinctGrantCount: 0,
      distinctRecipientCount: 0,
      lastUpdated: null
    });
  });

  test('should persist a confirmed delivery across instances', async () => {
    const history = await open();
    await history.recordDelivery(record());

    const reopened = await open();
    expect(reopened.wasDelivered(GRANT_ID, 'a@x.com')).toEqual({ delivered: true, outcome: 'delivered' });
    expect(reopened.entry(GRANT_ID, 'a@x.com')).toEqual({
      grantUrl: GRANT_URL,
      outcome: 'delivered',
      sentAt: '2026-01-01T09:00:00.000Z',
      channelId: 'msg-1',
      attempts: 1
    });
  });

  test('should normalise recipient ids on write and lookup', async () => {
    const history = await open();
    await history.recordDelivery(record({ recipientId: '  A@X.com ' }));

    expect(history.wasDelivered(GRANT_ID, 'a@x.com').delivered).toBe(true);
    expect(history.wasDelivered(GRANT_ID, 'A@X.COM').delivered).toBe(true);
  });

  test('should keep a failed attempt from suppressing the pair', async () => {
    const history = await open();
    await history.recordDelivery(record({ outcome: 'failed', channelId: null }));

    expect(history.wasDelivered(GRANT_ID, 'a@x.com')).toEqual({ delivered: false, outcome: 'failed' });
  });

  test('should keep the delivered record when a later attempt fails', async () => {
    const history = await open();
    await history.recordDelivery(record());

    clock = new Date('2026-01-02T09:00:00.000Z');
    await history.recordDelivery(record({ outcome: 'failed', channelId: null }));

    expect(history.wasDelivered(GRANT_ID, 'a@x.com')).toEqual({ delivered: true, outcome: 'delivered' });
    expect(history.entry(GRANT_ID, 'a@x.com')).toEqual({
      grantUrl: GRANT_URL,
      outcome: 'delivered',
      sentAt: '2026-01-01T09:00:00.000Z',
      channelId: 'msg-1',
      attempts: 2,
      lastFailedAt: '2026-01-02T09:00:00.000Z'
    });
  });

  test('should turn a failed pair into a delivered one', async () => {
    const history = await open();
    await history.recordDelivery(record({ outcome: 'failed', channelId: null }));
    clock = new Date('2026-01-02T09:00:00.000Z');
    await history.recordDelivery(record({ channelId: 'msg-2' }));

    const entry = history.entry(GRANT_ID, 'a@x.com');
    expect(entry?.outcome).toBe('delivered');
    expect(entry?.channelId).toBe('msg-2');
    expect(entry?.sentAt).toBe('2026-01-02T09:00:00.000Z');
    expect(entry?.attempts).toBe(2);
  });

  test('should keep one suppressing record when a delivery is recorded again', async () => {
    const history = await open();
    await history.recordDelivery(record());
    clock = new Date('2026-01-02T09:00:00.000Z');
    await history.recordDelivery(record({ channelId: 'msg-2' }));

    expect(history.stats().recordCount).toBe(1);
    expect(history.entry(GRANT_ID, 'a@x.com')).toEqual({
      grantUrl: GRANT_URL,
      outcome: 'delivered',
      sentAt: '2026-01-02T09:00:00.000Z',
      channelId: 'msg-2',
      attempts: 2
    });

    const filter = new CandidateFilter(await open(), '2026-01-03');
    const report = filter.filterRecipient('a@x.com', [
      {
        grantId: GRANT_ID,
        url: GRANT_URL,
        title: 'Call 42',
        organization: null,
        abstract: null,
        deadline: null,
        fundingAmount: null,
        extractionSuccess: true,
        recipients: [{ recipientId: 'a@x.com', matchedKeywords: ['ocean'] }]
      }
    ]);
    expect(report.decisions).toEqual([
      { grantId: GRANT_ID, recipientId: 'a@x.com', included: false, reason: 'already_sent' }
    ]);
  });

  test('should keep both records when two handles on the same file write at once', async () => {
    const first = await open();
    const second = await DeliveryHistoryStore.open({ path: relative(process.cwd(), path), now: () => clock });
    const otherUrl = 'https://grants.example/call/7';

    const outcomes = await Promise.allSettled([
      first.recordDelivery(record()),
      second.recordDelivery(record({ grantId: mkGrantId(otherUrl), grantUrl: otherUrl }))
    ]);

    expect(outcomes.map(outcome => outcome.status)).toEqual(['fulfilled', 'fulfilled']);
    const reopened = await open();
    expect(reopened.wasDelivered(GRANT_ID, 'a@x.com').delivered).toBe(true);
    expect(reopened.wasDelivered(mkGrantId(otherUrl), 'a@x.com').delivered).toBe(true);
    expect(reopened.stats().recordCount).toBe(2);
  });

  test('should write a batch in one revision', async () => {
    const history = await open();
    await history.recordDeliveries([
      record(),
      record({ recipientId: 'b@x.com' }),
      record({ grantId: mkGrantId('https://grants.example/call/7'), grantUrl: 'https://grants.example/call/7' })
    ]);

    const document = JSON.parse(await readFile(path, 'utf-8'));
    expect(document.revision).toBe(1);
    expect(history.stats()).toEqual({
      recordCount: 3,
      distinctGrantCount: 2,
      distinctRecipientCount: 2,
      lastUpdated: '2026-01-01T09:00:00.000Z'
    });
  });

  test('should list the grant URLs delivered to a recipient', async () => {
    const history = await open();
    await history.recordDeliveries([
      record(),
      record({
        grantId: mkGrantId('https://grants.example/call/7'),
        grantUrl: 'https://grants.example/call/7',
        outcome: 'failed'
      })
    ]);

    expect(history.deliveredGrantUrls('a@x.com')).toEqual([GRANT_URL]);
  });

  test('should refuse writes when opened read-only', async () => {
    const history = await open(true);

    await expect(history.recordDelivery(record())).rejects.toBeInstanceOf(DryRunWriteViolation);
    await expect(history.recordDeliveries([])).rejects.toBeInstanceOf(DryRunWriteViolation);
    await expect(stat(path)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('should raise HistoryStoreCorrupt for a store with the wrong shape', async () => {
    await writeFile(path, JSON.stringify({ version: 1, revision: 0, updatedAt: 'x', deliveries: [] }));

    await expect(open()).rejects.toBeInstanceOf(HistoryStoreCorrupt);
  });

  test('should surface a persistent concurrent writer as DeliveryWriteConflict', async () => {
    const history = await open();
    vi.spyOn(JsonDocumentStore.prototype, 'update').mockRejectedValueOnce(new StoreWriteConflict(path, 2));

    const attempt = history.recordDelivery(record());

    await expect(attempt).rejects.toBeInstanceOf(DeliveryWriteConflict);
    expect(history.wasDelivered(GRANT_ID, 'a@x.com').delivered).toBe(false);
  });

  test('should require load before lookups', () => {
    const history = new DeliveryHistoryStore({ path });

    expect(() => history.wasDelivered(GRANT_ID, 'a@x.com')).toThrow('Delivery history not loaded');
  });
});
