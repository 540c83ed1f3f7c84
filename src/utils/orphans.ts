import type { Dataset, DetailRecord, MasterRecord } from '../types';

export const ORPHAN_DETAILS: readonly DetailRecord[] = Object.freeze<DetailRecord[]>([
  Object.freeze({ callId: 'orphan1', direction: 'outbound', number: '1234567890', duration: 0, switchCode: 'N/A' }),
  Object.freeze({ callId: 'orphan2', direction: 'inbound', number: '0987654321', duration: 0, switchCode: 'N/A' }),
]);

// Bucket for call records that have no real owner
export const ORPHAN_MASTER: MasterRecord = Object.freeze({
  name: 'Orphaned Record',
  account: 'N/A',
  calls: 0,
  minutes: 0,
  details: ORPHAN_DETAILS,
});

/**
 * Returns a new dataset with the orphan bucket appended last. Not idempotent:
 * each call appends another bucket, so run it once per load.
 */
export function injectOrphans(dataset: Dataset): Dataset {
  return [...dataset, ORPHAN_MASTER];
}

export function isOrphanBucket(record: MasterRecord): boolean {
  return record === ORPHAN_MASTER;
}
