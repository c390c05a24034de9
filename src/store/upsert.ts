import type { PredictionRecord, RecordStore, UpsertOutcome } from '../types/index.js';
import { toStoreFields } from '../pipeline/records.js';
import { logger } from '../utils/logger.js';
import { filterKnownFields } from './field-filter.js';

/**
 * Create-or-update a record by its game key. Fields the store doesn't
 * recognize are left out of the write.
 */
export async function upsertRecord(store: RecordStore, record: PredictionRecord): Promise<UpsertOutcome> {
  const known = await store.knownFields();
  const { fields, dropped } = filterKnownFields(toStoreFields(record), known);
  if (dropped.length > 0) {
    logger.debug({ key: record.key, dropped }, 'Store does not recognize some fields, omitting them');
  }

  const existingId = await store.findIdByKey(record.key);
  if (existingId !== null) {
    await store.update(existingId, fields);
    return { key: record.key, status: 'updated', id: existingId };
  }

  const id = await store.create(fields);
  return { key: record.key, status: 'created', id };
}
