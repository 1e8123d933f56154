import { ulid } from 'ulid';
import type { CollectionLogEntry } from '@mrm/shared';
import type { Logger } from '../logger.js';
import type { RecordStore } from '../store.js';

export type CollectionLogInput = Omit<CollectionLogEntry, 'logId' | 'timestamp'>;

export function newLogEntry(input: CollectionLogInput, timestamp: string): CollectionLogEntry {
  return {
    logId: ulid(),
    timestamp,
    ...input,
  };
}

/**
 * Append an audit entry. A failed append is logged and reported as false;
 * it never fails the operation being audited.
 */
export async function recordLog(
  store: RecordStore,
  entry: CollectionLogEntry,
  log: Logger
): Promise<boolean> {
  try {
    await store.appendLog(entry);
    return true;
  } catch (error) {
    log.error(
      { error, logId: entry.logId, entityKey: entry.entityKey, operation: 'appendLog' },
      'Failed to append collection log entry'
    );
    return false;
  }
}
