import { minimalFieldsFromMessage } from './types.js';
import type { RecordStore } from './types.js';
import type { Message } from '../mail/types.js';

/**
 * Idempotent Phase-1 create: an existing record is a success no-op, a
 * missing one is created with the message's minimal fields.
 *
 * @returns true when the record exists afterwards
 * @throws StoreApiError when the lookup or the create fails
 */
export async function createOrSkip(store: RecordStore, message: Message): Promise<boolean> {
  const existing = await store.lookupRecord(message.id);
  if (existing !== null) {
    console.log('[store] Record exists, skipping create', { externalId: message.id });
    return true;
  }

  await store.createRecord(minimalFieldsFromMessage(message));
  return true;
}
