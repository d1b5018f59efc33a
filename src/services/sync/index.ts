import { createSyncService, type SyncService } from '../../../services/cratesync/src/index.js';

let instance: SyncService | null = null;

/**
 * Process-wide service; the first call loads the persisted state
 */
export function getSyncService(): SyncService {
  if (!instance) {
    instance = createSyncService();
  }
  return instance;
}
