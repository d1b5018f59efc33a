import type { SyncService } from '../../services/cratesync/src/index.js';

export interface RouteOptions {
  service: SyncService;
}
