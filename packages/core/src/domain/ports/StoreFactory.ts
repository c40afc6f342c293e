import type { ProfileSink } from './ProfileSink.js';
import type { RunStore } from './RunStore.js';

/** Where a consolidation run records itself and writes its profiles. */
export interface StoreTarget {
  /** Empty when the job arguments carried none. */
  readonly databaseUrl: string;
  readonly trackingTable: string;
  readonly profileTable: string;
}

export interface ConsolidationStores {
  readonly runStore: RunStore;
  readonly sink: ProfileSink;
}

/** Opens the tracking table and the profile table named by a run's arguments. */
export type ConsolidationStoreFactory = (target: StoreTarget) => Promise<ConsolidationStores>;
