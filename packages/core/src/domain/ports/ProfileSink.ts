import type { CustomerProfile } from '../model/CustomerProfile.js';

/** Port for the consolidated profile table. Every write replaces the previous dataset. */
export interface ProfileSink {
  /** Replace the full dataset with `profiles`. Must be all-or-nothing. */
  overwrite(profiles: readonly CustomerProfile[]): Promise<void>;
}
