import type { ProfileSink } from '../../domain/ports/ProfileSink.js';
import type { CustomerProfile } from '../../domain/model/CustomerProfile.js';

/** Keeps the last written dataset in memory. */
export class InMemoryProfileSink implements ProfileSink {
  private profiles: readonly CustomerProfile[] = [];
  private writes = 0;

  overwrite(profiles: readonly CustomerProfile[]): Promise<void> {
    this.profiles = [...profiles];
    this.writes++;
    return Promise.resolve();
  }

  get current(): readonly CustomerProfile[] {
    return this.profiles;
  }

  get writeCount(): number {
    return this.writes;
  }
}
