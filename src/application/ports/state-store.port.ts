import type { History } from '../../domain/history';
import type { RunSnapshot } from '../../domain/run-snapshot';

export interface StateLock {
  release(): Promise<void>;
}

export interface StateStorePort {
  /** Rejects with StateLockedError while another run holds the lock. */
  acquireLock(): Promise<StateLock>;
  /** Rejects with StateStoreCorruptError when the state file cannot be trusted. */
  load(): Promise<History>;
  commit(snapshot: RunSnapshot): Promise<void>;
  /** Move the current state file aside. Resolves to the backup path, or null if there was none. */
  reset(): Promise<string | null>;
}
