/**
 * Counter store contract
 *
 * Counters are written by the instrumented program while it runs and are
 * read-only once analysis starts.
 */

import type { TrackerId } from './branded.js';

export interface CounterStore {
  /** Hit count of a tracker; trackers that never fired read as 0 */
  hits(tracker: TrackerId): number;
}
