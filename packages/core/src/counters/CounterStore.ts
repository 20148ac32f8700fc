/**
 * Counter stores
 *
 * The instrumented program writes hit counts keyed by tracker id. A counter
 * file is a flat JSON object: `{ "t0": 1, "t1": 0 }`. Trackers absent from
 * the file never fired and read as 0.
 */

import type { CounterStore, TrackerId } from '@forkcov/types';
import { toTrackerId } from '@forkcov/types';
import { InputError } from '../errors/ForkcovError.js';
import { readJsonFile } from '../utils/readJsonFile.js';

export class MapCounterStore implements CounterStore {
  private readonly counts: ReadonlyMap<TrackerId, number>;

  constructor(counts: ReadonlyMap<TrackerId, number> = new Map()) {
    this.counts = counts;
  }

  hits(tracker: TrackerId): number {
    return this.counts.get(tracker) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }
}

/**
 * Build a store from a plain record, validating every value.
 */
export function counterStoreFromRecord(record: unknown, filePath?: string): MapCounterStore {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw new InputError('Counter file must hold a JSON object of tracker ids to counts', 'ERR_COUNTER_INVALID', {
      filePath,
    });
  }

  const counts = new Map<TrackerId, number>();
  for (const [tracker, value] of Object.entries(record)) {
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
      throw new InputError(
        `Counter ${tracker} must be a non-negative integer, got ${JSON.stringify(value)}`,
        'ERR_COUNTER_INVALID',
        { filePath, tracker },
        'Counters are hit counts written by the instrumented program',
      );
    }
    counts.set(toTrackerId(tracker), value);
  }
  return new MapCounterStore(counts);
}

export function loadCounterStore(filePath: string): MapCounterStore {
  return counterStoreFromRecord(readJsonFile(filePath), filePath);
}
