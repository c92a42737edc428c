// src/watch/watch.ts
/**
 * Purpose:
 * - Blocking-query loop over any indexed read: feeds each response's
 *   lastIndex back as the next waitIndex and yields only when it moves.
 *
 * Invariants:
 * - First response is always yielded (it establishes the baseline); after
 *   that only responses whose index differs from the last yielded one.
 * - Index moved backwards (snapshot restore, leader change): the next call is
 *   sent without an index, so it returns at once and re-establishes the baseline.
 * - An index below 1 is sent as 1 so a zero never turns into a busy loop.
 * - Aborting the signal ends the loop quietly, even mid-request.
 * - Other errors from the query end the loop and reach the consumer; no retries.
 */

import type { QueryMeta, QueryOptions } from "../http/options";

export type IndexedQuery<T> = (q: QueryOptions) => Promise<[T, QueryMeta]>;

export interface WatchOptions extends QueryOptions {
  /** Stops the loop; also aborts the in-flight request. */
  signal?: AbortSignal;
}

export async function* watch<T>(
  query: IndexedQuery<T>,
  options: WatchOptions = {}
): AsyncGenerator<[T, QueryMeta], void, undefined> {
  const { signal, ...base } = options;
  let waitIndex = base.waitIndex ?? 0;
  // index of the last result handed to the consumer
  let seen: number | undefined;

  while (!signal?.aborted) {
    let result: [T, QueryMeta];
    try {
      result = await query({ ...base, signal, waitIndex });
    } catch (err) {
      // the transport rejects on abort
      if (signal?.aborted) return;
      throw err;
    }
    if (signal?.aborted) return;
    const [value, meta] = result;

    const changed = seen === undefined || meta.lastIndex !== seen;

    if (meta.lastIndex < 1) waitIndex = 1;
    else if (meta.lastIndex < waitIndex) waitIndex = 0;
    else waitIndex = meta.lastIndex;

    if (changed) {
      seen = meta.lastIndex;
      yield [value, meta];
    }
  }
}
