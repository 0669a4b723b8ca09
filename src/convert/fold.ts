/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XmlDecodeError, XmlIterError, XmlReadError, XmlSyntaxError } from '../parser/errors';
import type { XmlEvent } from '../parser/types';

/**
 * Outcome of folding an event stream. A failed fold still carries what was built
 * from the events before the failure.
 */
export type FoldResult<T> =
  | { ok: true; value: T; eventCount: number; truncated: boolean }
  | { ok: false; value: T; eventCount: number; truncated: false; error: XmlIterError };

/**
 * Whether the fold saw the whole document: no failure and no event limit hit.
 */
export function isComplete<T>(result: FoldResult<T>): boolean {
  return result.ok && !result.truncated;
}

/**
 * One-line summary of why a fold stopped early, or undefined for a complete fold.
 */
export function describeFailure<T>(result: FoldResult<T>): string | undefined {
  if (!result.ok) {
    const { error } = result;
    let where = '';
    if (error instanceof XmlSyntaxError && error.position) where = ` (byte ${error.position.offset})`;
    else if (error instanceof XmlDecodeError) where = ` (byte ${error.offset})`;
    return `${error.name} after ${result.eventCount} events${where}: ${error.message}`;
  }
  if (result.truncated) return `stopped at the event limit after ${result.eventCount} events`;
  return undefined;
}

export interface DrainOutcome {
  eventCount: number;
  truncated: boolean;
  error: XmlIterError | undefined;
}

/**
 * Feed `events` to `accept` until they run out, `maxEvents` is reached or a failure occurs.
 * At the limit one more event is pulled, unaccepted, so a stream that ends exactly there is
 * not reported as truncated. Parse failures end the drain and are returned; read failures and
 * anything that is not an XmlIterError propagate. The iterator is always closed.
 */
export function drainEvents(
  events: Iterable<XmlEvent>,
  maxEvents: number | undefined,
  accept: (event: XmlEvent) => void
): DrainOutcome {
  const iterator = events[Symbol.iterator]();
  let eventCount = 0;
  try {
    for (;;) {
      const step = iterator.next();
      if (step.done) return { eventCount, truncated: false, error: undefined };
      if (maxEvents !== undefined && eventCount >= maxEvents) {
        return { eventCount, truncated: true, error: undefined };
      }
      eventCount++;
      accept(step.value);
    }
  } catch (err) {
    if (err instanceof XmlReadError || !(err instanceof XmlIterError)) throw err;
    return { eventCount, truncated: false, error: err };
  } finally {
    iterator.return?.();
  }
}

export function toFoldResult<T>(value: T, outcome: DrainOutcome): FoldResult<T> {
  const { eventCount, truncated, error } = outcome;
  if (error) return { ok: false, value, eventCount, truncated: false, error };
  return { ok: true, value, eventCount, truncated };
}
