/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect, vi } from 'vitest';
import { XmlDecodeError, XmlReadError } from '../parser/errors';
import type { XmlEvent } from '../parser/types';
import { ev } from '../test/helpers';
import { describeFailure, drainEvents, isComplete, toFoldResult } from './fold';

function source(events: XmlEvent[], failure?: Error): { iterable: Iterable<XmlEvent>; closed: () => number } {
  const onReturn = vi.fn();
  const iterable: Iterable<XmlEvent> = {
    [Symbol.iterator]: () => {
      let i = 0;
      const iterator: Iterator<XmlEvent> = {
        next: () => {
          if (i < events.length) return { done: false, value: events[i++] };
          if (failure) throw failure;
          return { done: true, value: undefined };
        },
        return: () => {
          onReturn();
          return { done: true, value: undefined };
        },
      };
      return iterator;
    },
  };
  return { iterable, closed: () => onReturn.mock.calls.length };
}

const three = [ev(0, 'start', 'a'), ev(1, 'text', 'x'), ev(2, 'end', 'a')];

describe('drainEvents', () => {
  it('feeds every event and closes the source', () => {
    const seen: string[] = [];
    const { iterable, closed } = source(three);
    expect(drainEvents(iterable, undefined, (e) => seen.push(e.value))).toEqual({
      eventCount: 3,
      truncated: false,
      error: undefined,
    });
    expect(seen).toEqual(['a', 'x', 'a']);
    expect(closed()).toBe(1);
  });

  it('stops at the limit when more events follow', () => {
    const accept = vi.fn();
    const { iterable, closed } = source(three);
    expect(drainEvents(iterable, 2, accept)).toEqual({ eventCount: 2, truncated: true, error: undefined });
    expect(accept).toHaveBeenCalledTimes(2);
    expect(closed()).toBe(1);
  });

  it('is not truncated when the stream ends exactly at the limit', () => {
    const accept = vi.fn();
    const { iterable } = source(three);
    expect(drainEvents(iterable, 3, accept)).toEqual({ eventCount: 3, truncated: false, error: undefined });
    expect(accept).toHaveBeenCalledTimes(3);
  });

  it('returns parse failures', () => {
    const failure = new XmlDecodeError('Input is not valid text', 4, 'utf-8');
    const { iterable } = source(three.slice(0, 1), failure);
    expect(drainEvents(iterable, undefined, () => undefined)).toEqual({
      eventCount: 1,
      truncated: false,
      error: failure,
    });
  });

  it('rethrows read failures and foreign errors', () => {
    const unreadable = source([], new XmlReadError('Failed to read XML file x.xml', 'x.xml'));
    expect(() => drainEvents(unreadable.iterable, undefined, () => undefined)).toThrow(XmlReadError);
    expect(unreadable.closed()).toBe(1);

    const { iterable } = source(three);
    expect(() =>
      drainEvents(iterable, undefined, () => {
        throw new TypeError('boom');
      })
    ).toThrow(TypeError);
  });
});

describe('describeFailure', () => {
  it('is undefined for a complete fold', () => {
    const result = toFoldResult('v', { eventCount: 3, truncated: false, error: undefined });
    expect(isComplete(result)).toBe(true);
    expect(describeFailure(result)).toBeUndefined();
  });

  it('mentions the event limit', () => {
    const result = toFoldResult('v', { eventCount: 4, truncated: true, error: undefined });
    expect(isComplete(result)).toBe(false);
    expect(describeFailure(result)).toBe('stopped at the event limit after 4 events');
  });

  it('names the error and its byte offset', () => {
    const error = new XmlDecodeError('Input is not valid text', 4096, 'utf-8');
    const result = toFoldResult('v', { eventCount: 7, truncated: false, error });
    expect(result.ok).toBe(false);
    expect(describeFailure(result)).toBe(
      'XmlDecodeError after 7 events (byte 4096): Input is not valid text (utf-8, byte 4096)'
    );
  });
});
