/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { scopedLogger } from '../common/logger';
import { resolveFoldOptions, type FoldOptions } from '../config';
import { XmlEventReader } from '../parser/event-reader';
import type { XmlEvent } from '../parser/types';
import { describeFailure, drainEvents, toFoldResult, type FoldResult } from './fold';

export interface EdgeCount {
  parent: string;
  child: string;
  count: number;
}

/**
 * Occurrences of each parent → child tag pair.
 */
export class EdgeCountTable {
  private readonly counts = new Map<string, Map<string, number>>();

  increment(parent: string, child: string): void {
    let children = this.counts.get(parent);
    if (!children) {
      children = new Map();
      this.counts.set(parent, children);
    }
    children.set(child, (children.get(child) ?? 0) + 1);
  }

  get(parent: string, child: string): number {
    return this.counts.get(parent)?.get(child) ?? 0;
  }

  /** Number of distinct pairs. */
  get size(): number {
    let size = 0;
    for (const children of this.counts.values()) size += children.size;
    return size;
  }

  /** Sum of all counts. */
  get total(): number {
    let total = 0;
    for (const { count } of this.entries()) total += count;
    return total;
  }

  *entries(): IterableIterator<EdgeCount> {
    for (const [parent, children] of this.counts) {
      for (const [child, count] of children) yield { parent, child, count };
    }
  }

  toJSON(): Record<string, Record<string, number>> {
    const out: Record<string, Record<string, number>> = {};
    for (const [parent, children] of this.counts) out[parent] = Object.fromEntries(children);
    return out;
  }
}

/**
 * Fold an event sequence into parent → child counts. Every start or empty event below the
 * root counts once against the element that is open at that point.
 */
export function countEdgeEvents(
  events: Iterable<XmlEvent>,
  options: FoldOptions = {}
): FoldResult<EdgeCountTable> {
  const resolved = resolveFoldOptions(options);
  const table = new EdgeCountTable();
  const stack: string[] = [];
  const outcome = drainEvents(events, resolved.maxEvents, (event) => {
    if (event.kind === 'start' || event.kind === 'empty') {
      const parent = stack[stack.length - 1];
      if (parent !== undefined) table.increment(parent, event.value);
      if (event.kind === 'start') stack.push(event.value);
    } else if (event.kind === 'end') {
      stack.pop();
    }
  });
  const result = toFoldResult(table, outcome);
  if (!result.ok) scopedLogger(resolved.logger, 'edges').warn(`partial edge counts: ${describeFailure(result)}`);
  return result;
}

export function countEdges(path: string, options: FoldOptions = {}): FoldResult<EdgeCountTable> {
  const resolved = resolveFoldOptions(options);
  return countEdgeEvents(new XmlEventReader(path, resolved), resolved);
}

/**
 * Count every root-to-element path, keyed as `root/child/grandchild`.
 */
export function countPaths(path: string, options: FoldOptions = {}): FoldResult<Map<string, number>> {
  const resolved = resolveFoldOptions(options);
  const counts = new Map<string, number>();
  const stack: string[] = [];
  const outcome = drainEvents(new XmlEventReader(path, resolved), resolved.maxEvents, (event) => {
    if (event.kind === 'start' || event.kind === 'empty') {
      const key = [...stack, event.value].join('/');
      counts.set(key, (counts.get(key) ?? 0) + 1);
      if (event.kind === 'start') stack.push(event.value);
    } else if (event.kind === 'end') {
      stack.pop();
    }
  });
  const result = toFoldResult(counts, outcome);
  if (!result.ok) scopedLogger(resolved.logger, 'paths').warn(`partial path counts: ${describeFailure(result)}`);
  return result;
}
