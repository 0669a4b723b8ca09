/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { scopedLogger } from '../common/logger';
import { resolveFoldOptions, type FoldOptions } from '../config';
import { XmlTagMismatchError } from '../parser/errors';
import { XmlEventReader } from '../parser/event-reader';
import type { XmlEvent } from '../parser/types';
import { describeFailure, drainEvents, toFoldResult, type FoldResult } from './fold';
import { XML_NULL, attach, emptyMap, leaf, toPlain, type PlainObject, type XmlItem, type XmlMap } from './node';

/** One open element: its child entries once it has any, otherwise its text runs. */
interface Frame {
  tag: string;
  children: XmlMap | undefined;
  text: string[];
}

/**
 * Builds the xmltodict-shaped mapping of a document, one event at a time:
 * - `<a/>`, `<a></a>` and whitespace-only `<a> </a>` become null.
 * - Text-only elements become their text, trimmed at both ends.
 * - Elements with child elements become maps; their own text is dropped.
 * - A repeated sibling tag turns its entry into a list in document order.
 */
export class DictReducer {
  private readonly root: XmlMap = emptyMap();
  private readonly frames: Frame[] = [];
  /** Open elements inside a subtree cut off by maxDepth. */
  private skipped = 0;

  constructor(private readonly maxDepth?: number) {}

  accept(event: XmlEvent): void {
    if (this.skipped > 0) {
      if (event.kind === 'start') this.skipped++;
      else if (event.kind === 'end') this.skipped--;
      return;
    }
    switch (event.kind) {
      case 'start':
        if (this.tooDeep()) this.skipped = 1;
        else this.frames.push({ tag: event.value, children: undefined, text: [] });
        return;
      case 'text': {
        const frame = this.frames[this.frames.length - 1];
        if (frame && !frame.children) frame.text.push(event.value);
        return;
      }
      case 'empty':
        if (!this.tooDeep()) attach(this.parentMap(), event.value, XML_NULL);
        return;
      case 'end': {
        const frame = this.frames[this.frames.length - 1];
        if (!frame || frame.tag !== event.value) throw new XmlTagMismatchError(frame?.tag, event.value);
        this.closeFrame();
        return;
      }
    }
  }

  /**
   * Close whatever is still open, innermost first, and return the document mapping.
   */
  finish(): XmlMap {
    this.skipped = 0;
    while (this.frames.length > 0) this.closeFrame();
    return this.root;
  }

  private tooDeep(): boolean {
    return this.maxDepth !== undefined && this.frames.length >= this.maxDepth;
  }

  private parentMap(): XmlMap {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) return this.root;
    if (!frame.children) {
      frame.children = emptyMap();
      frame.text.length = 0;
    }
    return frame.children;
  }

  private closeFrame(): void {
    const frame = this.frames.pop();
    if (!frame) return;
    attach(this.parentMap(), frame.tag, this.finalize(frame));
  }

  private finalize(frame: Frame): XmlItem {
    if (frame.children) return frame.children;
    const text = frame.text.join('').trim();
    return text ? leaf(text) : XML_NULL;
  }
}

/**
 * Fold any event sequence into a document mapping. A failure in the sequence ends the fold
 * with the mapping built so far.
 */
export function reduceEvents(events: Iterable<XmlEvent>, options: FoldOptions = {}): FoldResult<XmlMap> {
  const resolved = resolveFoldOptions(options);
  const reducer = new DictReducer(resolved.maxDepth);
  const outcome = drainEvents(events, resolved.maxEvents, (event) => reducer.accept(event));
  const result = toFoldResult(reducer.finish(), outcome);
  if (!result.ok) scopedLogger(resolved.logger, 'dict').warn(`partial mapping: ${describeFailure(result)}`);
  return result;
}

/**
 * Convert the XML file at `path` into an xmltodict-shaped mapping.
 * Throws only when the file cannot be read or the options are invalid.
 */
export function toMapping(path: string, options: FoldOptions = {}): FoldResult<XmlMap> {
  const resolved = resolveFoldOptions(options);
  return reduceEvents(new XmlEventReader(path, resolved), resolved);
}

/** `toMapping` rendered as plain JSON-compatible data. */
export function toDict(path: string, options: FoldOptions = {}): PlainObject {
  return toPlain(toMapping(path, options).value);
}
