/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import { scopedLogger, type Logger } from '../common/logger';
import { resolveReaderOptions, type ReaderOptions } from '../config';
import type { ResolvedEncoding } from './encoding';
import { XmlReadError, XmlTagMismatchError } from './errors';
import { XmlTokenizer } from './tokenizer';
import type { RawToken, XmlEvent, XmlEventKind } from './types';

function assertReadableFile(filePath: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(filePath);
  } catch (err) {
    throw new XmlReadError(`Failed to open XML file ${filePath}`, filePath, err);
  }
  if (!stats.isFile()) {
    throw new XmlReadError(`Not a regular file: ${filePath}`, filePath);
  }
}

function localName(name: string): string {
  const colonIdx = name.indexOf(':');
  return colonIdx >= 0 ? name.slice(colonIdx + 1) : name;
}

/**
 * Forward-only cursor over the events of one XML file.
 *
 * The file is opened on the first `next()` and closed when the events run out, when a failure is
 * thrown, or when the consumer stops early through `return()` / `close()` (which is what `break`
 * in a `for...of` loop calls). Only the open-element stack and one look-ahead token are kept.
 */
export class XmlEventReader implements IterableIterator<XmlEvent> {
  readonly path: string;
  private readonly tokenizer: XmlTokenizer;
  private readonly logger: Logger;
  private readonly localNames: boolean;
  private readonly stack: string[] = [];
  private lookahead: RawToken | undefined;
  private deferred: unknown;
  private hasDeferred = false;
  private count = 0;
  private finished = false;

  constructor(path: string, options: ReaderOptions = {}) {
    const resolved = resolveReaderOptions(options);
    assertReadableFile(path);
    this.path = path;
    this.localNames = resolved.localNames;
    this.logger = scopedLogger(resolved.logger, 'reader');
    this.tokenizer = new XmlTokenizer(path, {
      chunkSize: resolved.chunkSize,
      encoding: resolved.encoding,
      logger: this.logger,
    });
  }

  [Symbol.iterator](): XmlEventReader {
    return this;
  }

  /** Number of events handed out so far. */
  get eventCount(): number {
    return this.count;
  }

  /** Number of currently open elements. */
  get depth(): number {
    return this.stack.length;
  }

  get bytesRead(): number {
    return this.tokenizer.bytesRead;
  }

  get encoding(): ResolvedEncoding | undefined {
    return this.tokenizer.encoding;
  }

  get closed(): boolean {
    return this.finished;
  }

  next(): IteratorResult<XmlEvent> {
    if (this.finished) return { done: true, value: undefined };
    let event: XmlEvent | undefined;
    try {
      event = this.produce();
    } catch (err) {
      this.finish();
      throw err;
    }
    if (event) return { done: false, value: event };
    this.finish();
    return { done: true, value: undefined };
  }

  return(): IteratorResult<XmlEvent> {
    this.finish();
    return { done: true, value: undefined };
  }

  close(): void {
    this.finish();
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.lookahead = undefined;
    this.stack.length = 0;
    this.tokenizer.close();
  }

  private take(): RawToken | undefined {
    const token = this.lookahead;
    if (token) {
      this.lookahead = undefined;
      return token;
    }
    return this.tokenizer.next();
  }

  private emit(kind: XmlEventKind, value: string): XmlEvent {
    const event: XmlEvent = { index: this.count, kind, value };
    this.count++;
    return event;
  }

  private tagName(name: string): string {
    return this.localNames ? localName(name) : name;
  }

  private produce(): XmlEvent | undefined {
    for (;;) {
      if (this.hasDeferred) {
        const failure = this.deferred;
        this.hasDeferred = false;
        this.deferred = undefined;
        throw failure;
      }
      const token = this.take();
      if (!token) return undefined;

      switch (token.type) {
        case 'open': {
          const name = this.tagName(token.name);
          this.stack.push(name);
          return this.emit('start', name);
        }
        case 'close': {
          const name = this.tagName(token.name);
          const open = this.stack.pop();
          if (open !== name) throw new XmlTagMismatchError(open, name);
          return this.emit('end', name);
        }
        case 'selfClose':
          return this.emit('empty', this.tagName(token.name));
        case 'text': {
          const text = this.coalesce(token.text);
          // whitespace around the root element is not content
          if (this.stack.length === 0) continue;
          return this.emit('text', text);
        }
      }
    }
  }

  /** Join the text tokens that follow `first` (CDATA sections, split runs). */
  private coalesce(first: string): string {
    let text = first;
    for (;;) {
      let peek: RawToken | undefined;
      try {
        peek = this.take();
      } catch (err) {
        // hand out the text read so far, fail on the next pull
        this.deferred = err;
        this.hasDeferred = true;
        return text;
      }
      if (!peek) return text;
      if (peek.type !== 'text') {
        this.lookahead = peek;
        return text;
      }
      text += peek.text;
    }
  }
}

/**
 * Lazily iterate the events of the XML file at `path`.
 */
export function iterate(path: string, options: ReaderOptions = {}): XmlEventReader {
  return new XmlEventReader(path, options);
}
