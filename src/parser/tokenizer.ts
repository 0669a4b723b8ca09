/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as sax from 'sax';
import type { Logger } from '../common/logger';
import { createDecoder, decodeValidPrefix, encodedLength, resolveEncoding, type ResolvedEncoding } from './encoding';
import {
  XmlDecodeError,
  XmlReadError,
  XmlSyntaxError,
  XmlTagMismatchError,
  type XmlIterError,
  type XmlPosition,
} from './errors';
import type { RawToken } from './types';

/** Longest byte sequence a decoder may hold back between chunks. */
const MAX_PENDING_BYTES = 3;

/** The close tag sax is reading while it reports an error, if any. */
function closingTagName(parser: sax.SAXParser): string | undefined {
  return 'tagName' in parser && typeof parser.tagName === 'string' ? parser.tagName : undefined;
}

function isCloseTagError(message: string): boolean {
  return message === 'Unexpected close tag' || message.startsWith('Unmatched closing tag');
}

export interface TokenizerOptions {
  chunkSize: number;
  encoding: string | undefined;
  logger: Logger;
}

/**
 * Pull-based token source over a file.
 * Reads one chunk at a time, pushes it through a strict sax parser and queues the callbacks
 * as tokens; the next chunk is only read once the queue is drained.
 */
export class XmlTokenizer {
  private readonly parser: sax.SAXParser;
  private readonly queue: RawToken[] = [];
  /** Names of the elements sax has open. */
  private readonly openTags: string[] = [];
  private readonly buffer: Buffer;
  private fd: number | undefined;
  private decoder: TextDecoder | undefined;
  private resolved: ResolvedEncoding | undefined;
  /** Last bytes handed to the decoder, which may still hold part of a character. */
  private tail: Uint8Array = new Uint8Array(0);
  private bytes = 0;
  /** Source bytes and characters of the text already written to sax. */
  private fedBytes = 0;
  private fedChars = 0;
  /** Text of the write in progress, used to place errors. */
  private writing = '';
  private selfClosing = false;
  private failure: XmlIterError | undefined;
  private halted = false;
  private done = false;

  constructor(
    private readonly filePath: string,
    private readonly options: TokenizerOptions
  ) {
    this.buffer = Buffer.alloc(options.chunkSize);
    this.parser = sax.parser(true, { trim: false, normalize: false, position: true });

    this.parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
      if (this.halted) return;
      if (tag.isSelfClosing) {
        // sax follows up with onclosetag for the same element
        this.selfClosing = true;
        this.queue.push({ type: 'selfClose', name: tag.name });
      } else {
        this.openTags.push(tag.name);
        this.queue.push({ type: 'open', name: tag.name });
      }
    };
    this.parser.onclosetag = (name: string) => {
      if (this.halted) return;
      if (this.selfClosing) {
        this.selfClosing = false;
        return;
      }
      this.openTags.pop();
      this.queue.push({ type: 'close', name });
    };
    this.parser.ontext = (text: string) => {
      if (!this.halted) this.queue.push({ type: 'text', text });
    };
    this.parser.oncdata = (text: string) => {
      if (!this.halted && text) this.queue.push({ type: 'text', text });
    };
    this.parser.onerror = (err: Error) => {
      if (this.halted) return;
      this.halted = true;
      const message = err.message.split('\n')[0];
      const closing = closingTagName(this.parser);
      this.failure =
        closing !== undefined && isCloseTagError(message)
          ? new XmlTagMismatchError(this.openTags[this.openTags.length - 1], closing, this.position())
          : new XmlSyntaxError(message, this.position(), err);
    };
  }

  get bytesRead(): number {
    return this.bytes;
  }

  get encoding(): ResolvedEncoding | undefined {
    return this.resolved;
  }

  get closed(): boolean {
    return this.done;
  }

  /**
   * Next token, or undefined at end of input.
   * Tokens lexed before a failure are returned first; the failure is thrown once, after them.
   */
  next(): RawToken | undefined {
    for (;;) {
      const token = this.queue.shift();
      if (token) return token;
      if (this.failure) {
        const failure = this.failure;
        this.failure = undefined;
        this.close();
        throw failure;
      }
      if (this.done) return undefined;
      this.pump();
    }
  }

  /** Stop reading and drop anything not yet handed out. */
  close(): void {
    this.halted = true;
    this.failure = undefined;
    this.queue.length = 0;
    this.release();
  }

  private release(): void {
    this.done = true;
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    try {
      fs.closeSync(fd);
      this.options.logger.debug(`closed ${this.filePath} after ${this.bytes} bytes`);
    } catch (err) {
      this.options.logger.warn(`failed to close ${this.filePath}`, err);
    }
  }

  private open(): number {
    if (this.fd !== undefined) return this.fd;
    try {
      this.fd = fs.openSync(this.filePath, 'r');
    } catch (err) {
      this.close();
      throw new XmlReadError(`Failed to open XML file ${this.filePath}`, this.filePath, err);
    }
    this.options.logger.debug(`reading ${this.filePath}`);
    return this.fd;
  }

  private pump(): void {
    const fd = this.open();
    let read: number;
    try {
      read = fs.readSync(fd, this.buffer, 0, this.buffer.length, null);
    } catch (err) {
      this.close();
      throw new XmlReadError(`Failed to read XML file ${this.filePath}`, this.filePath, err);
    }
    const chunkOffset = this.bytes;
    this.bytes += read;

    if (read === 0) {
      this.finishInput(chunkOffset);
      return;
    }

    let chunk = this.buffer.subarray(0, read);
    let start = chunkOffset;
    if (!this.decoder) {
      const resolved = this.resolve(chunk);
      chunk = chunk.subarray(resolved.bomLength);
      start += resolved.bomLength;
      this.fedBytes = resolved.bomLength;
    }
    this.decodeChunk(chunk, start);
  }

  private resolve(head: Uint8Array): ResolvedEncoding {
    const resolved = resolveEncoding(head, this.options.encoding);
    if (resolved.rejected !== undefined) {
      this.options.logger.warn(`unsupported encoding "${resolved.rejected}" in ${this.filePath}, using ${resolved.name}`);
    }
    this.options.logger.debug(`encoding ${resolved.name} (${resolved.source})`);
    this.resolved = resolved;
    this.decoder = createDecoder(resolved);
    return resolved;
  }

  private decodeChunk(chunk: Uint8Array, start: number): void {
    const { decoder, resolved } = this;
    if (!decoder || !resolved) return;
    let text: string;
    try {
      text = decoder.decode(chunk, { stream: true });
    } catch (err) {
      this.failDecode(resolved, chunk, start, err);
      return;
    }
    const kept = chunk.subarray(Math.max(0, chunk.length - MAX_PENDING_BYTES));
    this.tail = Buffer.concat([this.tail, kept]).subarray(-MAX_PENDING_BYTES);
    this.feed(text);
  }

  /**
   * Feed the text in front of the undecodable bytes, then fail at the byte where they start.
   * Bytes the decoder was still holding from the previous chunk are decoded again with `chunk`.
   */
  private failDecode(resolved: ResolvedEncoding, chunk: Uint8Array, start: number, cause: unknown): void {
    const held = Math.min(this.tail.length, Math.max(0, start - this.fedBytes));
    const bytes = Buffer.concat([this.tail.subarray(this.tail.length - held), chunk]);
    this.feed(decodeValidPrefix(bytes, resolved));
    this.failure ??= new XmlDecodeError('Input is not valid text', this.fedBytes, resolved.name, cause);
    this.halted = true;
    this.release();
  }

  private feed(text: string): void {
    if (!text || this.halted) return;
    this.writing = text;
    this.parser.write(text);
    this.fedChars += text.length;
    this.fedBytes += encodedLength(text, this.resolved?.name ?? 'utf-8');
    this.writing = '';
  }

  private finishInput(offset: number): void {
    const { decoder, resolved } = this;
    if (decoder && resolved && !this.halted) {
      let text: string;
      try {
        text = decoder.decode();
      } catch (err) {
        this.failDecode(resolved, new Uint8Array(0), offset, err);
        return;
      }
      this.feed(text);
    }
    if (!this.halted) this.parser.close();
    // tokens and a failure raised by the final flush are still handed out by next()
    this.release();
  }

  private position(): XmlPosition {
    const consumed = Math.max(0, this.parser.position - this.fedChars);
    const partial = this.writing.slice(0, consumed);
    return {
      offset: this.fedBytes + encodedLength(partial, this.resolved?.name ?? 'utf-8'),
      line: this.parser.line + 1,
      column: this.parser.column,
    };
  }
}
