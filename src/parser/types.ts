/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Raw lexer tokens and the normalized events built from them.
*/

export type XmlEventKind = 'start' | 'end' | 'text' | 'empty';

/**
 * One structural event of a document, in document order.
 */
export interface XmlEvent {
  /** 0 for the first event of a stream, then +1 per event. */
  readonly index: number;
  readonly kind: XmlEventKind;
  /** Tag name for start, end and empty; character data for text. */
  readonly value: string;
}

/** Tokens handed from the tokenizer to the event reader. Comments and PIs never get here. */
export type RawToken =
  | { type: 'open'; name: string }
  | { type: 'close'; name: string }
  | { type: 'selfClose'; name: string }
  | { type: 'text'; text: string };
