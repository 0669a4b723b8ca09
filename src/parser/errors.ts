/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/**
 * Where in the input a failure was detected.
 * `offset` counts bytes from the start of the file, `line` and `column` are 1-based.
 */
export interface XmlPosition {
  offset: number;
  line: number;
  column: number;
}

export class XmlIterError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'XmlIterError';
    this.cause = cause;
  }
}

/** The file could not be opened, inspected or read. */
export class XmlReadError extends XmlIterError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, cause);
    this.name = 'XmlReadError';
    this.path = path;
  }
}

export class XmlDecodeError extends XmlIterError {
  /** Byte offset where the undecodable bytes start; the text before it has been read. */
  readonly offset: number;
  readonly encoding: string;

  constructor(message: string, offset: number, encoding: string, cause?: unknown) {
    super(`${message} (${encoding}, byte ${offset})`, cause);
    this.name = 'XmlDecodeError';
    this.offset = offset;
    this.encoding = encoding;
  }
}

export class XmlSyntaxError extends XmlIterError {
  readonly position: XmlPosition | undefined;

  constructor(message: string, position?: XmlPosition, cause?: unknown) {
    super(
      position ? `${message} at line ${position.line}, column ${position.column}` : message,
      cause
    );
    this.name = 'XmlSyntaxError';
    this.position = position;
  }
}

/** An end tag that does not close the innermost open element. */
export class XmlTagMismatchError extends XmlSyntaxError {
  readonly expected: string | undefined;
  readonly actual: string;

  constructor(expected: string | undefined, actual: string, position?: XmlPosition) {
    super(
      expected === undefined
        ? `Unexpected end tag </${actual}> with no open element`
        : `Expected </${expected}> but found </${actual}>`,
      position
    );
    this.name = 'XmlTagMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class XmlOptionsError extends XmlIterError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid option "${option}": ${message}`);
    this.name = 'XmlOptionsError';
    this.option = option;
  }
}
