/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from './common/console-logger';
import { isLogLevel, type LogLevel, type Logger } from './common/logger';
import { XmlOptionsError } from './parser/errors';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;
/** The XML declaration must fit into the first chunk for encoding sniffing. */
export const MIN_CHUNK_SIZE = 1024;
export const LOG_LEVEL_ENV = 'XML_EVENTS_LOG_LEVEL';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface ReaderOptions {
  /** Bytes read from the file per refill. */
  chunkSize?: number;
  /** Encoding label that overrides BOM and declaration sniffing. */
  encoding?: string;
  /** Strip namespace prefixes from tag names (`ns:item` becomes `item`). */
  localNames?: boolean;
  logger?: Logger;
}

export interface FoldOptions extends ReaderOptions {
  /** Stop after this many events. */
  maxEvents?: number;
  /** Leave out elements nested deeper than this (the root element is depth 1). */
  maxDepth?: number;
}

export interface ResolvedReaderOptions {
  chunkSize: number;
  encoding: string | undefined;
  localNames: boolean;
  logger: Logger;
}

export interface ResolvedFoldOptions extends ResolvedReaderOptions {
  maxEvents: number | undefined;
  maxDepth: number | undefined;
}

/**
 * Log level from the environment; unknown values fall back to the default.
 */
export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

export function createDefaultLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return new ConsoleLogger(readLogLevel(env));
}

function checkCount(option: string, value: number | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < min) {
    throw new XmlOptionsError(option, `expected an integer >= ${min}, got ${value}`);
  }
  return value;
}

export function resolveReaderOptions(options: ReaderOptions = {}): ResolvedReaderOptions {
  const encoding = options.encoding?.trim();
  if (options.encoding !== undefined && !encoding) {
    throw new XmlOptionsError('encoding', 'expected a non-empty label');
  }
  return {
    chunkSize: checkCount('chunkSize', options.chunkSize, MIN_CHUNK_SIZE) ?? DEFAULT_CHUNK_SIZE,
    encoding,
    localNames: options.localNames ?? false,
    logger: options.logger ?? createDefaultLogger(),
  };
}

export function resolveFoldOptions(options: FoldOptions = {}): ResolvedFoldOptions {
  return {
    ...resolveReaderOptions(options),
    maxEvents: checkCount('maxEvents', options.maxEvents, 0),
    maxDepth: checkCount('maxDepth', options.maxDepth, 0),
  };
}
