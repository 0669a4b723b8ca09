/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './parser';
export { DictReducer, reduceEvents, toMapping, toDict } from './convert/dict-builder';
export { EdgeCountTable, countEdgeEvents, countEdges, countPaths } from './convert/edge-counter';
export type { EdgeCount } from './convert/edge-counter';
export { isComplete, describeFailure } from './convert/fold';
export type { FoldResult } from './convert/fold';
export { toPlain } from './convert/node';
export type { XmlValue, XmlItem, XmlNull, XmlLeaf, XmlList, XmlMap, PlainValue, PlainObject } from './convert/node';
export { DEFAULT_CHUNK_SIZE, LOG_LEVEL_ENV, createDefaultLogger } from './config';
export type { ReaderOptions, FoldOptions } from './config';
export { ConsoleLogger } from './common/console-logger';
export type { Logger, LogLevel } from './common/logger';
