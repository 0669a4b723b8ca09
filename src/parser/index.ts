/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { iterate, XmlEventReader } from './event-reader';
export {
  XmlIterError,
  XmlReadError,
  XmlDecodeError,
  XmlSyntaxError,
  XmlTagMismatchError,
  XmlOptionsError,
} from './errors';
export type { XmlPosition } from './errors';
export type { ResolvedEncoding, EncodingSource } from './encoding';
export type { XmlEvent, XmlEventKind } from './types';
