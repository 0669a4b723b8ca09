/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export const DEFAULT_ENCODING = 'utf-8';

export type EncodingSource = 'bom' | 'override' | 'pattern' | 'declaration' | 'default';

export interface ResolvedEncoding {
  /** Canonical name as reported by TextDecoder, e.g. `utf-8` or `windows-1252`. */
  name: string;
  source: EncodingSource;
  /** Bytes of byte order mark to skip before decoding. */
  bomLength: number;
  /** Label that was asked for but could not be used; `name` is then the default. */
  rejected?: string;
}

const DECLARATION_PATTERN = /^<\?xml\s[^>]*?\bencoding\s*=\s*(["'])([A-Za-z][A-Za-z0-9._:-]*)\1/;
const DECLARATION_SCAN_BYTES = 1024;

function startsWith(head: Uint8Array, bytes: number[]): boolean {
  return head.length >= bytes.length && bytes.every((b, i) => head[i] === b);
}

function detectBom(head: Uint8Array): ResolvedEncoding | undefined {
  if (startsWith(head, [0xef, 0xbb, 0xbf])) return { name: 'utf-8', source: 'bom', bomLength: 3 };
  if (startsWith(head, [0xff, 0xfe])) return { name: 'utf-16le', source: 'bom', bomLength: 2 };
  if (startsWith(head, [0xfe, 0xff])) return { name: 'utf-16be', source: 'bom', bomLength: 2 };
  return undefined;
}

function detectPattern(head: Uint8Array): ResolvedEncoding | undefined {
  if (startsWith(head, [0x3c, 0x00, 0x3f, 0x00])) return { name: 'utf-16le', source: 'pattern', bomLength: 0 };
  if (startsWith(head, [0x00, 0x3c, 0x00, 0x3f])) return { name: 'utf-16be', source: 'pattern', bomLength: 0 };
  return undefined;
}

/**
 * Read the `encoding` pseudo-attribute of an XML declaration at the very start of `head`.
 */
export function readDeclaredEncoding(head: Uint8Array): string | undefined {
  const prolog = Buffer.from(head.subarray(0, DECLARATION_SCAN_BYTES)).toString('latin1');
  const match = DECLARATION_PATTERN.exec(prolog);
  return match ? match[2] : undefined;
}

/** Canonical decoder name for `label`, or undefined when the runtime has no decoder for it. */
export function canonicalEncoding(label: string): string | undefined {
  try {
    return new TextDecoder(label).encoding;
  } catch {
    return undefined;
  }
}

/**
 * Pick the encoding for a document from its first bytes.
 * Order: byte order mark, caller override, UTF-16 shape of `<?`, declaration, UTF-8.
 * Labels without a decoder fall back to UTF-8 and are reported in `rejected`.
 */
export function resolveEncoding(head: Uint8Array, override?: string): ResolvedEncoding {
  const bom = detectBom(head);
  if (bom) return bom;

  if (override !== undefined) {
    const name = canonicalEncoding(override);
    if (name) return { name, source: 'override', bomLength: 0 };
    return { name: DEFAULT_ENCODING, source: 'default', bomLength: 0, rejected: override };
  }

  const pattern = detectPattern(head);
  if (pattern) return pattern;

  const declared = readDeclaredEncoding(head);
  if (declared === undefined) return { name: DEFAULT_ENCODING, source: 'default', bomLength: 0 };

  const name = canonicalEncoding(declared);
  // the declaration was readable as ASCII, so the bytes cannot be UTF-16
  if (!name || name.startsWith('utf-16')) {
    return { name: DEFAULT_ENCODING, source: 'default', bomLength: 0, rejected: declared };
  }
  return { name, source: 'declaration', bomLength: 0 };
}

export function createDecoder(encoding: ResolvedEncoding): TextDecoder {
  return new TextDecoder(encoding.name, { fatal: true, ignoreBOM: true });
}

function tryDecode(bytes: Uint8Array, encoding: ResolvedEncoding): string | undefined {
  try {
    return createDecoder(encoding).decode(bytes, { stream: true });
  } catch {
    return undefined;
  }
}

/**
 * Text of the longest leading run of `bytes` that decodes cleanly.
 * A sequence left incomplete at the end of that run is not part of the text.
 */
export function decodeValidPrefix(bytes: Uint8Array, encoding: ResolvedEncoding): string {
  let valid = '';
  let lo = 0;
  let hi = bytes.length;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    const text = tryDecode(bytes.subarray(0, mid), encoding);
    if (text === undefined) {
      hi = mid - 1;
    } else {
      lo = mid;
      valid = text;
    }
  }
  return valid;
}

/**
 * Number of bytes `text` occupied in the source.
 * Exact for UTF-8, UTF-16 and the single-byte encodings; multi-byte legacy encodings count characters.
 */
export function encodedLength(text: string, encoding: string): number {
  switch (encoding) {
    case 'utf-8':
      return Buffer.byteLength(text, 'utf8');
    case 'utf-16le':
    case 'utf-16be':
      return text.length * 2;
    default:
      return text.length;
  }
}
