/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Values built by the dict reducer, in the shape xmltodict produces.
*/

export interface XmlNull {
  readonly kind: 'null';
}

export interface XmlLeaf {
  readonly kind: 'leaf';
  readonly text: string;
}

export interface XmlList {
  readonly kind: 'list';
  /** Repeated siblings in document order; never nested lists. */
  readonly items: XmlItem[];
}

export interface XmlMap {
  readonly kind: 'map';
  /** Child tag name to value, in order of first appearance. */
  readonly entries: Map<string, XmlValue>;
}

export type XmlValue = XmlNull | XmlLeaf | XmlList | XmlMap;

/** A value that can stand for a single element. */
export type XmlItem = Exclude<XmlValue, XmlList>;

/** JSON-compatible rendering of an XmlValue. */
export type PlainValue = null | string | PlainValue[] | PlainObject;
export interface PlainObject {
  [key: string]: PlainValue;
}

export const XML_NULL: XmlNull = Object.freeze({ kind: 'null' });

export function leaf(text: string): XmlLeaf {
  return { kind: 'leaf', text };
}

export function emptyMap(): XmlMap {
  return { kind: 'map', entries: new Map() };
}

/**
 * Store `value` under `key`. A second value for the same key turns the entry into a list,
 * later values are appended to it.
 */
export function attach(map: XmlMap, key: string, value: XmlItem): void {
  const existing = map.entries.get(key);
  if (existing === undefined) {
    map.entries.set(key, value);
    return;
  }
  switch (existing.kind) {
    case 'list':
      existing.items.push(value);
      return;
    case 'null':
    case 'leaf':
    case 'map':
      map.entries.set(key, { kind: 'list', items: [existing, value] });
      return;
  }
}

export function toPlain(value: XmlMap): PlainObject;
export function toPlain(value: XmlValue): PlainValue;
export function toPlain(value: XmlValue): PlainValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'leaf':
      return value.text;
    case 'list':
      return value.items.map((item) => toPlain(item));
    case 'map':
      // fromEntries defines own properties, so a "__proto__" tag stays an ordinary key
      return Object.fromEntries([...value.entries].map(([key, child]) => [key, toPlain(child)]));
  }
}
