/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { XML_NULL, attach, emptyMap, leaf, toPlain } from './node';

describe('attach', () => {
  it('sets, then promotes to a list, then appends', () => {
    const map = emptyMap();
    attach(map, 'k', leaf('1'));
    expect(map.entries.get('k')).toEqual({ kind: 'leaf', text: '1' });
    attach(map, 'k', XML_NULL);
    expect(map.entries.get('k')).toEqual({ kind: 'list', items: [{ kind: 'leaf', text: '1' }, { kind: 'null' }] });
    attach(map, 'k', leaf('3'));
    expect(toPlain(map)).toEqual({ k: ['1', null, '3'] });
  });

  it('keeps keys in order of first appearance', () => {
    const map = emptyMap();
    attach(map, 'b', XML_NULL);
    attach(map, 'a', XML_NULL);
    attach(map, 'b', XML_NULL);
    expect([...map.entries.keys()]).toEqual(['b', 'a']);
  });
});

describe('toPlain', () => {
  it('renders nested maps', () => {
    const inner = emptyMap();
    attach(inner, 'leaf', leaf('v'));
    const outer = emptyMap();
    attach(outer, 'inner', inner);
    expect(toPlain(outer)).toEqual({ inner: { leaf: 'v' } });
  });

  it('keeps a __proto__ tag as a plain key', () => {
    const map = emptyMap();
    attach(map, '__proto__', leaf('x'));
    const plain = toPlain(map);
    expect(Object.keys(plain)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
  });
});
