/**
 * Built-in Function Tests
 * @module tests/resolver/functions
 */

import { describe, it, expect } from 'vitest';
import { asBool, asNumber, asString, scalar } from '@/resolver';
import { evaluateText, plain } from '../factories';

function run(text: string): unknown {
  return plain(evaluateText(text));
}

describe('built-in functions', () => {
  describe('strings', () => {
    it('should join and split', () => {
      expect(run('join(",", ["a", "b"])')).toBe('a,b');
      expect(run('split(",", "a,b")')).toEqual(['a', 'b']);
    });

    it('should change case and trim', () => {
      expect(run('lower("AbC")')).toBe('abc');
      expect(run('upper("abc")')).toBe('ABC');
      expect(run('trimspace("  x  ")')).toBe('x');
    });

    it('should replace substrings and patterns', () => {
      expect(run('replace("a-b-c", "-", "_")')).toBe('a_b_c');
      expect(run('replace("a1b22", "/[0-9]+/", "#")')).toBe('a#b#');
    });

    it('should accept inline flags and named groups in patterns', () => {
      expect(run('replace("Foo", "/(?i)foo/", "bar")')).toBe('bar');
      expect(run('replace("foo", "/(?P<x>f)oo/", "b")')).toBe('b');
    });

    it('should leave the call unresolved when a pattern cannot be compiled', () => {
      expect(run('replace("ab", "/(?U)a/", "x")')).toEqual({ $unresolved: ['replace("ab", "/(?U)a/", "x")'] });
    });

    it('should format with verbs', () => {
      expect(run('format("%s-%d", "web", 3)')).toBe('web-3');
      expect(run('format("%.2f", 1.5)')).toBe('1.50');
      expect(run('format("%q", "x")')).toBe('"x"');
      expect(run('format("100%%")')).toBe('100%');
    });

    it('should count characters of strings', () => {
      expect(run('length("héllo")')).toBe(5);
    });
  });

  describe('collections', () => {
    it('should measure lists and maps', () => {
      expect(run('length([1, 2, 3])')).toBe(3);
      expect(run('length({ a = 1 })')).toBe(1);
    });

    it('should concatenate and flatten lists', () => {
      expect(run('concat(["a"], ["b"])')).toEqual(['a', 'b']);
      expect(run('flatten([["a"], ["b", ["c"]]])')).toEqual(['a', 'b', 'c']);
    });

    it('should merge maps with later keys winning', () => {
      expect(run('merge({ a = 1, b = 1 }, null, { b = 2 })')).toEqual({ a: 1, b: 2 });
    });

    it('should look up keys with a fallback', () => {
      expect(run('lookup({ a = 1 }, "a", 0)')).toBe(1);
      expect(run('lookup({ a = 1 }, "b", 2)')).toBe(2);
      expect(run('lookup({ a = 1 }, "b")')).toEqual({ $unresolved: ['lookup({ a = 1 }, "b")'] });
    });

    it('should list keys and values in key order', () => {
      expect(run('keys({ b = 1, a = 2 })')).toEqual(['a', 'b']);
      expect(run('values({ b = 1, a = 2 })')).toEqual([2, 1]);
    });

    it('should wrap element indexes', () => {
      expect(run('element(["a", "b"], 3)')).toBe('b');
    });

    it('should remove duplicates and empty values', () => {
      expect(run('distinct([1, 1, 2])')).toEqual([1, 2]);
      expect(run('compact(["a", "", null])')).toEqual(['a']);
      expect(run('toset(["b", "a", "b"])')).toEqual(['a', 'b']);
    });

    it('should test membership', () => {
      expect(run('contains(["a"], "a")')).toBe(true);
      expect(run('contains(["a"], "b")')).toBe(false);
    });

    it('should build maps from key and value lists', () => {
      expect(run('zipmap(["a", "b"], [1, 2])')).toEqual({ a: 1, b: 2 });
    });

    it('should generate ranges', () => {
      expect(run('range(3)')).toEqual([0, 1, 2]);
      expect(run('range(1, 7, 2)')).toEqual([1, 3, 5]);
    });

    it('should pick the first non-empty value', () => {
      expect(run('coalesce("", "x")')).toBe('x');
    });
  });

  describe('numbers and conversions', () => {
    it('should find minimum and maximum', () => {
      expect(run('min(3, 1, 2)')).toBe(1);
      expect(run('max([4, 9])')).toBe(9);
    });

    it('should convert between scalar types', () => {
      expect(run('tostring(5)')).toBe('5');
      expect(run('tonumber("5")')).toBe(5);
      expect(run('tobool("true")')).toBe(true);
    });
  });

  describe('coercion helpers', () => {
    it('should coerce scalars', () => {
      expect(asNumber(scalar('5'))).toBe(5);
      expect(asNumber(scalar(' '))).toBeNull();
      expect(asBool(scalar('false'))).toBe(false);
      expect(asBool(scalar(1))).toBeNull();
      expect(asString(scalar(true))).toBe('true');
      expect(asString(scalar(null))).toBeNull();
    });
  });
});
