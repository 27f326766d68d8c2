import { describe, it, expect } from 'vitest';
import { decode, decodeText, encode, encodeJson } from '../../src/utils/base64url.js';
import { DecodeError } from '../../src/errors.js';

const bytes = (...values: number[]) => new Uint8Array(values);

describe('base64url', () => {
  describe('encode', () => {
    it('should replace + and / and strip padding', () => {
      // standard base64 of fb ff is "+/8="
      expect(encode(bytes(0xfb, 0xff))).toBe('-_8');
    });

    it('should encode text bytes without padding', () => {
      expect(encode(new TextEncoder().encode('hello'))).toBe('aGVsbG8');
    });

    it('should encode an empty array to an empty string', () => {
      expect(encode(bytes())).toBe('');
    });

    it('should never emit +, / or = for any byte value', () => {
      const all = Uint8Array.from({ length: 256 }, (_, i) => i);
      for (let len = 1; len <= 4; len++) {
        const encoded = encode(all.subarray(256 - len));
        expect(encoded).toMatch(/^[A-Za-z0-9_-]+$/);
      }
      expect(encode(all)).toMatch(/^[A-Za-z0-9_-]+$/);
    });
  });

  describe('decode', () => {
    it('should invert encode', () => {
      expect(decode('-_8')).toEqual(bytes(0xfb, 0xff));
      expect(new TextDecoder().decode(decode('aGVsbG8'))).toBe('hello');
    });

    it('should round-trip every byte value', () => {
      const all = Uint8Array.from({ length: 256 }, (_, i) => i);
      expect(decode(encode(all))).toEqual(all);
    });

    it('should decode an empty string', () => {
      expect(decode('')).toEqual(bytes());
    });

    it('should reject characters outside the base64url alphabet', () => {
      expect(() => decode('ab+c')).toThrow(DecodeError);
      expect(() => decode('ab/c')).toThrow(DecodeError);
      expect(() => decode('!!!invalid!!!')).toThrow(DecodeError);
    });

    it('should accept trailing padding', () => {
      expect(new TextDecoder().decode(decode('aGVsbG8='))).toBe('hello');
      expect(decode('-_8=')).toEqual(bytes(0xfb, 0xff));
    });

    it('should reject padding before the end', () => {
      expect(() => decode('aG=VsbG8')).toThrow(DecodeError);
    });

    it('should reject lengths that cannot be padded', () => {
      expect(() => decode('a')).toThrow('Invalid base64url length 1');
      expect(() => decode('abcde')).toThrow(DecodeError);
    });
  });

  describe('decodeText', () => {
    it('should decode the UTF-8 text of a segment', () => {
      expect(decodeText('aGVsbG8')).toBe('hello');
      expect(decodeText(encodeJson({ name: '测试' }))).toBe('{"name":"测试"}');
    });

    it('should reject bytes that are not UTF-8', () => {
      expect(() => decodeText(encode(bytes(0xff, 0xfe, 0xfd)))).toThrow('Segment is not valid UTF-8');
    });

    it('should reject invalid base64url', () => {
      expect(() => decodeText('ab+c')).toThrow(DecodeError);
    });
  });

  describe('encodeJson', () => {
    it('should encode the JSON text of a value', () => {
      // '{"a":1}' is "eyJhIjoxfQ==" in standard base64
      expect(encodeJson({ a: 1 })).toBe('eyJhIjoxfQ');
    });
  });
});
