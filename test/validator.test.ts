/**
 * Tests for the request validator
 */

import { describe, it, expect } from 'vitest';
import {
  INSPECTION_RULES,
  PatternValidator,
  createRequestValidator,
  decodeBody,
  validateBody,
} from '../src/validator/index.js';

describe('Validator', () => {
  describe('decodeBody', () => {
    it('decodes missing bodies to an empty string', () => {
      expect(decodeBody(undefined)).toBe('');
    });

    it('decodes UTF-8 bytes', () => {
      expect(decodeBody(new TextEncoder().encode('héllo wörld'))).toBe('héllo wörld');
    });

    it('passes strings through', () => {
      expect(decodeBody('plain')).toBe('plain');
    });

    it('throws on malformed UTF-8', () => {
      expect(() => decodeBody(new Uint8Array([0x7b, 0xff, 0x7d]))).toThrow(TypeError);
    });
  });

  describe('accepting', () => {
    it('accepts an ordinary JSON body', () => {
      expect(validateBody('{"name": "John Doe"}')).toEqual({ verdict: 'accept' });
    });

    it('accepts an empty body', () => {
      expect(validateBody('')).toEqual({ verdict: 'accept' });
      expect(validateBody(undefined)).toEqual({ verdict: 'accept' });
      expect(validateBody(new Uint8Array(0))).toEqual({ verdict: 'accept' });
    });

    it('accepts empty or unbalanced angle brackets', () => {
      expect(validateBody('<>')).toEqual({ verdict: 'accept' });
      expect(validateBody('a > b')).toEqual({ verdict: 'accept' });
      expect(validateBody('a < b')).toEqual({ verdict: 'accept' });
    });

    it('accepts non-ASCII text', () => {
      expect(validateBody(Buffer.from('{"city": "Zürich"}'))).toEqual({ verdict: 'accept' });
    });
  });

  describe('SQL injection', () => {
    it('rejects a DROP TABLE payload', () => {
      expect(validateBody('{"name": "John Doe; DROP TABLE users;"}')).toEqual({
        verdict: 'reject',
        kind: 'sql_injection_suspected',
        match: ';',
      });
    });

    it('matches keywords case-insensitively', () => {
      expect(validateBody('select * from t')).toEqual({
        verdict: 'reject',
        kind: 'sql_injection_suspected',
        match: 'select',
      });
      expect(validateBody('SeLeCt 1')).toMatchObject({ kind: 'sql_injection_suspected', match: 'SeLeCt' });
    });

    it('folds case the Unicode way', () => {
      expect(validateBody('ſelect 1')).toEqual({
        verdict: 'reject',
        kind: 'sql_injection_suspected',
        match: 'ſelect',
      });
      expect(validateBody('ınsert x')).toMatchObject({ kind: 'sql_injection_suspected', match: 'ınsert' });
      expect(validateBody('İNSERT x')).toMatchObject({ kind: 'sql_injection_suspected', match: 'İNSERT' });
    });

    it('rejects every keyword and separator', () => {
      for (const token of ['INSERT', 'update', 'Delete', 'drop', ';', '--', '#']) {
        expect(validateBody(`x ${token} y`)).toMatchObject({ verdict: 'reject', kind: 'sql_injection_suspected' });
      }
    });

    it('flags words that merely contain a keyword', () => {
      expect(validateBody('{"status": "deleted"}')).toEqual({
        verdict: 'reject',
        kind: 'sql_injection_suspected',
        match: 'delete',
      });
    });

    it('reports SQL before XSS when both match', () => {
      expect(validateBody('<b>DROP</b>')).toEqual({
        verdict: 'reject',
        kind: 'sql_injection_suspected',
        match: 'DROP',
      });
    });
  });

  describe('XSS', () => {
    it('rejects a script tag', () => {
      expect(validateBody('{"name": "<script>alert(1)</script>"}')).toEqual({
        verdict: 'reject',
        kind: 'xss_suspected',
        match: '<script>',
      });
    });

    it('rejects any tag shaped token, including across lines', () => {
      expect(validateBody('<a\nhref>')).toMatchObject({ kind: 'xss_suspected', match: '<a\nhref>' });
      expect(validateBody('1 < 2 and 3 > 2')).toMatchObject({ kind: 'xss_suspected', match: '< 2 and 3 >' });
    });

    it('inspects byte bodies', () => {
      expect(validateBody(Buffer.from('<i>x</i>'))).toEqual({
        verdict: 'reject',
        kind: 'xss_suspected',
        match: '<i>',
      });
    });
  });

  describe('PatternValidator', () => {
    it('uses the fixed rule table by default, SQL first', () => {
      const validator = new PatternValidator();
      expect(validator.getRules()).toBe(INSPECTION_RULES);
      expect(validator.getRules().map(r => r.kind)).toEqual(['sql_injection_suspected', 'xss_suspected']);
    });

    it('gives the same verdict on repeated calls', () => {
      const validator = createRequestValidator();
      const first = validator.validate('DROP');
      const second = validator.validate('DROP');
      expect(second).toEqual(first);
    });

    it('refuses stateful patterns', () => {
      expect(() => new PatternValidator([
        { kind: 'xss_suspected', description: 'global', pattern: /<[^>]+>/g },
      ])).toThrow('Inspection rule for xss_suspected must not use the g or y flag');
    });
  });
});
