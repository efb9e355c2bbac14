/**
 * Tests for JSON recovery helpers
 */

import { JsonUtils, isRecord } from './JsonUtils.js';

describe('JsonUtils', () => {
  describe('extractJsonCandidate', () => {
    it('should return the span from the first { to the last }', () => {
      expect(JsonUtils.extractJsonCandidate('Here you go: {"a": {"b": 1}} thanks')).toBe('{"a": {"b": 1}}');
    });

    it('should strip markdown fences around the object', () => {
      expect(JsonUtils.extractJsonCandidate('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('should return null without braces', () => {
      expect(JsonUtils.extractJsonCandidate('no json here')).toBeNull();
    });

    it('should return null when the closing brace comes first', () => {
      expect(JsonUtils.extractJsonCandidate('} then {')).toBeNull();
    });
  });

  describe('escapeBackslashes', () => {
    it('should double a lone backslash', () => {
      expect(JsonUtils.escapeBackslashes('$\\frac{1}{2}$')).toBe('$\\\\frac{1}{2}$');
    });

    it('should keep an already doubled pair', () => {
      expect(JsonUtils.escapeBackslashes('$\\\\theta$')).toBe('$\\\\theta$');
    });

    it('should keep an escaped quote', () => {
      expect(JsonUtils.escapeBackslashes('say \\"hi\\"')).toBe('say \\"hi\\"');
    });
  });

  describe('escapeControlCharacters', () => {
    it('should escape raw newlines and tabs inside strings only', () => {
      expect(JsonUtils.escapeControlCharacters('{\n"a": "x\ty\nz"\n}')).toBe('{\n"a": "x\\ty\\nz"\n}');
    });

    it('should not treat an escaped quote as the end of a string', () => {
      expect(JsonUtils.escapeControlCharacters('{"a": "q\\"\n"}')).toBe('{"a": "q\\"\\n"}');
    });
  });

  describe('recoverObject', () => {
    it('should keep LaTeX commands as literal text', () => {
      const recovery = JsonUtils.recoverObject('{"question_understanding": "Find $\\frac{1}{2}$ of $\\theta$"}');

      expect(recovery).toEqual({
        ok: true,
        value: { question_understanding: 'Find $\\frac{1}{2}$ of $\\theta$' }
      });
    });

    it('should accept raw newlines inside string values', () => {
      const recovery = JsonUtils.recoverObject('{"a": "line1\nline2"}');

      expect(recovery).toEqual({ ok: true, value: { a: 'line1\nline2' } });
    });

    it('should prefer a strict parse when asked', () => {
      const raw = '{"a": "tab\\there"}';

      expect(JsonUtils.recoverObject(raw, { strictFirst: true })).toEqual({ ok: true, value: { a: 'tab\there' } });
      expect(JsonUtils.recoverObject(raw)).toEqual({ ok: true, value: { a: 'tab\\there' } });
    });

    it('should report a missing object', () => {
      expect(JsonUtils.recoverObject('I cannot help with that.')).toEqual({
        ok: false,
        reason: 'No JSON object found in model response'
      });
    });

    it('should report invalid JSON', () => {
      const recovery = JsonUtils.recoverObject('{"a": }');

      expect(recovery.ok).toBe(false);
      if (!recovery.ok) {
        expect(recovery.reason).toMatch(/^Invalid JSON in model response: /);
      }
    });
  });

  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([1])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });
});
