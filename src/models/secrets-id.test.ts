import { describe, it, expect } from 'vitest';
import { SecretsId } from './secrets-id.js';
import { MalformedIdentifierError } from '../errors.js';

const VALID = '3f2b8c1e-9d4a-4e6f-8a7b-0c1d2e3f4a5b';

describe('SecretsId', () => {
  describe('generate', () => {
    it('generates a canonical UUID v4 string', () => {
      const id = SecretsId.generate();
      expect(id.asStr()).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it('generates ids that parse back', () => {
      const id = SecretsId.generate();
      expect(SecretsId.parse(id.asStr()).equals(id)).toBe(true);
    });

    it('yields no duplicates over 10,000 generations', () => {
      const seen = new Set<string>();
      for (let i = 0; i < 10_000; i++) {
        seen.add(SecretsId.generate().asStr());
      }
      expect(seen.size).toBe(10_000);
    });
  });

  describe('parse', () => {
    it('keeps a canonical value', () => {
      expect(SecretsId.parse(VALID).asStr()).toBe(VALID);
    });

    it('rejects empty string', () => {
      expect(() => SecretsId.parse('')).toThrow(MalformedIdentifierError);
    });

    it('rejects uppercase hex', () => {
      expect(() => SecretsId.parse(VALID.toUpperCase())).toThrow(MalformedIdentifierError);
    });

    it('rejects the unhyphenated form', () => {
      expect(() => SecretsId.parse(VALID.replace(/-/g, ''))).toThrow(MalformedIdentifierError);
    });

    it('rejects a truncated value', () => {
      expect(() => SecretsId.parse(VALID.slice(0, 35))).toThrow(MalformedIdentifierError);
    });

    it('rejects surrounding whitespace', () => {
      expect(() => SecretsId.parse(` ${VALID}`)).toThrow(MalformedIdentifierError);
      expect(() => SecretsId.parse(`${VALID}\n`)).toThrow(MalformedIdentifierError);
    });

    it('rejects path characters', () => {
      expect(() => SecretsId.parse('../3f2b8c1e-9d4a-4e6f-8a7b-0c1d2e3f4a')).toThrow(
        MalformedIdentifierError,
      );
    });

    it('includes the offending value in the error message', () => {
      try {
        SecretsId.parse('not-an-id');
        expect.unreachable('should have thrown');
      } catch (e) {
        expect(e).toBeInstanceOf(MalformedIdentifierError);
        expect((e as MalformedIdentifierError).message).toBe(
          'Malformed devsecrets identifier: "not-an-id"',
        );
      }
    });
  });

  describe('immutability', () => {
    it('is frozen', () => {
      expect(Object.isFrozen(SecretsId.parse(VALID))).toBe(true);
    });
  });

  describe('equals', () => {
    it('returns true for identical values', () => {
      expect(SecretsId.parse(VALID).equals(SecretsId.parse(VALID))).toBe(true);
    });

    it('returns false for different values', () => {
      expect(SecretsId.parse(VALID).equals(SecretsId.generate())).toBe(false);
    });
  });

  describe('toString / toJSON', () => {
    it('returns the inner string', () => {
      const id = SecretsId.parse(VALID);
      expect(`${id}`).toBe(VALID);
    });

    it('serializes as a plain string', () => {
      expect(JSON.stringify({ id: SecretsId.parse(VALID) })).toBe(`{"id":"${VALID}"}`);
    });
  });
});
