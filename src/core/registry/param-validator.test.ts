import { describe, it, expect } from 'vitest';
import type { JsonSchema } from '../../types/schema.js';
import { ParamValidator } from './param-validator.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CREATE_USER_SCHEMA: JsonSchema = {
  type: 'object',
  required: ['login'],
  additionalProperties: false,
  properties: {
    login: { type: 'string', minLength: 3 },
    activate: { type: 'boolean', default: true },
    groupIds: { type: 'array', items: { type: 'string' } },
  },
};

function compiled(): ParamValidator {
  const validator = new ParamValidator();
  validator.compile('persistence/create-user', CREATE_USER_SCHEMA);
  return validator;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ParamValidator', () => {
  describe('compile', () => {
    it('caches a schema under its key', () => {
      expect(compiled().has('persistence/create-user')).toBe(true);
    });

    it('refuses to compile the same key twice', () => {
      const validator = compiled();
      expect(() => validator.compile('persistence/create-user', CREATE_USER_SCHEMA)).toThrow(
        'Schema already compiled for module: "persistence/create-user"',
      );
    });

    it('throws for an unknown key on validate', () => {
      expect(() => new ParamValidator().validate('discovery/nope', {})).toThrow(
        'No compiled schema for module: "discovery/nope"',
      );
    });
  });

  describe('validate', () => {
    it('applies defaults to a copy of the parameters', () => {
      const params = { login: 'sim@example.com' };

      const result = compiled().validate('persistence/create-user', params);

      expect(result).toEqual({ valid: true, value: { login: 'sim@example.com', activate: true } });
      expect(params).toEqual({ login: 'sim@example.com' });
    });

    it('reports a missing required property', () => {
      expect(compiled().validate('persistence/create-user', {})).toEqual({
        valid: false,
        errors: [': required property "login" is missing'],
      });
    });

    it('reports an unknown property', () => {
      expect(compiled().validate('persistence/create-user', { login: 'sim@example.com', role: 'admin' })).toEqual({
        valid: false,
        errors: [': additional property "role" not allowed'],
      });
    });

    it('reports type errors with their path', () => {
      expect(compiled().validate('persistence/create-user', { login: 'sim@example.com', groupIds: ['00g1', 7] })).toEqual({
        valid: false,
        errors: ['/groupIds/1: must be string'],
      });
    });

    it('collects every error', () => {
      const result = compiled().validate('persistence/create-user', { login: 'ab', activate: 'yes' });
      expect(result).toEqual({
        valid: false,
        errors: ['/login: must NOT have fewer than 3 characters', '/activate: must be boolean'],
      });
    });

    it('rejects parameters that are not an object', () => {
      expect(compiled().validate('persistence/create-user', ['sim@example.com'])).toEqual({
        valid: false,
        errors: [': parameters must be an object'],
      });
    });

    it('rejects prototype pollution keys before the schema runs', () => {
      const params: unknown = JSON.parse('{"login":"sim@example.com","__proto__":{"admin":true}}');

      expect(compiled().validate('persistence/create-user', params)).toEqual({
        valid: false,
        errors: ['/__proto__: prototype pollution key "__proto__" is not allowed'],
      });
    });
  });
});
