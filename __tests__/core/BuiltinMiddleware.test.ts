import { describe, it, expect, vi } from 'vitest';
import { compose, createContext, validate, validated } from '../../src/middleware';
import { ContractError, schema, v } from '../../src/core';
import type { Logger } from '../../src/core';

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const signup = schema(
  {
    username: v.string().min(3),
    age: v.int().min(13),
  },
  { name: 'Signup' }
);

describe('Built-in Middleware', () => {
  describe('validate middleware', () => {
    it('should replace the payload with the cleaned record and continue', async () => {
      const validateMw = validate(signup);
      const next = async () => 'next called';

      const ctx = createContext('SIGNUP', { username: ' user ', age: '20' });
      const result = await validateMw(ctx, next);

      expect(result).toBe('next called');
      expect(ctx.payload).toEqual({ username: 'user', age: 20 });
    });

    it('should return an error response on invalid payload', async () => {
      const validateMw = validate(signup);
      const next = async () => {
        throw new Error('Should not be called');
      };

      const result = await validateMw(createContext('SIGNUP', { username: 'ab' }), next);

      expect(result).toEqual({
        error: 'ValidationError',
        schema: 'Signup',
        details: [
          { path: 'username', message: 'length must be ≥ 3', kind: 'min_length' },
          { path: 'age', message: 'this field is required', kind: 'required' },
        ],
      });
    });

    it('should log the outcome', async () => {
      const logger = createMockLogger();
      const validateMw = validate(signup);

      await validateMw(createContext('SIGNUP', {}, logger), async () => undefined);

      expect(logger.debug).toHaveBeenCalledWith('Payload validation failed', {
        operation: 'SIGNUP',
        schema: 'Signup',
        failures: 2,
      });
    });

    it('should log and rethrow a non-mapping payload', async () => {
      const logger = createMockLogger();
      const validateMw = validate(signup);

      await expect(validateMw(createContext('SIGNUP', 'raw', logger), async () => undefined)).rejects.toThrow(
        ContractError
      );
      expect(logger.error).toHaveBeenCalledWith('Validation middleware error', expect.any(ContractError), {
        operation: 'SIGNUP',
      });
    });

    it('should work inside a composed chain', async () => {
      const run = compose([validate(signup)], (payload) => ({ created: payload }));

      expect(await run(createContext('SIGNUP', { username: 'user', age: 30 }))).toEqual({
        created: { username: 'user', age: 30 },
      });
    });
  });

  describe('validated handler', () => {
    it('should call the handler with the typed record', async () => {
      const run = compose([], validated(signup, (user) => `welcome ${user.username}, ${user.age + 1}`));

      expect(await run(createContext('SIGNUP', { username: 'user', age: '20' }))).toBe('welcome user, 21');
    });

    it('should return the error response without calling the handler', async () => {
      const handler = vi.fn();
      const run = compose([], validated(signup, handler));

      const result = await run(createContext('SIGNUP', { username: 'user', age: 5 }));

      expect(result).toEqual({
        error: 'ValidationError',
        schema: 'Signup',
        details: [{ path: 'age', message: 'must be ≥ 13', kind: 'min' }],
      });
      expect(handler).not.toHaveBeenCalled();
    });
  });
});
