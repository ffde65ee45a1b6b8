import { describe, it, expect } from 'vitest';
import { compose, createContext } from '../../src/middleware';
import type { Middleware } from '../../src/middleware';
import { SilentLogger } from '../../src/core';

describe('Middleware - compose', () => {
  describe('basic execution', () => {
    it('should execute middleware in correct order', async () => {
      const order: number[] = [];

      const mw1: Middleware = async (_ctx, next) => {
        order.push(1);
        await next();
        order.push(1.5);
        return undefined;
      };

      const mw2: Middleware = async (_ctx, next) => {
        order.push(2);
        await next();
        order.push(2.5);
        return undefined;
      };

      const composed = compose([mw1, mw2], () => {
        order.push(3);
      });

      await composed(createContext('TEST', {}, new SilentLogger()));

      expect(order).toEqual([1, 2, 3, 2.5, 1.5]);
    });

    it('should pass the replaced payload to the handler', async () => {
      const received: unknown[] = [];

      const trim: Middleware<string, string> = async (ctx, next) => {
        received.push(ctx.payload);
        ctx.payload = ctx.payload.trim();
        return next();
      };

      const composed = compose([trim], (payload: string) => {
        received.push(payload);
        return payload.toUpperCase();
      });

      const result = await composed(createContext('TRIM', '  hi  '));

      expect(received).toEqual(['  hi  ', 'hi']);
      expect(result).toBe('HI');
    });
  });

  describe('short-circuit', () => {
    it('should stop the chain when a middleware returns a value', async () => {
      let handlerCalled = false;

      const deny: Middleware<unknown, string> = () => 'denied';

      const composed = compose([deny], () => {
        handlerCalled = true;
        return 'ok';
      });

      expect(await composed(createContext('TEST', null))).toBe('denied');
      expect(handlerCalled).toBe(false);
    });
  });

  describe('errors', () => {
    it('should reject when next() is called twice', async () => {
      const twice: Middleware = async (_ctx, next) => {
        await next();
        return next();
      };

      const composed = compose([twice], () => 'ok');

      await expect(composed(createContext('TEST', null))).rejects.toThrow('next() called multiple times');
    });

    it('should propagate handler errors', async () => {
      const composed = compose([], () => {
        throw new Error('handler failed');
      });

      await expect(composed(createContext('TEST', null))).rejects.toThrow('handler failed');
    });
  });

  describe('createContext', () => {
    it('should default to a silent logger and empty meta', () => {
      const ctx = createContext('SIGNUP', { a: 1 });

      expect(ctx.name).toBe('SIGNUP');
      expect(ctx.payload).toEqual({ a: 1 });
      expect(ctx.meta).toEqual({});
      expect(ctx.logger).toBeInstanceOf(SilentLogger);
    });
  });
});
