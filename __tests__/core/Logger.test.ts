import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, ContextLogger, SilentLogger, withContext } from '../../src/core/types/Logger';
import type { Logger } from '../../src/core/types/Logger';
import { ContractError, ValidationError } from '../../src/core/types/Errors';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('ConsoleLogger', () => {
    it('should skip messages below the minimum level', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      const logger = new ConsoleLogger();
      logger.debug('hidden');
      logger.info('shown');

      expect(debug).not.toHaveBeenCalled();
      expect(info).toHaveBeenCalledWith('[INFO] shown');
    });

    it('should append context as JSON', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

      new ConsoleLogger('debug').debug('Schema validation failed', { schema: 'Signup', failures: 2 });

      expect(debug).toHaveBeenCalledWith('[DEBUG] Schema validation failed {"schema":"Signup","failures":2}');
    });

    it('should print the error message and stack', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const cause = new Error('boom');

      new ConsoleLogger('error').error('Validation middleware error', cause);

      expect(error).toHaveBeenNthCalledWith(1, '[ERROR] Validation middleware error - boom');
      expect(error).toHaveBeenNthCalledWith(2, cause.stack);
    });

    it('should add the code and details of a vetted error', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const cause = new ValidationError(
        [{ path: [{ type: 'field', name: 'age' }], message: 'must be ≥ 13', kind: 'min' }],
        'Signup'
      );

      new ConsoleLogger().error('Validation middleware error', cause, { operation: 'SIGNUP' });

      expect(error).toHaveBeenNthCalledWith(
        1,
        '[ERROR] Validation middleware error - Signup validation failed: age [VALIDATION_ERROR] {"schema":"Signup","issues":1,"operation":"SIGNUP"}'
      );
    });

    it('should omit an empty context', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      new ConsoleLogger().info('ready', {});

      expect(info).toHaveBeenCalledWith('[INFO] ready');
    });

    it('should log warnings at warn level', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      new ConsoleLogger('warn').warn('careful');

      expect(warn).toHaveBeenCalledWith('[WARN] careful');
    });
  });

  describe('withContext', () => {
    const createMockLogger = (): Logger => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    });

    it('should add the bound context to every entry', () => {
      const target = createMockLogger();
      const logger = withContext(target, { schema: 'Signup' });

      logger.debug('Schema validation passed');
      logger.warn('slow', { schema: 'Override', ms: 12 });

      expect(logger).toBeInstanceOf(ContextLogger);
      expect(target.debug).toHaveBeenCalledWith('Schema validation passed', { schema: 'Signup' });
      expect(target.warn).toHaveBeenCalledWith('slow', { schema: 'Override', ms: 12 });
    });

    it('should pass errors through', () => {
      const target = createMockLogger();
      const cause = ContractError.notAMapping('Signup expects a mapping');

      withContext(target, { operation: 'SIGNUP' }).error('Validation middleware error', cause);

      expect(target.error).toHaveBeenCalledWith('Validation middleware error', cause, { operation: 'SIGNUP' });
    });

    it('should prefix console lines through a bound logger', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      withContext(new ConsoleLogger(), { schema: 'Signup' }).info('loaded', { fields: 3 });

      expect(info).toHaveBeenCalledWith('[INFO] loaded {"schema":"Signup","fields":3}');
    });

    it('should keep a silent logger as it is', () => {
      const silent = new SilentLogger();
      expect(withContext(silent, { schema: 'Signup' })).toBe(silent);
    });
  });

  describe('SilentLogger', () => {
    it('should write nothing', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      new SilentLogger().info('nothing');

      expect(info).not.toHaveBeenCalled();
    });
  });
});
