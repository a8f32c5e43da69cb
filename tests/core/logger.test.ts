/**
 * Logger Tests
 *
 * Category normalization, hierarchical level resolution, LOG_* environment
 * overrides and logger caching.
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  createCategoryLogger,
  getCategoryLogLevel,
  initializeLogger,
  normalizeCategoryKey,
  resetLogger,
  shouldLogForCategory
} from '../../core/logger.js';

describe('Logger', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLogger('error');
  });

  describe('category normalization', () => {
    it('keeps dots and folds other separators into dots', () => {
      expect(normalizeCategoryKey('Game.Session')).toBe('game.session');
      expect(normalizeCategoryKey('game-session_rejoin')).toBe('game.session.rejoin');
      expect(normalizeCategoryKey('..server...ws..')).toBe('server.ws');
      expect(normalizeCategoryKey('server@#ws')).toBe('server.ws');
      expect(normalizeCategoryKey('')).toBe('');
    });

    it('returns the same cached logger for equivalent names', () => {
      expect(createCategoryLogger('server-ws')).toBe(createCategoryLogger('SERVER.WS'));
    });

    it('does not cache loggers with bindings', () => {
      const plain = createCategoryLogger('game.session');
      const bound = createCategoryLogger('game.session', { session: 'abc' });

      expect(bound).not.toBe(plain);
      expect(bound.level).toBe(plain.level);
    });
  });

  describe('level resolution', () => {
    it('uses the most specific configured category', () => {
      initializeLogger({
        globalLevel: 'error',
        categoryLevels: { game: 'info', 'game.session': 'debug' }
      });

      expect(getCategoryLogLevel('game.session')).toBe('debug');
      expect(getCategoryLogLevel('game.session.lobby')).toBe('debug');
      expect(getCategoryLogLevel('game.state')).toBe('info');
      expect(getCategoryLogLevel('server.http')).toBe('error');
    });

    it('falls back to the global level', () => {
      initializeLogger({ globalLevel: 'warn' });

      expect(getCategoryLogLevel('server.ws')).toBe('warn');
      expect(shouldLogForCategory('warn', 'server.ws')).toBe(true);
      expect(shouldLogForCategory('info', 'server.ws')).toBe(false);
    });

    it('lets LOG_* environment variables override configured levels', () => {
      process.env.LOG_GAME_STATE = 'trace';
      initializeLogger({ categoryLevels: { 'game.state': 'warn' } });

      expect(getCategoryLogLevel('game.state')).toBe('trace');
      expect(shouldLogForCategory('trace', 'game.state')).toBe(true);
    });

    it('ignores LOG_* values that are not levels', () => {
      process.env.LOG_SERVER = 'loud';
      initializeLogger({ globalLevel: 'info' });

      expect(getCategoryLogLevel('server')).toBe('info');
    });

    it('rebuilds cached loggers with the new level', () => {
      const before = createCategoryLogger('game.core');
      expect(before.level).toBe('error');

      initializeLogger({ categoryLevels: { 'game.core': 'debug' } });

      const after = createCategoryLogger('game.core');
      expect(after.level).toBe('debug');
      expect(after.child({ game: 'g1' }).level).toBe('debug');
    });
  });

  it('writes through every level without throwing', () => {
    initializeLogger({ globalLevel: 'trace' });
    const logger = createCategoryLogger('test.output');

    expect(() => {
      logger.trace('trace message');
      logger.debug('debug message', { a: 1 });
      logger.info('info message');
      logger.warn('warn message', new Error('boom'));
      logger.error('error message');
    }).not.toThrow();
  });
});
