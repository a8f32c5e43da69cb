/**
 * Core Module - Public API of the Game Engine
 */

export * from './types.js';
export * from './protocol.js';
export * from './dice.js';
export * from './connection.js';
export * from './async-queue.js';
export * from './player.js';
export * from './game.js';
export * from './state-machine.js';
export * from './session.js';
export * from './session-manager.js';
export * from './config.js';
export {
  createCategoryLogger,
  initializeLogger,
  getCategoryLogLevel,
  shouldLogForCategory,
  type Logger,
  type LogLevel,
  type LoggerConfig
} from './logger.js';
