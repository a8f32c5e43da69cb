#!/usr/bin/env node
/**
 * Game Server Entry Point
 *
 * Loads configuration from the environment (and .env), starts the HTTP +
 * WebSocket server and shuts it down gracefully on SIGINT/SIGTERM.
 *
 * Configuration: PORT, HOST, RECONNECT_TIMEOUT_MS, LOBBY_TIMEOUT_MS,
 * HEARTBEAT_INTERVAL_MS, MAX_SESSIONS, LOG_LEVEL (see core/config.ts)
 */

import path from 'path';
import { pathToFileURL } from 'url';
import { loadConfig } from '../core/config.js';
import { createCategoryLogger, initializeLogger } from '../core/logger.js';
import { isGameError } from '../core/types.js';
import { GameServer } from './game-server.js';

initializeLogger();

const logger = createCategoryLogger('server');

export async function startGameServer(): Promise<GameServer> {
  const config = loadConfig();

  const server = new GameServer({
    port: config.port,
    host: config.host,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    reconnectTimeoutMs: config.reconnectTimeoutMs,
    lobbyTimeoutMs: config.lobbyTimeoutMs,
    maxSessions: config.maxSessions
  });

  const port = await server.start();
  console.log(`Game server running at http://${config.host}:${port}`);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      await server.stop();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  return server;
}

const entryPoint = process.argv[1];
const isDirectExecution = entryPoint !== undefined
  && (import.meta.url === pathToFileURL(path.resolve(entryPoint)).href || entryPoint.endsWith('ludo-server'));

if (isDirectExecution) {
  startGameServer().catch((error: unknown) => {
    if (isGameError(error)) {
      console.error(`Failed to start server: ${error.message}`, error.details ?? '');
    } else {
      console.error('Failed to start server:', error);
    }
    process.exit(1);
  });
}
