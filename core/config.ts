/**
 * Server Configuration
 *
 * Environment Variables (a .env file is loaded when present):
 * - PORT: HTTP/WebSocket port (default: 3000)
 * - HOST: bind address (default: 0.0.0.0)
 * - RECONNECT_TIMEOUT_MS: how long a game waits for a dropped player to rejoin; 0 waits forever (default: 0)
 * - LOBBY_TIMEOUT_MS: how long an unfilled lobby stays open; 0 keeps it forever (default: 600000)
 * - HEARTBEAT_INTERVAL_MS: WebSocket ping interval; sockets missing a pong are dropped (default: 30000)
 * - MAX_SESSIONS: concurrently live sessions; 0 means unlimited (default: 100)
 * - LOG_LEVEL / LOG_{CATEGORY}: see core/logger.ts
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { GameError, GameErrorCode } from './types.js';

dotenv.config({ quiet: true });

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  RECONNECT_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  LOBBY_TIMEOUT_MS: z.coerce.number().int().min(0).default(600000),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().min(0).default(30000),
  MAX_SESSIONS: z.coerce.number().int().min(0).default(100),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development')
});

export interface ServerConfig {
  port: number;
  host: string;
  reconnectTimeoutMs: number;
  lobbyTimeoutMs: number;
  heartbeatIntervalMs: number;
  maxSessions: number;
  env: 'development' | 'production' | 'test';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const validation = ConfigSchema.safeParse(env);
  if (!validation.success) {
    throw new GameError('Invalid server configuration', GameErrorCode.CONFIG_ERROR, validation.error.issues);
  }

  const parsed = validation.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    reconnectTimeoutMs: parsed.RECONNECT_TIMEOUT_MS,
    lobbyTimeoutMs: parsed.LOBBY_TIMEOUT_MS,
    heartbeatIntervalMs: parsed.HEARTBEAT_INTERVAL_MS,
    maxSessions: parsed.MAX_SESSIONS,
    env: parsed.NODE_ENV
  };
}
