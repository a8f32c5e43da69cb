/**
 * WebSocket Player Connection
 *
 * Adapts a `ws` WebSocket to the PlayerSocket contract the game loop reads
 * from. Socket callbacks only enqueue events; the game pulls them in order.
 */

import { WebSocket, RawData } from 'ws';
import { AsyncQueue } from '../core/async-queue.js';
import { PlayerSocket, SocketEvent } from '../core/connection.js';
import { createCategoryLogger } from '../core/logger.js';

const logger = createCategoryLogger('server.ws.connection');

function rawDataSize(data: RawData): number {
  if (Array.isArray(data)) {
    return data.reduce((total, chunk) => total + chunk.length, 0);
  }
  return data.byteLength;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export class WsPlayerSocket implements PlayerSocket {
  private readonly events = new AsyncQueue<SocketEvent>();

  constructor(private readonly ws: WebSocket, public readonly label = 'player') {
    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        this.events.push({ type: 'binary', size: rawDataSize(data) });
        return;
      }
      const text = rawDataToString(data);
      logger.trace(`[WS IN] ${this.label}`, text);
      this.events.push({ type: 'text', data: text });
    });

    ws.on('close', (code: number, reason: Buffer) => {
      logger.debug(`Connection of ${this.label} closed (${code})`);
      this.events.push({ type: 'close', code, reason: reason.toString() });
      this.events.close();
    });

    ws.on('error', (error: Error) => {
      logger.error(`WebSocket error for ${this.label}`, error);
      this.events.push({ type: 'error', error });
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(text: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new Error(`Connection of ${this.label} is not open`));
    }

    logger.trace(`[WS OUT] ${this.label}`, text);
    return new Promise<void>((resolve, reject) => {
      this.ws.send(text, (error?: Error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  async receive(): Promise<SocketEvent | null> {
    return (await this.events.next()) ?? null;
  }

  close(code = 1000, reason = ''): void {
    this.events.push({ type: 'close', code, reason });
    this.events.close();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
  }
}
