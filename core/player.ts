/**
 * Game Player - Figures, Movement Rules and the Player's Connection
 *
 * Movement rules (amount is the die value):
 * - In start: only a 6 brings the figure onto its entry field (moved 0)
 * - On field: moves forward; passing field 39 enters the house, overshooting
 *   the house is not allowed
 * - In house: moves forward inside the 4 slots only
 * - A figure can never land on a spot taken by a figure of the same player
 */

import { v4 as uuidv4 } from 'uuid';
import { PlayerSocket } from './connection.js';
import { createCategoryLogger } from './logger.js';
import { decodeRequest, encodeResponse } from './protocol.js';
import {
  DIE_SIDES,
  FIELD_COUNT,
  Figure,
  Figures,
  GameError,
  GameErrorCode,
  GameRequest,
  GameResponse,
  HOUSE_SIZE,
  inHouse,
  isGameError,
  onField,
  sameFigure,
  startingFigures
} from './types.js';

const logger = createCategoryLogger('game.player');

export type ReceivedRequest =
  | { kind: 'request'; request: GameRequest }
  | { kind: 'invalid'; text: string; error: GameError }
  | { kind: 'disconnect'; reason: string };

function advance(figure: Figure, amount: number): Figure | null {
  switch (figure.kind) {
    case 'inStart':
      return amount === DIE_SIDES ? onField(0) : null;
    case 'onField': {
      const moved = figure.moved + amount;
      if (moved < FIELD_COUNT) return onField(moved);
      const slot = moved - FIELD_COUNT;
      return slot < HOUSE_SIZE ? inHouse(slot) : null;
    }
    case 'inHouse': {
      const pos = figure.pos + amount;
      return pos < HOUSE_SIZE ? inHouse(pos) : null;
    }
  }
}

export class GamePlayer {
  public name: string;
  public figures: Figures;
  public readonly rejoinCode: string;
  private socket: PlayerSocket;
  private done = false;

  constructor(name: string, socket: PlayerSocket, rejoinCode: string = uuidv4()) {
    this.name = name;
    this.socket = socket;
    this.figures = startingFigures();
    this.rejoinCode = rejoinCode;
  }

  hasFiguresInStart(): boolean {
    return this.figures.some(f => f.kind === 'inStart');
  }

  hasFiguresLeft(): boolean {
    return this.figures.some(f => f.kind !== 'inHouse');
  }

  hasFiguresOnField(): boolean {
    return this.figures.some(f => f.kind === 'onField');
  }

  /** Index of the figure standing on the player's own entry field. */
  figureOnEntryField(): number | undefined {
    const index = this.figures.findIndex(f => f.kind === 'onField' && f.moved === 0);
    return index === -1 ? undefined : index;
  }

  firstFigureInStart(): number | undefined {
    const index = this.figures.findIndex(f => f.kind === 'inStart');
    return index === -1 ? undefined : index;
  }

  isDone(): boolean {
    return this.done;
  }

  /** Where figure `index` would end up after moving `amount`, or null if it cannot move. */
  targetFor(index: number, amount: number): Figure | null {
    const figure = this.figures[index];
    if (!figure) return null;

    const target = advance(figure, amount);
    if (target === null) return null;

    const blocked = this.figures.some((other, i) => i !== index && sameFigure(other, target));
    return blocked ? null : target;
  }

  canMoveFigure(index: number, amount: number): boolean {
    return this.targetFor(index, amount) !== null;
  }

  movableFigures(amount: number): number[] {
    return this.figures
      .map((_, index) => index)
      .filter(index => this.canMoveFigure(index, amount));
  }

  /** Applies the move and returns the figure's new state, or null when the move is not allowed. */
  moveFigure(index: number, amount: number): Figure | null {
    const target = this.targetFor(index, amount);
    if (target === null) {
      logger.debug(`Figure ${index} of ${this.name} cannot move by ${amount}`);
      return null;
    }

    logger.debug(`Move figure ${index} of ${this.name} by ${amount}`, { from: this.figures[index], to: target });
    this.figures[index] = target;
    return target;
  }

  /** Marks the player done once all four figures are in the house. */
  checkDone(): boolean {
    if (this.figures.some(f => f.kind !== 'inHouse')) {
      return false;
    }
    this.done = true;
    return true;
  }

  replaceSocket(socket: PlayerSocket): void {
    this.socket.close(1000, 'replaced by rejoin');
    this.socket = socket;
  }

  closeSocket(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  async sendResponse(response: GameResponse): Promise<void> {
    try {
      await this.socket.send(encodeResponse(response));
    } catch (error) {
      logger.error(`Failed to send ${response.type} to ${this.name}`, error);
      throw new GameError(`Player ${this.name} disconnected`, GameErrorCode.DISCONNECT, error);
    }
  }

  /** Waits for the next text frame from this player and decodes it. */
  async receiveRequest(): Promise<ReceivedRequest> {
    for (;;) {
      const event = await this.socket.receive();
      if (event === null) {
        return { kind: 'disconnect', reason: 'stream ended' };
      }

      switch (event.type) {
        case 'text':
          try {
            return { kind: 'request', request: decodeRequest(event.data) };
          } catch (error) {
            if (!isGameError(error)) throw error;
            return { kind: 'invalid', text: event.data, error };
          }
        case 'binary':
          logger.warn(`Ignoring binary frame (${event.size} bytes) from ${this.name}`);
          break;
        case 'close':
          return { kind: 'disconnect', reason: `closed (${event.code ?? 'no code'})` };
        case 'error':
          logger.error(`Socket error for ${this.name}`, event.error);
          return { kind: 'disconnect', reason: event.error.message };
      }
    }
  }
}
