/**
 * Game - Players, Turn Order, Captures and Broadcasts
 *
 * Holds everything one running match needs: the seated players, whose turn
 * it is, the random source for the die and the finishing order.
 */

import { CryptoRandomSource, RandomSource, pickIndex } from './dice.js';
import { PlayerSocket } from './connection.js';
import { createCategoryLogger } from './logger.js';
import { GamePlayer } from './player.js';
import {
  Figures,
  GameError,
  GameErrorCode,
  GameResponse,
  MAX_PLAYERS,
  absoluteField,
  inStart,
  isGameError
} from './types.js';

const logger = createCategoryLogger('game.core');

export interface SeatedPlayer {
  name: string;
  socket: PlayerSocket;
}

export interface GameOptions {
  rng?: RandomSource;
  /** Index of the player who rolls first; random when omitted. */
  firstPlayer?: number;
}

export interface Capture {
  player: number;
  figure: number;
  field: number;
}

export interface GameSnapshot {
  players: Array<{ name: string; figures: Figures; done: boolean }>;
  nextPlayer: number;
  ranking: number[];
}

export class Game {
  public readonly id: string;
  public readonly players: GamePlayer[];
  public nextPlayer: number;
  public rng: RandomSource;
  public ranking: number[] = [];

  constructor(id: string, players: Iterable<SeatedPlayer>, options: GameOptions = {}) {
    this.id = id;
    this.players = Array.from(players, ({ name, socket }) => new GamePlayer(name, socket));

    if (this.players.length === 0 || this.players.length > MAX_PLAYERS) {
      throw new GameError(
        `A game needs between 1 and ${MAX_PLAYERS} players, got ${this.players.length}`,
        GameErrorCode.OTHER
      );
    }

    this.rng = options.rng ?? new CryptoRandomSource();
    this.nextPlayer = options.firstPlayer ?? pickIndex(this.players.length);
  }

  get currentPlayer(): GamePlayer {
    const player = this.players[this.nextPlayer];
    if (!player) {
      throw new GameError(`No player at index ${this.nextPlayer}`, GameErrorCode.OTHER);
    }
    return player;
  }

  /**
   * Sends every opposing figure that shares an absolute field with one of
   * `playerIndex`'s figures back to its start area.
   */
  checkMove(playerIndex: number): Capture[] {
    const mover = this.players[playerIndex];
    if (!mover) return [];

    const occupied = new Set<number>();
    for (const figure of mover.figures) {
      if (figure.kind === 'onField') {
        occupied.add(absoluteField(figure.moved, playerIndex));
      }
    }

    logger.trace(`Figure fields of player ${playerIndex}`, Array.from(occupied));

    const captures: Capture[] = [];
    this.players.forEach((player, pindex) => {
      if (pindex === playerIndex) return;

      player.figures.forEach((figure, findex) => {
        if (figure.kind !== 'onField') return;

        const field = absoluteField(figure.moved, pindex);
        if (occupied.has(field)) {
          player.figures[findex] = inStart();
          captures.push({ player: pindex, figure: findex, field });
          logger.debug(`Figure ${findex} of player ${pindex} captured on field ${field}`);
        }
      });
    });

    return captures;
  }

  /**
   * Sends `response` to every player. Delivery failures are collected rather
   * than thrown; a dropped player is picked up when their turn comes.
   */
  async broadcast(response: GameResponse): Promise<number[]> {
    const failed: number[] = [];
    for (const [index, player] of this.players.entries()) {
      try {
        await player.sendResponse(response);
      } catch (error) {
        if (!isGameError(error) || error.code !== GameErrorCode.DISCONNECT) throw error;
        failed.push(index);
      }
    }

    if (failed.length > 0) {
      logger.warn(`Could not deliver ${response.type} to players ${failed.join(', ')}`);
    }
    return failed;
  }

  async sendState(): Promise<number[]> {
    return this.broadcast({
      type: 'state',
      players: this.players.map((p): [string, Figures] => [p.name, [...p.figures]])
    });
  }

  async sendRejoinCodes(): Promise<number[]> {
    const failed: number[] = [];
    for (const [index, player] of this.players.entries()) {
      try {
        await player.sendResponse({ type: 'rejoinCode', game: this.id, code: player.rejoinCode });
      } catch (error) {
        if (!isGameError(error) || error.code !== GameErrorCode.DISCONNECT) throw error;
        failed.push(index);
      }
    }
    return failed;
  }

  /** Tells every player the name of each seat and which seat is theirs. */
  async indicatePlayers(): Promise<number[]> {
    const failed = new Set<number>();
    for (const [index, player] of this.players.entries()) {
      for (const [nameIndex, named] of this.players.entries()) {
        try {
          await player.sendResponse({
            type: 'indicatePlayer',
            player: nameIndex,
            name: named.name,
            you: index === nameIndex
          });
        } catch (error) {
          if (!isGameError(error) || error.code !== GameErrorCode.DISCONNECT) throw error;
          failed.add(index);
          break;
        }
      }
    }
    return Array.from(failed);
  }

  findPlayerByRejoinCode(code: string): number | undefined {
    const index = this.players.findIndex(p => p.rejoinCode === code);
    return index === -1 ? undefined : index;
  }

  isDone(): boolean {
    return this.players.every(p => p.isDone());
  }

  /** Moves the turn to the next player, in seat order, who has not finished. */
  advanceToNextPlayer(): void {
    for (let i = 0; i < this.players.length; i++) {
      this.nextPlayer = (this.nextPlayer + 1) % this.players.length;
      if (!this.currentPlayer.isDone()) {
        break;
      }
    }
  }

  snapshot(): GameSnapshot {
    return {
      players: this.players.map(p => ({ name: p.name, figures: [...p.figures], done: p.isDone() })),
      nextPlayer: this.nextPlayer,
      ranking: [...this.ranking]
    };
  }

  closeAll(code?: number, reason?: string): void {
    for (const player of this.players) {
      player.closeSocket(code, reason);
    }
  }
}
