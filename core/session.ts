/**
 * Game Session - Lobby and Game Loop for One Match
 *
 * Lifecycle: waiting -> running -> finished
 * - waiting:  players join over WebSocket until the requested count is seated;
 *             a player whose connection closes gives the seat back, and the
 *             lobby ends when its last player leaves or `lobbyTimeoutMs` passes
 * - running:  the game is built and driven through the state machine
 * - finished: the loop ended (game over, abort, or nobody rejoined in time)
 *
 * Joins and rejoins come in from transport callbacks through async queues,
 * so only the session loop ever touches the game.
 */

import { AsyncQueue } from './async-queue.js';
import { PlayerSocket } from './connection.js';
import { DieDistribution, RandomSource, UniformDie } from './dice.js';
import { Game, GameSnapshot, SeatedPlayer } from './game.js';
import { createCategoryLogger } from './logger.js';
import { GameState, GameStates, RejoinRequest, step } from './state-machine.js';
import { MAX_PLAYERS, GameError, GameErrorCode } from './types.js';

const logger = createCategoryLogger('game.session');

export type SessionStatus = 'waiting' | 'running' | 'finished';

export interface SessionOptions {
  rng?: RandomSource;
  die?: DieDistribution;
  firstPlayer?: number;
  reconnectTimeoutMs?: number;
  /** How long the lobby may stay unfilled before the session ends; 0 waits forever. */
  lobbyTimeoutMs?: number;
}

export interface SessionResult {
  id: string;
  ranking: number[];
  completed: boolean;
}

export interface SessionInfo {
  id: string;
  status: SessionStatus;
  playerCount: number;
  joined: number;
  createdAt: string;
  game?: GameSnapshot;
}

export class GameSession {
  public readonly id: string;
  public readonly playerCount: number;
  public readonly createdAt = new Date();
  private status: SessionStatus = 'waiting';
  private joined = 0;
  private readonly joins = new AsyncQueue<SeatedPlayer>();
  private readonly rejoins = new AsyncQueue<RejoinRequest>();
  private readonly options: SessionOptions;
  private lobby: SeatedPlayer[] = [];
  private abortReason = 'game ended';
  private game?: Game;
  private state?: GameState;

  constructor(id: string, playerCount: number, options: SessionOptions = {}) {
    if (!Number.isInteger(playerCount) || playerCount < 1 || playerCount > MAX_PLAYERS) {
      throw new GameError(`Player count must be between 1 and ${MAX_PLAYERS}`, GameErrorCode.OTHER, { playerCount });
    }
    this.id = id;
    this.playerCount = playerCount;
    this.options = options;
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getState(): GameState | undefined {
    return this.state;
  }

  isJoinable(): boolean {
    return this.status === 'waiting' && this.joined < this.playerCount;
  }

  /** Seats a player while the lobby is open. Returns false when the session is full or over. */
  join(name: string, socket: PlayerSocket): boolean {
    if (!this.isJoinable() || !this.joins.push({ name, socket })) {
      return false;
    }
    this.joined++;
    logger.debug(`Player ${name} joined session ${this.id} (${this.joined}/${this.playerCount})`);
    return true;
  }

  /**
   * Gives back the seat of a lobby player whose connection closed. Returns
   * false once the game has started or when the socket holds no seat.
   */
  leave(socket: PlayerSocket): boolean {
    if (this.status !== 'waiting') {
      return false;
    }

    const index = this.lobby.findIndex(p => p.socket === socket);
    const removed = index === -1
      ? this.joins.remove(p => p.socket === socket)
      : this.lobby.splice(index, 1)[0];
    if (!removed) {
      return false;
    }

    this.joined--;
    logger.debug(`Player ${removed.name} left session ${this.id} (${this.joined}/${this.playerCount})`);
    if (this.joined === 0) {
      logger.info(`Lobby of session ${this.id} abandoned`);
      this.abort('lobby abandoned');
    }
    return true;
  }

  /** Hands a new connection for an existing seat to the running game. */
  rejoin(code: string, socket: PlayerSocket): boolean {
    if (this.status !== 'running') {
      return false;
    }
    return this.rejoins.push({ code, socket });
  }

  info(): SessionInfo {
    return {
      id: this.id,
      status: this.status,
      playerCount: this.playerCount,
      joined: this.joined,
      createdAt: this.createdAt.toISOString(),
      ...(this.game ? { game: this.game.snapshot() } : {})
    };
  }

  private async waitForPlayers(): Promise<SeatedPlayer[] | null> {
    logger.debug(`Session ${this.id} waiting for players`);

    const timeoutMs = this.options.lobbyTimeoutMs ?? 0;
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : undefined;

    while (this.lobby.length < this.playerCount) {
      const remaining = deadline === undefined ? undefined : deadline - Date.now();
      const player = remaining === undefined || remaining > 0 ? await this.joins.next(remaining) : undefined;
      if (!player) {
        if (!this.joins.closed) {
          logger.info(`Lobby of session ${this.id} expired after ${timeoutMs}ms`);
          this.abort('lobby expired');
        }
        for (const seated of this.lobby) {
          seated.socket.close(1001, this.abortReason);
        }
        return null;
      }
      this.lobby.push(player);
    }
    return this.lobby;
  }

  /** Runs the lobby and then the game until it ends. */
  async run(): Promise<SessionResult> {
    const players = await this.waitForPlayers();
    if (!players) {
      this.status = 'finished';
      return { id: this.id, ranking: [], completed: false };
    }

    logger.debug(`Starting game ${this.id}`);
    this.status = 'running';
    this.joins.close();

    const game = new Game(this.id, players, { rng: this.options.rng, firstPlayer: this.options.firstPlayer });
    this.game = game;
    const die = this.options.die ?? new UniformDie();

    await game.sendRejoinCodes();
    await game.sendState();
    await game.indicatePlayers();

    let state: GameState | null = GameStates.startTurn(0);
    try {
      while (state) {
        this.state = state;
        state = await step(state, game, this.rejoins, die, { reconnectTimeoutMs: this.options.reconnectTimeoutMs });
      }
    } finally {
      this.status = 'finished';
      this.rejoins.close();
    }

    const completed = this.state?.kind === 'done';
    logger.info(`Session ${this.id} finished`, { completed, ranking: game.ranking });
    game.closeAll(completed ? 1000 : 1001, completed ? 'game over' : this.abortReason);
    return { id: this.id, ranking: [...game.ranking], completed };
  }

  /** Stops the session: pending joins are dropped and seated sockets closed. */
  abort(reason = 'server shutting down'): void {
    this.abortReason = reason;
    // seated lobby players are closed by the lobby loop once it sees the queue close
    for (const pending of this.joins.drain()) {
      pending.socket.close(1001, reason);
    }
    this.joins.close();
    this.rejoins.close();
    this.game?.closeAll(1001, reason);
    if (this.status === 'waiting') {
      this.status = 'finished';
    }
  }
}
