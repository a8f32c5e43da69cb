/**
 * Turn State Machine
 *
 * `step` advances a running game by exactly one state. The session loop calls
 * it until it returns null.
 *
 * States:
 * - startTurn:            prompt the current player, wait for a roll, apply forced moves
 * - rolled:               wait for the current player to pick a figure for the rolled value
 * - moveToNextTurn:       record finished players, end the game or pass the turn on
 * - waitingForReconnect:  hold the game until a rejoin code arrives, then resume
 * - done:                 nothing left to do
 *
 * Rolling rules:
 * - While figures wait in start, a figure on the entry field must move away first
 * - A 6 with figures in start and a free entry field brings a figure out
 * - Otherwise, if any figure can move, the player chooses (rolled state)
 * - A 6 earns another roll, unless it brought the player's last figure home
 * - A player without figures on the track gets three attempts to roll a usable number
 */

import { AsyncQueue } from './async-queue.js';
import { PlayerSocket } from './connection.js';
import { DieDistribution } from './dice.js';
import { Game } from './game.js';
import { createCategoryLogger } from './logger.js';
import { GamePlayer } from './player.js';
import { DIE_SIDES, MAX_ROLL_ATTEMPTS, isGameError } from './types.js';

const logger = createCategoryLogger('game.state');

export type GameState =
  | { kind: 'waitingForReconnect'; previous: GameState }
  | { kind: 'startTurn'; attempt: number }
  | { kind: 'rolled'; value: number }
  | { kind: 'moveToNextTurn' }
  | { kind: 'done' };

export const GameStates = {
  startTurn: (attempt = 0): GameState => ({ kind: 'startTurn', attempt }),
  rolled: (value: number): GameState => ({ kind: 'rolled', value }),
  moveToNextTurn: (): GameState => ({ kind: 'moveToNextTurn' }),
  done: (): GameState => ({ kind: 'done' }),
  waitingForReconnect: (previous: GameState): GameState =>
    previous.kind === 'waitingForReconnect' ? previous : { kind: 'waitingForReconnect', previous }
};

export interface RejoinRequest {
  code: string;
  socket: PlayerSocket;
}

export interface StepOptions {
  /** How long one wait for a rejoin may last in total before the game is given up; 0 waits forever. */
  reconnectTimeoutMs?: number;
}

export type RollDecision =
  | { kind: 'auto'; figure: number }
  | { kind: 'choose'; figures: number[] }
  | { kind: 'none' };

/** Decides what a roll of `value` means for `player` before anyone picks a figure. */
export function decideRoll(player: GamePlayer, value: number): RollDecision {
  if (player.hasFiguresInStart()) {
    const onEntry = player.figureOnEntryField();
    if (onEntry !== undefined && player.canMoveFigure(onEntry, value)) {
      return { kind: 'auto', figure: onEntry };
    }

    const waiting = player.firstFigureInStart();
    if (value === DIE_SIDES && onEntry === undefined && waiting !== undefined) {
      return { kind: 'auto', figure: waiting };
    }
  }

  const figures = player.movableFigures(value);
  return figures.length > 0 ? { kind: 'choose', figures } : { kind: 'none' };
}

// A player with every figure home never rolls again, even after a 6
function afterMove(player: GamePlayer, value: number): GameState {
  if (!player.hasFiguresLeft()) {
    return GameStates.moveToNextTurn();
  }
  return value === DIE_SIDES ? GameStates.startTurn(0) : GameStates.moveToNextTurn();
}

function afterNoMove(player: GamePlayer, value: number, attempt: number): GameState {
  if (!player.hasFiguresLeft()) {
    return GameStates.moveToNextTurn();
  }
  if (value === DIE_SIDES) {
    return GameStates.startTurn(0);
  }
  if (!player.hasFiguresOnField() && attempt + 1 < MAX_ROLL_ATTEMPTS) {
    return GameStates.startTurn(attempt + 1);
  }
  return GameStates.moveToNextTurn();
}

function applyRejoin(game: Game, rejoin: RejoinRequest): number | undefined {
  const index = game.findPlayerByRejoinCode(rejoin.code);
  const player = index === undefined ? undefined : game.players[index];
  if (index === undefined || !player) {
    logger.warn('Unknown rejoin code');
    rejoin.socket.close(4004, 'unknown rejoin code');
    return undefined;
  }

  player.replaceSocket(rejoin.socket);
  logger.info(`Player ${index}(${player.name}) rejoined game ${game.id}`);
  return index;
}

async function resyncAfterRejoin(game: Game): Promise<void> {
  await game.sendState();
  await game.indicatePlayers();
}

// Rejoins that arrived while the game was not waiting for one
async function applyPendingRejoins(game: Game, rejoins: AsyncQueue<RejoinRequest>): Promise<void> {
  const pending = rejoins.drain();
  if (pending.length === 0) return;

  let rejoined = false;
  for (const rejoin of pending) {
    if (applyRejoin(game, rejoin) !== undefined) rejoined = true;
  }
  if (rejoined) {
    await resyncAfterRejoin(game);
  }
}

async function waitForReconnect(
  previous: GameState,
  game: Game,
  rejoins: AsyncQueue<RejoinRequest>,
  options: StepOptions
): Promise<GameState | null> {
  logger.debug(`Game ${game.id} waiting for a player to rejoin`);

  const timeoutMs = options.reconnectTimeoutMs ?? 0;
  // unknown codes do not extend the wait
  const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : undefined;

  for (;;) {
    const remaining = deadline === undefined ? undefined : deadline - Date.now();
    const rejoin = remaining === undefined || remaining > 0 ? await rejoins.next(remaining) : undefined;
    if (!rejoin) {
      logger.warn(rejoins.closed
        ? `Rejoin queue for game ${game.id} closed`
        : `No rejoin for game ${game.id} within ${timeoutMs}ms`);
      return null;
    }

    const index = applyRejoin(game, rejoin);
    if (index === undefined) {
      continue;
    }

    await resyncAfterRejoin(game);

    if (previous.kind === 'rolled' && index === game.nextPlayer) {
      try {
        await game.currentPlayer.sendResponse({ type: 'rolled', value: previous.value, canMove: true });
      } catch (error) {
        if (!isGameError(error)) throw error;
        return GameStates.waitingForReconnect(previous);
      }
    }

    return previous;
  }
}

async function startTurn(
  state: Extract<GameState, { kind: 'startTurn' }>,
  game: Game,
  die: DieDistribution
): Promise<GameState> {
  const player = game.currentPlayer;

  try {
    await player.sendResponse({ type: 'turn' });
  } catch (error) {
    if (!isGameError(error)) throw error;
    logger.warn(`Player ${player.name} disconnected before their turn`);
    return GameStates.waitingForReconnect(state);
  }

  const received = await player.receiveRequest();
  switch (received.kind) {
    case 'disconnect':
      logger.warn(`Player ${player.name} disconnected: ${received.reason}`);
      return GameStates.waitingForReconnect(state);
    case 'invalid':
      logger.error(`Error message(${JSON.stringify(received.text)}): ${received.error.message}`, received.error.details);
      return state;
    case 'request':
      break;
  }

  if (received.request.type !== 'roll') {
    logger.error(`Unexpected ${received.request.type} request from ${player.name}, expected roll`);
    return state;
  }

  logger.trace(`Rolling for player ${player.name}`);
  const value = die.sample(game.rng);
  logger.trace(`Rolled ${value} for player ${player.name}`);

  const decision = decideRoll(player, value);

  let delivered = true;
  try {
    await player.sendResponse({ type: 'rolled', value, canMove: decision.kind === 'choose' });
  } catch (error) {
    if (!isGameError(error)) throw error;
    delivered = false;
  }

  let next: GameState;
  switch (decision.kind) {
    case 'auto':
      if (player.moveFigure(decision.figure, value) === null) {
        logger.warn('Figure could not be moved');
      }
      game.checkMove(game.nextPlayer);
      await game.sendState();
      next = afterMove(player, value);
      break;
    case 'choose':
      next = GameStates.rolled(value);
      break;
    case 'none':
      next = afterNoMove(player, value, state.attempt);
      break;
  }

  return delivered ? next : GameStates.waitingForReconnect(next);
}

async function rolled(state: Extract<GameState, { kind: 'rolled' }>, game: Game): Promise<GameState> {
  const player = game.currentPlayer;

  const received = await player.receiveRequest();
  switch (received.kind) {
    case 'disconnect':
      logger.warn(`Player ${player.name} disconnected: ${received.reason}`);
      return GameStates.waitingForReconnect(state);
    case 'invalid':
      logger.error(`Error message(${JSON.stringify(received.text)}): ${received.error.message}`, received.error.details);
      return state;
    case 'request':
      break;
  }

  const request = received.request;
  if (request.type !== 'move') {
    logger.error(`Unexpected ${request.type} request from ${player.name}, expected move`);
    return state;
  }

  logger.trace(`Move figure ${request.figure} by rolled ${state.value}`);

  if (player.moveFigure(request.figure, state.value) === null) {
    logger.warn(`Could not move figure ${request.figure} of ${player.name} by ${state.value}`);
    try {
      await player.sendResponse({ type: 'rolled', value: state.value, canMove: true });
    } catch (error) {
      if (!isGameError(error)) throw error;
      return GameStates.waitingForReconnect(state);
    }
    return state;
  }

  game.checkMove(game.nextPlayer);
  await game.sendState();

  return afterMove(player, state.value);
}

async function moveToNextTurn(game: Game): Promise<GameState> {
  const player = game.currentPlayer;

  if (!player.isDone() && player.checkDone()) {
    logger.debug(`Player ${game.nextPlayer}(${player.name}) is done`);
    game.ranking.push(game.nextPlayer);
    await game.broadcast({ type: 'playerDone', player: game.nextPlayer });
  }

  if (game.isDone()) {
    logger.debug(`Game ${game.id} is done`);
    await game.broadcast({ type: 'gameDone', ranking: [...game.ranking] });
    return GameStates.done();
  }

  game.advanceToNextPlayer();
  return GameStates.startTurn(0);
}

/**
 * Runs one state of the game. Returns the following state, or null when the
 * game is over or can no longer continue.
 */
export async function step(
  prev: GameState,
  game: Game,
  rejoins: AsyncQueue<RejoinRequest>,
  die: DieDistribution,
  options: StepOptions = {}
): Promise<GameState | null> {
  if (prev.kind === 'done') {
    return null;
  }
  if (prev.kind === 'waitingForReconnect') {
    return waitForReconnect(prev.previous, game, rejoins, options);
  }

  await applyPendingRejoins(game, rejoins);

  logger.debug(`Player ${game.nextPlayer}(${game.currentPlayer.name}) is the currently running player`);

  switch (prev.kind) {
    case 'startTurn':
      return startTurn(prev, game, die);
    case 'rolled':
      return rolled(prev, game);
    case 'moveToNextTurn':
      return moveToNextTurn(game);
  }
}
