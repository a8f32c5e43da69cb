/**
 * Core Types - Board, Figures, Protocol Messages and Errors
 *
 * Board layout:
 * - 40 track fields shared by all players
 * - Player i enters the track at absolute field i * 10
 * - Every player owns a start area and a house of 4 slots
 *
 * Figures are tracked relative to their owner: `moved` counts fields from the
 * owner's entry field, `pos` is the slot inside the owner's house.
 */

export const FIELD_COUNT = 40;
export const HOUSE_SIZE = 4;
export const FIGURES_PER_PLAYER = 4;
export const MAX_PLAYERS = 4;
export const START_OFFSET = 10;
export const DIE_SIDES = 6;
export const MAX_ROLL_ATTEMPTS = 3;

export type Figure =
  | { kind: 'inStart' }
  | { kind: 'onField'; moved: number }
  | { kind: 'inHouse'; pos: number };

export type Figures = [Figure, Figure, Figure, Figure];

export function inStart(): Figure {
  return { kind: 'inStart' };
}

export function onField(moved: number): Figure {
  return { kind: 'onField', moved };
}

export function inHouse(pos: number): Figure {
  return { kind: 'inHouse', pos };
}

export function sameFigure(a: Figure, b: Figure): boolean {
  switch (a.kind) {
    case 'inStart':
      return b.kind === 'inStart';
    case 'onField':
      return b.kind === 'onField' && b.moved === a.moved;
    case 'inHouse':
      return b.kind === 'inHouse' && b.pos === a.pos;
  }
}

export function startingFigures(): Figures {
  return [inStart(), inStart(), inStart(), inStart()];
}

/** Absolute track field of an on-field figure owned by `playerIndex`. */
export function absoluteField(moved: number, playerIndex: number): number {
  return (moved + playerIndex * START_OFFSET) % FIELD_COUNT;
}

// Client -> server
export type GameRequest =
  | { type: 'roll' }
  | { type: 'move'; figure: number };

// Server -> client
export type GameResponse =
  | { type: 'rejoinCode'; game: string; code: string }
  | { type: 'indicatePlayer'; player: number; name: string; you: boolean }
  | { type: 'state'; players: Array<[string, Figures]> }
  | { type: 'turn' }
  | { type: 'rolled'; value: number; canMove: boolean }
  | { type: 'playerDone'; player: number }
  | { type: 'gameDone'; ranking: number[] };

export enum GameErrorCode {
  DISCONNECT = 'DISCONNECT',
  INVALID_MESSAGE = 'INVALID_MESSAGE',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SESSION_NOT_JOINABLE = 'SESSION_NOT_JOINABLE',
  CONFIG_ERROR = 'CONFIG_ERROR',
  OTHER = 'OTHER'
}

export class GameError extends Error {
  public code: GameErrorCode;
  public details?: unknown;

  constructor(message: string, code: GameErrorCode = GameErrorCode.OTHER, details?: unknown) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.details = details;
  }
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
