/**
 * Game Session Tests
 *
 * Lobby admission, the opening handshake, giving up on dropped players,
 * rejoining a running game and aborting.
 */

import { describe, it, expect, vi } from 'vitest';
import { GameSession } from '../../core/session.js';
import { onField, type GameResponse } from '../../core/types.js';
import { MockRandomSource, ModuloDie } from '../__mocks__/mock-random.js';
import { MockSocket, roll } from '../__mocks__/mock-socket.js';

const SESSION_ID = '3b0c7f5e-8a41-4d2b-9c6e-1f2a3b4c5d6e';

function rejoinCodeOf(responses: GameResponse[]): string {
  const first = responses[0];
  if (first?.type !== 'rejoinCode') {
    throw new Error('expected a rejoin code first');
  }
  return first.code;
}

describe('GameSession', () => {
  it('accepts between one and four players', () => {
    expect(() => new GameSession(SESSION_ID, 0)).toThrow('Player count must be between 1 and 4');
    expect(() => new GameSession(SESSION_ID, 5)).toThrow('Player count must be between 1 and 4');
    expect(new GameSession(SESSION_ID, 4).playerCount).toBe(4);
  });

  it('stops taking players once the lobby is full', () => {
    const session = new GameSession(SESSION_ID, 2);

    expect(session.join('ann', new MockSocket())).toBe(true);
    expect(session.isJoinable()).toBe(true);
    expect(session.join('ben', new MockSocket())).toBe(true);
    expect(session.isJoinable()).toBe(false);
    expect(session.join('cy', new MockSocket())).toBe(false);

    expect(session.info()).toMatchObject({ id: SESSION_ID, status: 'waiting', playerCount: 2, joined: 2 });
  });

  it('refuses rejoins before the game runs', () => {
    const session = new GameSession(SESSION_ID, 1);
    expect(session.rejoin('any-code', new MockSocket())).toBe(false);
  });

  it('opens the game and gives up when the player does not come back', async () => {
    const session = new GameSession(SESSION_ID, 1, {
      rng: new MockRandomSource([0]),
      die: new ModuloDie(),
      reconnectTimeoutMs: 10
    });
    const socket = MockSocket.withRequests(roll);
    session.join('ann', socket);

    const result = await session.run();

    expect(result).toEqual({ id: SESSION_ID, ranking: [], completed: false });
    expect(session.getStatus()).toBe('finished');
    expect(socket.responses().slice(1)).toEqual([
      { type: 'state', players: [['ann', [{ kind: 'inStart' }, { kind: 'inStart' }, { kind: 'inStart' }, { kind: 'inStart' }]]] },
      { type: 'indicatePlayer', player: 0, name: 'ann', you: true },
      { type: 'turn' },
      { type: 'rolled', value: 1, canMove: false },
      { type: 'turn' }
    ]);
    expect(rejoinCodeOf(socket.responses())).toMatch(/^[0-9a-f-]{36}$/);
    expect(socket.closed).toEqual({ code: 1001, reason: 'game ended' });
  });

  it('lets a dropped player rejoin with their code and carry on', async () => {
    const session = new GameSession(SESSION_ID, 1, {
      rng: new MockRandomSource([0, 5]),
      die: new ModuloDie()
    });
    const first = MockSocket.withRequests(roll);
    session.join('ann', first);
    const running = session.run();

    await vi.waitFor(() => expect(session.getState()?.kind).toBe('waitingForReconnect'));
    expect(session.getStatus()).toBe('running');

    const second = MockSocket.withRequests(roll);
    expect(session.rejoin(rejoinCodeOf(first.responses()), second)).toBe(true);

    await vi.waitFor(() => {
      expect(second.sent).toHaveLength(6);
      expect(session.getState()?.kind).toBe('waitingForReconnect');
    });

    expect(first.closed).toEqual({ code: 1000, reason: 'replaced by rejoin' });
    expect(second.responses().map(r => r.type)).toEqual(['state', 'indicatePlayer', 'turn', 'rolled', 'state', 'turn']);
    expect(second.responses()[3]).toEqual({ type: 'rolled', value: 6, canMove: false });
    expect(session.info().game?.players[0].figures[0]).toEqual(onField(0));

    session.abort('test over');
    expect(await running).toEqual({ id: SESSION_ID, ranking: [], completed: false });
    expect(second.closed).toEqual({ code: 1001, reason: 'test over' });
  });

  it('closes lobby connections when aborted before the game starts', async () => {
    const session = new GameSession(SESSION_ID, 2);
    const socket = new MockSocket();
    session.join('ann', socket);
    const running = session.run();

    session.abort('shutdown');

    expect(await running).toEqual({ id: SESSION_ID, ranking: [], completed: false });
    expect(socket.closed).toEqual({ code: 1001, reason: 'shutdown' });
    expect(session.getStatus()).toBe('finished');
    expect(session.join('ben', new MockSocket())).toBe(false);
  });

  it('closes seated lobby players when aborted after they were taken in', async () => {
    const session = new GameSession(SESSION_ID, 2);
    const socket = new MockSocket();
    session.join('ann', socket);
    const running = session.run();
    await Promise.resolve();
    await Promise.resolve();

    session.abort();

    await running;
    expect(socket.closed).toEqual({ code: 1001, reason: 'server shutting down' });
  });

  it('gives the seat back when a lobby player leaves', async () => {
    const session = new GameSession(SESSION_ID, 3);
    const ann = new MockSocket();
    const ben = new MockSocket();
    session.join('ann', ann);
    session.join('ben', ben);
    const running = session.run();
    await Promise.resolve();
    await Promise.resolve();

    expect(session.leave(ann)).toBe(true);
    expect(session.leave(ann)).toBe(false);
    expect(session.info()).toMatchObject({ status: 'waiting', joined: 1 });
    expect(session.join('cy', new MockSocket())).toBe(true);
    expect(session.info().joined).toBe(2);

    session.abort('test over');
    await running;
    expect(ann.closed).toBeUndefined();
    expect(ben.closed).toEqual({ code: 1001, reason: 'test over' });
  });

  it('frees the seat of a player still queued for the lobby', () => {
    const session = new GameSession(SESSION_ID, 3);
    const ann = new MockSocket();
    session.join('ann', ann);
    session.join('ben', new MockSocket());

    expect(session.leave(ann)).toBe(true);
    expect(session.info()).toMatchObject({ status: 'waiting', joined: 1 });
  });

  it('ends the session when the last lobby player leaves', async () => {
    const session = new GameSession(SESSION_ID, 2);
    const ann = new MockSocket();
    session.join('ann', ann);
    const running = session.run();
    await Promise.resolve();
    await Promise.resolve();

    expect(session.leave(ann)).toBe(true);

    expect(await running).toEqual({ id: SESSION_ID, ranking: [], completed: false });
    expect(session.getStatus()).toBe('finished');
    expect(session.info().joined).toBe(0);
    expect(session.join('ben', new MockSocket())).toBe(false);
  });

  it('ignores departures once the game is running', async () => {
    const session = new GameSession(SESSION_ID, 1, {
      rng: new MockRandomSource([0]),
      die: new ModuloDie()
    });
    const socket = MockSocket.withRequests(roll);
    session.join('ann', socket);
    const running = session.run();
    await vi.waitFor(() => expect(session.getStatus()).toBe('running'));

    expect(session.leave(socket)).toBe(false);
    expect(session.info().joined).toBe(1);

    session.abort('test over');
    await running;
  });

  it('closes a lobby that does not fill in time', async () => {
    const session = new GameSession(SESSION_ID, 2, { lobbyTimeoutMs: 10 });
    const ann = new MockSocket();
    session.join('ann', ann);

    expect(await session.run()).toEqual({ id: SESSION_ID, ranking: [], completed: false });
    expect(ann.closed).toEqual({ code: 1001, reason: 'lobby expired' });
    expect(session.getStatus()).toBe('finished');
    expect(session.join('ben', new MockSocket())).toBe(false);
    expect(session.info().joined).toBe(1);
  });

  it('expires a lobby nobody joined', async () => {
    const session = new GameSession(SESSION_ID, 2, { lobbyTimeoutMs: 10 });

    expect(await session.run()).toEqual({ id: SESSION_ID, ranking: [], completed: false });
    expect(session.info()).toMatchObject({ status: 'finished', joined: 0 });
  });
});
