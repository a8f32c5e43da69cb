/**
 * Game Tests
 *
 * Seating, captures, broadcasts, rejoin lookups and turn order.
 */

import { describe, it, expect } from 'vitest';
import { Game } from '../../core/game.js';
import { GameError, inHouse, inStart, onField } from '../../core/types.js';
import { MockSocket } from '../__mocks__/mock-socket.js';
import { createTestGame } from '../helpers/game-test-setup.js';

describe('Game', () => {
  describe('seating', () => {
    it('rejects games without players or with more than four', () => {
      expect(() => new Game('g', [])).toThrow(GameError);

      const five = Array.from({ length: 5 }, (_, i) => ({ name: `p${i}`, socket: new MockSocket() }));
      expect(() => new Game('g', five)).toThrow('A game needs between 1 and 4 players, got 5');
    });

    it('picks a random first player when none is given', () => {
      const seats = [0, 1, 2].map(i => ({ name: `p${i}`, socket: new MockSocket() }));
      const game = new Game('g', seats);

      expect(game.nextPlayer).toBeGreaterThanOrEqual(0);
      expect(game.nextPlayer).toBeLessThan(3);
      expect(game.currentPlayer).toBe(game.players[game.nextPlayer]);
    });

    it('gives every player a distinct rejoin code', () => {
      const { game } = createTestGame({ requests: [[], [], [], []] });
      const codes = new Set(game.players.map(p => p.rejoinCode));

      expect(codes.size).toBe(4);
      expect(game.findPlayerByRejoinCode(game.players[2].rejoinCode)).toBe(2);
      expect(game.findPlayerByRejoinCode('nope')).toBeUndefined();
    });
  });

  describe('checkMove', () => {
    it('captures opposing figures on the same absolute field', () => {
      const { game } = createTestGame({
        requests: [[], [], []],
        figures: [
          [onField(25), inStart(), inStart(), inStart()],
          [onField(15), onField(16), inStart(), inStart()],
          [onField(5), inHouse(0), inStart(), inStart()]
        ]
      });

      const captures = game.checkMove(0);

      expect(captures).toEqual([
        { player: 1, figure: 0, field: 25 },
        { player: 2, figure: 0, field: 25 }
      ]);
      expect(game.players[1].figures).toEqual([inStart(), onField(16), inStart(), inStart()]);
      expect(game.players[2].figures).toEqual([inStart(), inHouse(0), inStart(), inStart()]);
      expect(game.players[0].figures[0]).toEqual(onField(25));
    });

    it('wraps absolute fields around the board', () => {
      const { game } = createTestGame({
        figures: [[onField(2), inStart(), inStart(), inStart()], [onField(32), inStart(), inStart(), inStart()]]
      });

      expect(game.checkMove(1)).toEqual([{ player: 0, figure: 0, field: 2 }]);
    });

    it('does not capture figures in houses', () => {
      const { game } = createTestGame({
        figures: [[onField(10), inStart(), inStart(), inStart()], [inHouse(0), inStart(), inStart(), inStart()]]
      });

      expect(game.checkMove(0)).toEqual([]);
      expect(game.players[1].figures[0]).toEqual(inHouse(0));
    });
  });

  describe('broadcasts', () => {
    it('reports players that could not be reached and still reaches the rest', async () => {
      const { game, sockets } = createTestGame({ requests: [[], [], []] });
      sockets[1].failSends = true;

      expect(await game.broadcast({ type: 'playerDone', player: 2 })).toEqual([1]);
      expect(sockets[0].sent).toEqual(['{"PlayerDone":{"player":2}}']);
      expect(sockets[2].sent).toEqual(['{"PlayerDone":{"player":2}}']);
    });

    it('sends each player their own rejoin code', async () => {
      const { game, sockets } = createTestGame();
      await game.sendRejoinCodes();

      expect(sockets[1].responses()).toEqual([{ type: 'rejoinCode', game: game.id, code: game.players[1].rejoinCode }]);
    });

    it('tells each player which seat is theirs', async () => {
      const { game, sockets } = createTestGame({ names: ['ann', 'ben'] });
      await game.indicatePlayers();

      expect(sockets[1].responses()).toEqual([
        { type: 'indicatePlayer', player: 0, name: 'ann', you: false },
        { type: 'indicatePlayer', player: 1, name: 'ben', you: true }
      ]);
    });
  });

  describe('turn order', () => {
    it('wraps around to the first seat', () => {
      const { game } = createTestGame({ firstPlayer: 1 });
      game.advanceToNextPlayer();
      expect(game.nextPlayer).toBe(0);
    });

    it('is done when every player is done', () => {
      const { game } = createTestGame({ requests: [[]] });
      game.players[0].figures = [inHouse(0), inHouse(1), inHouse(2), inHouse(3)];

      expect(game.isDone()).toBe(false);
      game.players[0].checkDone();
      expect(game.isDone()).toBe(true);
    });
  });

  it('snapshots players, turn and ranking', () => {
    const { game } = createTestGame({ names: ['ann', 'ben'], firstPlayer: 1 });
    game.ranking.push(0);

    expect(game.snapshot()).toEqual({
      players: [
        { name: 'ann', figures: [inStart(), inStart(), inStart(), inStart()], done: false },
        { name: 'ben', figures: [inStart(), inStart(), inStart(), inStart()], done: false }
      ],
      nextPlayer: 1,
      ranking: [0]
    });
  });

  it('closes every connection', () => {
    const { game, sockets } = createTestGame();
    game.closeAll(1001, 'bye');

    expect(sockets.map(s => s.closed)).toEqual([{ code: 1001, reason: 'bye' }, { code: 1001, reason: 'bye' }]);
  });
});
