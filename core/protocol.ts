/**
 * Protocol - JSON Wire Codec for Game Messages
 *
 * Wire format is externally tagged JSON:
 * - Unit variants are bare strings: "Roll", "Turn", "InStart"
 * - Struct variants are single-key objects: {"Move":{"figure":2}}, {"OnField":{"moved":7}}
 *
 * Incoming client text is validated with Zod before it reaches the state machine.
 */

import { z } from 'zod';
import {
  Figure,
  Figures,
  GameError,
  GameErrorCode,
  GameRequest,
  GameResponse,
  inHouse,
  inStart,
  onField
} from './types.js';

const index = z.number().int().min(0);

const FigureWireSchema = z.union([
  z.literal('InStart'),
  z.object({ OnField: z.object({ moved: index }) }).strict(),
  z.object({ InHouse: z.object({ pos: index }) }).strict()
]);

type FigureWire = z.infer<typeof FigureWireSchema>;

const RequestWireSchema = z.union([
  z.literal('Roll'),
  z.object({ Move: z.object({ figure: index }) }).strict()
]);

type RequestWire = z.infer<typeof RequestWireSchema>;

const ResponseWireSchema = z.union([
  z.literal('Turn'),
  z.object({ RejoinCode: z.object({ game: z.string().uuid(), code: z.string().uuid() }) }).strict(),
  z.object({ IndicatePlayer: z.object({ player: index, name: z.string(), you: z.boolean() }) }).strict(),
  z.object({
    State: z.object({
      players: z.array(z.tuple([
        z.string(),
        z.tuple([FigureWireSchema, FigureWireSchema, FigureWireSchema, FigureWireSchema])
      ]))
    })
  }).strict(),
  z.object({ Rolled: z.object({ value: z.number().int().min(1).max(6), can_move: z.boolean() }) }).strict(),
  z.object({ PlayerDone: z.object({ player: index }) }).strict(),
  z.object({ GameDone: z.object({ ranking: z.array(index) }) }).strict()
]);

type ResponseWire = z.infer<typeof ResponseWireSchema>;

function figureToWire(figure: Figure): FigureWire {
  switch (figure.kind) {
    case 'inStart':
      return 'InStart';
    case 'onField':
      return { OnField: { moved: figure.moved } };
    case 'inHouse':
      return { InHouse: { pos: figure.pos } };
  }
}

function figureFromWire(wire: FigureWire): Figure {
  if (wire === 'InStart') return inStart();
  if ('OnField' in wire) return onField(wire.OnField.moved);
  return inHouse(wire.InHouse.pos);
}

type FiguresWire = [FigureWire, FigureWire, FigureWire, FigureWire];

function figuresToWire(figures: Figures): FiguresWire {
  return [figureToWire(figures[0]), figureToWire(figures[1]), figureToWire(figures[2]), figureToWire(figures[3])];
}

function figuresFromWire(wire: FiguresWire): Figures {
  return [figureFromWire(wire[0]), figureFromWire(wire[1]), figureFromWire(wire[2]), figureFromWire(wire[3])];
}

function responseToWire(response: GameResponse): ResponseWire {
  switch (response.type) {
    case 'turn':
      return 'Turn';
    case 'rejoinCode':
      return { RejoinCode: { game: response.game, code: response.code } };
    case 'indicatePlayer':
      return { IndicatePlayer: { player: response.player, name: response.name, you: response.you } };
    case 'state':
      return {
        State: {
          players: response.players.map(([name, figures]): [string, FiguresWire] => [name, figuresToWire(figures)])
        }
      };
    case 'rolled':
      return { Rolled: { value: response.value, can_move: response.canMove } };
    case 'playerDone':
      return { PlayerDone: { player: response.player } };
    case 'gameDone':
      return { GameDone: { ranking: response.ranking } };
  }
}

function responseFromWire(wire: ResponseWire): GameResponse {
  if (wire === 'Turn') return { type: 'turn' };
  if ('RejoinCode' in wire) return { type: 'rejoinCode', ...wire.RejoinCode };
  if ('IndicatePlayer' in wire) return { type: 'indicatePlayer', ...wire.IndicatePlayer };
  if ('State' in wire) {
    return {
      type: 'state',
      players: wire.State.players.map(([name, figures]): [string, Figures] => [name, figuresFromWire(figures)])
    };
  }
  if ('Rolled' in wire) return { type: 'rolled', value: wire.Rolled.value, canMove: wire.Rolled.can_move };
  if ('PlayerDone' in wire) return { type: 'playerDone', player: wire.PlayerDone.player };
  return { type: 'gameDone', ranking: wire.GameDone.ranking };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new GameError('Message is not valid JSON', GameErrorCode.INVALID_MESSAGE, {
      text,
      reason: error instanceof Error ? error.message : String(error)
    });
  }
}

export function encodeResponse(response: GameResponse): string {
  return JSON.stringify(responseToWire(response));
}

export function decodeRequest(text: string): GameRequest {
  const validation = RequestWireSchema.safeParse(parseJson(text));
  if (!validation.success) {
    throw new GameError('Unknown game request', GameErrorCode.INVALID_MESSAGE, validation.error.issues);
  }

  const wire: RequestWire = validation.data;
  if (wire === 'Roll') return { type: 'roll' };
  return { type: 'move', figure: wire.Move.figure };
}

// Client side of the codec, used by test clients
export function encodeRequest(request: GameRequest): string {
  const wire: RequestWire = request.type === 'roll' ? 'Roll' : { Move: { figure: request.figure } };
  return JSON.stringify(wire);
}

export function decodeResponse(text: string): GameResponse {
  const validation = ResponseWireSchema.safeParse(parseJson(text));
  if (!validation.success) {
    throw new GameError('Unknown game response', GameErrorCode.INVALID_MESSAGE, validation.error.issues);
  }
  return responseFromWire(validation.data);
}
