/**
 * Player Connection Contract
 *
 * The game never touches a transport directly. Anything that can deliver
 * socket events and accept outgoing text frames can seat a player: the ws
 * adapter in server/ws-connection.ts in production, a scripted mock in tests.
 */

export type SocketEvent =
  | { type: 'text'; data: string }
  | { type: 'binary'; size: number }
  | { type: 'close'; code?: number; reason?: string }
  | { type: 'error'; error: Error };

export interface PlayerSocket {
  /** Rejects when the frame cannot be delivered. */
  send(text: string): Promise<void>;
  /** Next event from the client; `null` once the stream has ended. */
  receive(): Promise<SocketEvent | null>;
  close(code?: number, reason?: string): void;
}
