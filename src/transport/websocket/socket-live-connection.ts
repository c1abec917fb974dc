import type { Socket } from 'socket.io';
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
} from '../../types/events.js';
import type { LiveConnection, StreamFrame } from '../../types/stream-events.js';

export type TypedSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

/**
 * LiveConnection that pushes frames to one socket
 */
export class SocketLiveConnection implements LiveConnection {
  constructor(private readonly socket: TypedSocket) {}

  send(frame: StreamFrame): void {
    if (this.socket.disconnected) {
      throw new Error('Socket disconnected');
    }
    this.socket.emit('session:frame', frame);
  }
}
