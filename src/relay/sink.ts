/**
 * Event sinks: where relayed frames go.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import { SSE_HEADERS } from './sse.js';

/**
 * Destination of an event stream. `write` resolves once the frame has been
 * handed to the transport and rejects after the peer went away.
 */
export interface EventSink {
  /** Commit the stream headers. */
  open(): void;
  write(frame: string): Promise<void>;
  end(): void;
  /** Called at most once, when the peer disconnects before `end()`. */
  onClose(listener: () => void): void;
}

export class ClientDisconnectedError extends Error {
  constructor() {
    super('Client disconnected');
    this.name = 'ClientDisconnectedError';
  }
}

/**
 * Sink over a `node:http` response.
 */
export class HttpEventSink implements EventSink {
  private readonly res: http.ServerResponse;
  private readonly closeListeners: Array<() => void> = [];
  private readonly pending = new Set<(error: Error) => void>();
  private disconnected = false;

  constructor(res: http.ServerResponse) {
    this.res = res;
    res.on('close', () => {
      if (res.writableFinished) return;
      this.disconnected = true;
      for (const listener of this.closeListeners.splice(0)) listener();
      for (const reject of this.pending) reject(new ClientDisconnectedError());
      this.pending.clear();
    });
  }

  open(): void {
    this.res.writeHead(200, SSE_HEADERS);
    this.res.flushHeaders();
  }

  write(frame: string): Promise<void> {
    if (this.disconnected || this.res.destroyed) {
      return Promise.reject(new ClientDisconnectedError());
    }
    return new Promise((resolve, reject) => {
      this.pending.add(reject);
      this.res.write(frame, (error) => {
        this.pending.delete(reject);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  end(): void {
    if (!this.res.writableEnded) this.res.end();
  }

  onClose(listener: () => void): void {
    if (this.disconnected) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }
}
