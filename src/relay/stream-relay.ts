/**
 * Stream relay for server-sent chat completions.
 *
 * States: idle → opening → emitting → terminating → closed,
 * with failed (upstream error) and cancelled (client gone) as the other
 * terminal states.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'node:events';
import { normalizeError, type ProxyError } from '../errors.js';
import { defaultLogger, type Logger } from '../logger.js';
import { BoundedChannel, pump } from './channel.js';
import type { EventSink } from './sink.js';
import { DONE_FRAME, formatDataFrame, formatErrorFrame } from './sse.js';

export type RelayState = 'idle' | 'opening' | 'emitting' | 'terminating' | 'closed' | 'failed' | 'cancelled';

export interface StreamRelayOptions<T> {
  logger?: Logger;
  /** Chunks buffered between upstream and the sink (default: 2) */
  bufferSize?: number;
  serialize?: (chunk: T) => string;
}

export interface RelayResult {
  state: RelayState;
  /** Data frames written, excluding the terminal frame. */
  frames: number;
  /** Set when the stream failed after the headers were committed. */
  error?: ProxyError;
}

/**
 * Opens an upstream stream. Rejections before the first frame leave the
 * sink untouched so the caller can answer with a plain error response.
 */
export type StreamOpener<T> = (signal: AbortSignal) => Promise<AsyncIterable<T>>;

export class StreamRelay<T> extends EventEmitter {
  private state: RelayState = 'idle';
  private frames = 0;
  private channel: BoundedChannel<T> | null = null;
  private readonly controller = new AbortController();

  private readonly logger: Logger;
  private readonly bufferSize: number;
  private readonly serialize: (chunk: T) => string;

  constructor(opts: StreamRelayOptions<T> = {}) {
    super();
    this.logger = opts.logger ?? defaultLogger;
    this.bufferSize = opts.bufferSize ?? 2;
    this.serialize = opts.serialize ?? ((chunk) => JSON.stringify(chunk));
  }

  getState(): RelayState {
    return this.state;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  async run(sink: EventSink, open: StreamOpener<T>): Promise<RelayResult> {
    if (this.state !== 'idle') {
      throw new Error(`Relay already ran (state: ${this.state})`);
    }
    sink.onClose(() => this.cancel());
    this.transitionTo('opening');

    let source: AsyncIterable<T>;
    try {
      source = await open(this.signal);
    } catch (error) {
      if (this.signal.aborted) return this.finish('cancelled');
      this.transitionTo('failed');
      throw error;
    }

    if (this.signal.aborted) {
      await source[Symbol.asyncIterator]().return?.();
      return this.finish('cancelled');
    }

    sink.open();
    this.transitionTo('emitting');

    const channel = new BoundedChannel<T>(this.bufferSize);
    this.channel = channel;
    const producer = pump(source, channel, this.signal).catch((error: unknown) => {
      this.logger.debug(`Upstream release failed: ${describe(error)}`);
    });

    let failure: { error: unknown } | null = null;
    try {
      for await (const chunk of channel) {
        try {
          await sink.write(formatDataFrame(this.serialize(chunk)));
        } catch (error) {
          this.logger.debug(`Stream write failed: ${describe(error)}`);
          this.cancel();
          break;
        }
        this.frames++;
      }
    } catch (error) {
      failure = { error };
    }

    // Detached on cancellation; the source may still be unwinding
    if (this.signal.aborted) return this.finish('cancelled');
    await producer;

    if (failure) {
      const error = normalizeError(failure.error);
      try {
        await sink.write(formatErrorFrame(error));
      } catch (writeError) {
        this.logger.debug(`Error frame not delivered: ${describe(writeError)}`);
      }
      sink.end();
      return this.finish('failed', error);
    }

    this.transitionTo('terminating');
    try {
      await sink.write(DONE_FRAME);
    } catch (error) {
      this.logger.debug(`Terminal frame not delivered: ${describe(error)}`);
      this.cancel();
      return this.finish('cancelled');
    }
    sink.end();
    return this.finish('closed');
  }

  /**
   * Stop pulling from upstream and abort the in-flight call. Nothing is
   * written to the sink afterwards.
   */
  cancel(): void {
    if (this.signal.aborted) return;
    this.controller.abort();
    this.channel?.cancel();
  }

  private finish(state: RelayState, error?: ProxyError): RelayResult {
    this.transitionTo(state);
    const result: RelayResult = { state, frames: this.frames };
    if (error) result.error = error;
    return result;
  }

  private transitionTo(next: RelayState): void {
    const prev = this.state;
    if (prev === next) return;
    this.state = next;
    this.emit('stateChange', { from: prev, to: next });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
