import { describe, it, expect, vi } from 'vitest';
import { APIError } from 'openai';
import { silentLogger } from '../src/logger.js';
import type { StreamChunk } from '../src/providers/types.js';
import { DONE_FRAME, formatDataFrame, StreamRelay, type EventSink, type RelayState } from '../src/relay/index.js';
import { chunk, fromArray } from './helpers/fake-provider.js';
import { MemorySink } from './helpers/memory-sink.js';

function createRelay(bufferSize?: number): { relay: StreamRelay<StreamChunk>; states: RelayState[] } {
  const relay = new StreamRelay<StreamChunk>({ logger: silentLogger, bufferSize });
  const states: RelayState[] = [];
  relay.on('stateChange', ({ to }: { from: RelayState; to: RelayState }) => states.push(to));
  return { relay, states };
}

describe('StreamRelay', () => {
  it('frames every chunk in order and ends with [DONE]', async () => {
    const { relay, states } = createRelay();
    const sink = new MemorySink();
    const chunks = [chunk('gpt-4o', 'Hello'), chunk('gpt-4o', ' world')];

    const result = await relay.run(sink, async () => fromArray(chunks));

    expect(result).toEqual({ state: 'closed', frames: 2 });
    expect(sink.frames).toEqual([
      `data: ${JSON.stringify(chunks[0])}\n\n`,
      `data: ${JSON.stringify(chunks[1])}\n\n`,
      'data: [DONE]\n\n',
    ]);
    expect(sink.opened).toBe(true);
    expect(sink.ended).toBe(true);
    expect(states).toEqual(['opening', 'emitting', 'terminating', 'closed']);
    expect(relay.getState()).toBe('closed');
  });

  it('starts idle', () => {
    const { relay } = createRelay();
    expect(relay.getState()).toBe('idle');
  });

  it('sends only [DONE] for an empty stream', async () => {
    const { relay } = createRelay();
    const sink = new MemorySink();
    const result = await relay.run(sink, async () => fromArray<StreamChunk>([]));
    expect(result).toEqual({ state: 'closed', frames: 0 });
    expect(sink.frames).toEqual([DONE_FRAME]);
  });

  it('rethrows an opening failure without touching the sink', async () => {
    const { relay, states } = createRelay();
    const sink = new MemorySink();
    const upstream = APIError.generate(429, { error: { message: 'slow down' } }, undefined, {});

    await expect(relay.run(sink, () => Promise.reject(upstream))).rejects.toBe(upstream);
    expect(sink.opened).toBe(false);
    expect(sink.frames).toEqual([]);
    expect(states).toEqual(['opening', 'failed']);
  });

  it('ends a failed stream with one error frame and no [DONE]', async () => {
    const { relay } = createRelay();
    const sink = new MemorySink();
    const first = chunk('gpt-4o', 'partial');
    async function* failing(): AsyncGenerator<StreamChunk> {
      yield first;
      throw APIError.generate(500, { error: { message: 'boom' } }, undefined, {});
    }

    const result = await relay.run(sink, async () => failing());

    expect(result.state).toBe('failed');
    expect(result.frames).toBe(1);
    expect(result.error?.kind).toBe('UpstreamBadGateway');
    expect(sink.frames).toEqual([
      formatDataFrame(JSON.stringify(first)),
      'data: {"error":{"message":"Upstream error (500): boom","type":"proxy_error","code":"UpstreamBadGateway"}}\n\n',
    ]);
    expect(sink.ended).toBe(true);
  });

  it('stops pulling and releases the upstream when the client disconnects', async () => {
    const { relay } = createRelay(1);
    const sink = new MemorySink({ disconnectAfter: 3 });
    let pulled = 0;
    let released = false;
    let upstreamSignal: AbortSignal | undefined;
    async function* endless(): AsyncGenerator<StreamChunk> {
      try {
        for (;;) {
          pulled++;
          yield chunk('gpt-4o', `#${pulled}`);
        }
      } finally {
        released = true;
      }
    }

    const result = await relay.run(sink, async (signal) => {
      upstreamSignal = signal;
      return endless();
    });

    expect(result).toEqual({ state: 'cancelled', frames: 3 });
    expect(sink.frames).toHaveLength(3);
    expect(sink.frames).not.toContain(DONE_FRAME);
    expect(upstreamSignal?.aborted).toBe(true);
    await vi.waitFor(() => expect(released).toBe(true));
    // three written, one buffered, one held by the blocked producer
    expect(pulled).toBeLessThanOrEqual(5);
  });

  it('bounds read-ahead by the default buffer size after a disconnect', async () => {
    const { relay } = createRelay();
    const sink = new MemorySink({ disconnectAfter: 3 });
    let pulled = 0;
    let released = false;
    async function* endless(): AsyncGenerator<StreamChunk> {
      try {
        for (;;) {
          pulled++;
          yield chunk('gpt-4o', `#${pulled}`);
        }
      } finally {
        released = true;
      }
    }

    const result = await relay.run(sink, async () => endless());

    expect(result).toEqual({ state: 'cancelled', frames: 3 });
    expect(relay.getState()).toBe('cancelled');
    await vi.waitFor(() => expect(released).toBe(true));
    // three written, two buffered, one held by the blocked producer
    expect(pulled).toBeLessThanOrEqual(6);
  });

  it('does not open the sink when the client left while opening', async () => {
    const { relay, states } = createRelay();
    const sink = new MemorySink();

    const result = await relay.run(sink, async (signal) => {
      sink.disconnect();
      expect(signal.aborted).toBe(true);
      return fromArray([chunk('gpt-4o', 'late')]);
    });

    expect(result).toEqual({ state: 'cancelled', frames: 0 });
    expect(sink.opened).toBe(false);
    expect(sink.frames).toEqual([]);
    expect(states).toEqual(['opening', 'cancelled']);
  });

  it('cancels when a write fails', async () => {
    const { relay } = createRelay();
    const sink: EventSink = {
      open: () => {},
      write: () => Promise.reject(new Error('EPIPE')),
      end: () => {},
      onClose: () => {},
    };

    const result = await relay.run(sink, async () => fromArray([chunk('gpt-4o', 'a'), chunk('gpt-4o', 'b')]));
    expect(result).toEqual({ state: 'cancelled', frames: 0 });
    expect(relay.signal.aborted).toBe(true);
  });

  it('runs only once', async () => {
    const { relay } = createRelay();
    await relay.run(new MemorySink(), async () => fromArray<StreamChunk>([]));
    await expect(relay.run(new MemorySink(), async () => fromArray<StreamChunk>([]))).rejects.toThrow(
      'Relay already ran (state: closed)'
    );
  });
});
