import { describe, it, expect, vi } from 'vitest';
import { ProtocolError, TransportError } from './errors';
import { jsonCodec } from './protocol';
import { ReceiveWorker, type ReceiveSink } from './receive-worker';
import { FakeConnection, settle, silentLogger } from './test-helpers';

function createSink() {
  return {
    inbound: vi.fn(),
    closed: vi.fn(),
    failed: vi.fn(),
  } satisfies ReceiveSink;
}

function startWorker(connection: FakeConnection, sink: ReceiveSink, logger = silentLogger) {
  const worker = new ReceiveWorker(connection, sink, { codec: jsonCodec, logger, errorBackoff: 0 });
  worker.start();
  return worker;
}

describe('ReceiveWorker', () => {
  it('should forward decoded text frames', async () => {
    const connection = new FakeConnection();
    const sink = createSink();
    const worker = startWorker(connection, sink);

    connection.deliverEnvelope({ topic: 'room:a', event: 'new_msg', payload: { text: 'hi' }, ref: null });
    await settle();

    expect(sink.inbound).toHaveBeenCalledWith({
      topic: 'room:a',
      event: 'new_msg',
      payload: { text: 'hi' },
      ref: null,
    });
    worker.stop();
  });

  it('should answer a ping with a pong carrying the same data', async () => {
    const connection = new FakeConnection();
    const sink = createSink();
    const worker = startWorker(connection, sink);
    const data = new Uint8Array([1, 2, 3]);

    connection.deliver({ type: 'ping', data });
    await settle();

    expect(connection.sent).toEqual([{ type: 'pong', data }]);
    expect(sink.inbound).not.toHaveBeenCalled();
    worker.stop();
  });

  it('should ignore pongs', async () => {
    const connection = new FakeConnection();
    const sink = createSink();
    const worker = startWorker(connection, sink);

    connection.deliver({ type: 'pong', data: new Uint8Array() });
    await settle();

    expect(sink.inbound).not.toHaveBeenCalled();
    expect(sink.failed).not.toHaveBeenCalled();
    expect(connection.sent).toEqual([]);
    worker.stop();
  });

  it('should report a close frame and exit', async () => {
    const connection = new FakeConnection();
    const sink = createSink();
    const worker = startWorker(connection, sink);

    connection.deliver({ type: 'close', code: 1000, reason: 'bye' });
    await worker.done;

    expect(sink.closed).toHaveBeenCalledWith(1000, 'bye');
    expect(worker.running).toBe(false);
    expect(connection.pendingReceives).toBe(0);
  });

  it('should report an undecodable frame and keep reading', async () => {
    const connection = new FakeConnection();
    const sink = createSink();
    const logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const worker = startWorker(connection, sink, logger);

    connection.deliver({ type: 'text', data: '{oops' });
    connection.deliverEnvelope({ topic: 'room:a', event: 'after', payload: {}, ref: null });
    await settle();
    await settle();

    expect(sink.failed).toHaveBeenCalledTimes(1);
    expect(sink.failed.mock.calls[0]?.[0]).toBeInstanceOf(ProtocolError);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(sink.inbound).toHaveBeenCalledWith({ topic: 'room:a', event: 'after', payload: {}, ref: null });
    worker.stop();
  });

  it('should report a receive error and keep reading', async () => {
    const connection = new FakeConnection();
    const sink = createSink();
    const worker = startWorker(connection, sink);
    const error = new TransportError('socket hiccup');

    connection.fail(error);
    connection.deliverEnvelope({ topic: 'room:a', event: 'after', payload: {}, ref: null });
    await settle();
    await settle();

    expect(sink.failed).toHaveBeenCalledWith(error);
    expect(sink.inbound).toHaveBeenCalledTimes(1);
    worker.stop();
  });

  it('should pause after an error before reading again', async () => {
    vi.useFakeTimers();
    try {
      const connection = new FakeConnection();
      const sink = createSink();
      const worker = new ReceiveWorker(connection, sink, {
        codec: jsonCodec,
        logger: silentLogger,
        errorBackoff: 100,
      });
      worker.start();

      connection.fail(new TransportError('first'));
      connection.deliverEnvelope({ topic: 'room:a', event: 'after', payload: {}, ref: null });
      await vi.advanceTimersByTimeAsync(99);
      expect(sink.inbound).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(sink.inbound).toHaveBeenCalledTimes(1);
      worker.stop();
    } finally {
      vi.useRealTimers();
    }
  });

  it('should abort a pending read when stopped', async () => {
    const connection = new FakeConnection();
    const sink = createSink();
    const worker = startWorker(connection, sink);
    await settle();
    expect(connection.pendingReceives).toBe(1);

    worker.stop();
    await worker.done;

    expect(connection.pendingReceives).toBe(0);
    expect(worker.running).toBe(false);
    expect(sink.failed).not.toHaveBeenCalled();
  });

  it('should report a failed pong', async () => {
    const connection = new FakeConnection();
    connection.sendError = new TransportError('write failed');
    const sink = createSink();
    const worker = startWorker(connection, sink);

    connection.deliver({ type: 'ping', data: new Uint8Array() });
    await settle();

    expect(sink.failed).toHaveBeenCalledWith(connection.sendError);
    worker.stop();
  });
});
