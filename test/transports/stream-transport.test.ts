import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import {
  createStderrTransport,
  createStdoutTransport,
  MemoryTransport,
  StreamTransport
} from '../../src/transports/index.js';
import { createDeliveryEngine, WriteError } from '../../src/delivery/index.js';
import { TEST_CONSTANTS, newYear } from '../test-constants.js';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

/** Writable that fails every write */
function failingStream(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback(new Error(TEST_CONSTANTS.ERRORS.DISK_FULL));
    }
  });
}

describe('StreamTransport', () => {
  it('writes chunks to the stream', async () => {
    const stream = new PassThrough();
    const transport = new StreamTransport(stream);

    await transport.write(encode('first\n'));
    await transport.write(encode('second\n'));

    expect(String(stream.read())).toBe('first\nsecond\n');
    expect(transport.name).toBe('stream');
  });

  it('rejects when the stream fails the write', async () => {
    const transport = new StreamTransport(failingStream(), { name: 'file' });

    await expect(transport.write(encode('x\n'))).rejects.toThrow(TEST_CONSTANTS.ERRORS.DISK_FULL);
  });

  it('rejects every later write once the stream has failed', async () => {
    const stream = failingStream();
    const transport = new StreamTransport(stream);
    await expect(transport.write(encode('first\n'))).rejects.toThrow(TEST_CONSTANTS.ERRORS.DISK_FULL);
    await new Promise<void>((resolve) => setImmediate(resolve));

    await expect(transport.write(encode('second\n'))).rejects.toThrow(TEST_CONSTANTS.ERRORS.DISK_FULL);
    await expect(transport.flush()).resolves.toBeUndefined();
  });

  it('keeps a failed write from crashing the engine', async () => {
    const errors: unknown[] = [];
    const engine = createDeliveryEngine({
      writer: new StreamTransport(failingStream(), { name: 'file' }),
      errorHandler: (error) => errors.push(error)
    });

    engine.log({ level: 0, message: 'lost', timestamp: newYear(), fields: [] });
    await engine.flush();
    engine.log({ level: 0, message: 'also lost', timestamp: newYear(), fields: [] });
    await engine.flush();

    expect(engine.stats()).toEqual({ loggedErrors: 2, dropped: 0 });
    expect(errors).toHaveLength(2);
    expect(errors[0]).toBeInstanceOf(WriteError);
  });

  it('stops listening for errors once it has ended its stream', async () => {
    const stream = new PassThrough();
    const transport = new StreamTransport(stream, { endOnClose: true });
    expect(stream.listenerCount('error')).toBe(1);

    await transport.close();

    expect(stream.listenerCount('error')).toBe(0);
  });

  it('keeps listening on a stream it does not own', async () => {
    const stream = new PassThrough();
    const transport = new StreamTransport(stream);

    await transport.close();

    expect(stream.listenerCount('error')).toBe(1);
  });

  it('leaves the stream open on close unless configured', async () => {
    const stream = new PassThrough();

    await new StreamTransport(stream).close();
    expect(stream.writableEnded).toBe(false);

    await new StreamTransport(stream, { endOnClose: true }).close();
    expect(stream.writableEnded).toBe(true);
  });

  it('flushes without waiting when nothing is buffered', async () => {
    const transport = new StreamTransport(new PassThrough());

    await expect(transport.flush()).resolves.toBeUndefined();
  });

  it('names the process stream transports', () => {
    expect(createStdoutTransport().name).toBe('stdout');
    expect(createStderrTransport().name).toBe('stderr');
  });

  it('shares one transport per process stream', () => {
    const first = createStdoutTransport();
    const listeners = process.stdout.listenerCount('error');

    const second = createStdoutTransport();

    expect(second).toBe(first);
    expect(process.stdout.listenerCount('error')).toBe(listeners);
  });
});

describe('MemoryTransport', () => {
  it('keeps records in write order', () => {
    const transport = new MemoryTransport();

    transport.write(encode('a\n'));
    transport.write(encode('bc\n'));

    expect(transport.lines).toEqual(['a\n', 'bc\n']);
    expect(transport.output).toBe('a\nbc\n');
    expect(transport.bytesWritten).toBe(5);
  });

  it('copies bytes on arrival', () => {
    const transport = new MemoryTransport();
    const chunk = encode('same\n');

    transport.write(chunk);
    chunk.fill(0x21);

    expect(transport.lines).toEqual(['same\n']);
  });

  it('clears its records', () => {
    const transport = new MemoryTransport(TEST_CONSTANTS.TRANSPORT_NAMES.MEMORY);
    transport.write(encode('a\n'));

    transport.clear();

    expect(transport.lines).toEqual([]);
    expect(transport.bytesWritten).toBe(0);
  });
});
