import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CountingMetricsObserver,
  createDeliveryEngine,
  DeliveryError,
  QueueFullError,
  RenderError,
  WriteError,
  type EngineOptions,
  type LogRequest
} from '../../src/delivery/index.js';
import { BufferPool } from '../../src/encoding/index.js';
import { err, float64, int, str, type Field } from '../../src/fields/index.js';
import {
  BaseTransport,
  LevelWriterFactory,
  MemoryTransport,
  type LogWriter
} from '../../src/transports/index.js';
import { TEST_CONSTANTS, hostileError, newYear } from '../test-constants.js';

const NEW_YEAR = TEST_CONSTANTS.TIMESTAMPS.NEW_YEAR_RFC;

function request(message: string, fields: readonly Field[] = [], level: number = 0): LogRequest {
  return { level, message, timestamp: newYear(), fields };
}

function setup(options: EngineOptions = {}) {
  const transport = new MemoryTransport();
  const errors: DeliveryError[] = [];
  const engine = createDeliveryEngine({
    writer: transport,
    errorHandler: (error) => errors.push(error),
    ...options
  });
  return { engine, transport, errors };
}

// Transport that resolves each write on a timer
class SlowTransport extends BaseTransport {
  readonly written: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly delays: number[] = []) {
    super('slow');
  }

  write(chunk: Uint8Array): Promise<void> {
    const text = new TextDecoder().decode(chunk);
    const delay = this.delays.shift() ?? 1;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    return new Promise((resolve) => {
      setTimeout(() => {
        this.written.push(text);
        this.active--;
        resolve();
      }, delay);
    });
  }
}

class FailingTransport extends BaseTransport {
  failNext = true;

  constructor() {
    super(TEST_CONSTANTS.TRANSPORT_NAMES.FAILING);
  }

  write(): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error(TEST_CONSTANTS.ERRORS.DISK_FULL);
    }
  }
}

describe('DeliveryEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('synchronous delivery', () => {
    it('writes the exact JSON record', () => {
      const { engine, transport } = setup({ format: 'json' });

      engine.log(request(TEST_CONSTANTS.MESSAGES.READY, [int('port', 8080)]));

      expect(transport.lines).toEqual([`{"ts":"${NEW_YEAR}","level":0,"msg":"ready","port":8080}\n`]);
    });

    it('writes bound fields before event fields', () => {
      const { engine, transport } = setup();

      engine.bind([str('svc', 'api')]).log(request(TEST_CONSTANTS.MESSAGES.READY, [int('code', 200)]));

      expect(transport.lines).toEqual([`ts=${NEW_YEAR} level=0 msg=ready svc=api code=200\n`]);
    });

    it('renders non-finite floats per format', () => {
      const json = setup({ format: 'json' });
      const text = setup({ format: 'text' });

      json.engine.log(request('m', [float64('f', Number.NaN)]));
      text.engine.log(request('m', [float64('f', Number.NaN)]));

      expect(json.transport.lines[0]).toBe(`{"ts":"${NEW_YEAR}","level":0,"msg":"m","f":null}\n`);
      expect(text.transport.lines[0]).toBe(`ts=${NEW_YEAR} level=0 msg=m f=NaN\n`);
    });

    it('does no encoding work for filtered levels', () => {
      const bufferPool = new BufferPool();
      const acquire = vi.spyOn(bufferPool, 'acquire');
      const { engine, transport } = setup({ minLevel: 'info', bufferPool });

      engine.log(request('hidden', [str('k', 'v')], TEST_CONSTANTS.LEVEL_VALUES.DEBUG));
      expect(acquire).not.toHaveBeenCalled();
      expect(transport.lines).toEqual([]);

      engine.log(request('shown', [], TEST_CONSTANTS.LEVEL_VALUES.INFO));
      expect(acquire).toHaveBeenCalledTimes(1);
      expect(transport.lines).toHaveLength(1);
    });

    it('filters out non-integer levels', () => {
      const { engine, transport, errors } = setup({ format: 'json', minLevel: 'trace' });

      engine.log(request('nan', [], Number.NaN));
      engine.log(request('fraction', [], 1.5));
      engine.log(request('infinite', [], Number.POSITIVE_INFINITY));

      expect(engine.enabled(Number.NaN)).toBe(false);
      expect(engine.enabled(1.5)).toBe(false);
      expect(transport.lines).toEqual([]);
      expect(errors).toEqual([]);
    });

    it('changes the minimum level for the engine and its children', () => {
      const { engine, transport } = setup();
      const child = engine.bind([str('svc', 'api')]);

      expect(child.setMinLevel('debug')).toBe(0);
      engine.log(request('root', [], TEST_CONSTANTS.LEVEL_VALUES.DEBUG));
      child.log(request('child', [], TEST_CONSTANTS.LEVEL_VALUES.DEBUG));

      expect(engine.minLevel).toBe(-4);
      expect(transport.lines).toEqual([
        `ts=${NEW_YEAR} level=-4 msg=root\n`,
        `ts=${NEW_YEAR} level=-4 msg=child svc=api\n`
      ]);
      expect(() => engine.setMinLevel(0.5)).toThrow(TypeError);
      expect(engine.minLevel).toBe(-4);
    });

    it('emits exactly the levels at or above the minimum', () => {
      const { engine, transport } = setup({ minLevel: 4 });

      for (const level of [-8, 3, 4, 5, 12]) {
        engine.log(request(String(level), [], level));
      }

      expect(transport.lines.map((line) => line.split(' ')[1])).toEqual(['level=4', 'level=5', 'level=12']);
      expect(engine.enabled(3)).toBe(false);
      expect(engine.enabled(4)).toBe(true);
    });

    it('returns buffers to the pool after the write', () => {
      const bufferPool = new BufferPool();
      const { engine } = setup({ bufferPool });

      engine.log(request('m'));
      engine.log(request('m'));

      expect(bufferPool.size).toBe(1);
    });

    it('serializes writes to an asynchronous transport', async () => {
      const slow = new SlowTransport([5, 1, 1]);
      const { engine } = setup({ writer: slow });

      engine.log(request('a'));
      engine.log(request('b'));
      engine.log(request('c'));
      await engine.flush();

      expect(slow.maxActive).toBe(1);
      expect(slow.written.map((line) => line.split('msg=')[1])).toEqual(['a\n', 'b\n', 'c\n']);
    });

    it('skips levels that have no writer', () => {
      const errorsTransport = new MemoryTransport(TEST_CONSTANTS.TRANSPORT_NAMES.ERRORS);
      const bufferPool = new BufferPool();
      const acquire = vi.spyOn(bufferPool, 'acquire');
      const { engine } = setup({
        writers: new LevelWriterFactory(undefined, new Map([[8, errorsTransport]])),
        bufferPool
      });

      engine.log(request('info'));
      engine.log(request('failure', [], 8));

      expect(acquire).toHaveBeenCalledTimes(1);
      expect(errorsTransport.lines).toEqual([`ts=${NEW_YEAR} level=8 msg=failure\n`]);
    });
  });

  describe('asynchronous delivery', () => {
    it('writes queued records in enqueue order', async () => {
      const { engine, transport } = setup({ async: true });

      for (const message of ['a', 'b', 'c', 'd']) {
        engine.log(request(message));
      }
      expect(transport.lines).toEqual([]);

      await engine.flush();
      expect(transport.lines.map((line) => line.split('msg=')[1])).toEqual(['a\n', 'b\n', 'c\n', 'd\n']);
    });

    it('copies the field list at enqueue time', async () => {
      const { engine, transport } = setup({ async: true });
      const fields: Field[] = [str('a', '1')];

      engine.log(request('m', fields));
      fields[0] = str('a', 'changed');
      fields.push(str('b', '2'));
      await engine.flush();

      expect(transport.lines).toEqual([`ts=${NEW_YEAR} level=0 msg=m a=1\n`]);
    });

    it('drops the incoming record under drop-newest', async () => {
      const { engine, transport, errors } = setup({ async: true, queueCapacity: 2, overflowPolicy: 'drop-newest' });

      for (const message of ['a', 'b', 'c']) {
        expect(engine.log(request(message))).toBeUndefined();
      }

      expect(engine.stats()).toEqual({ loggedErrors: 1, dropped: 1 });
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(QueueFullError);
      expect(errors[0].message).toBe('async queue full, dropping log entry (policy: drop-newest)');

      await engine.flush();
      expect(transport.lines.map((line) => line.split('msg=')[1])).toEqual(['a\n', 'b\n']);
    });

    it('evicts the oldest queued record under drop-oldest', async () => {
      const { engine, transport, errors } = setup({ async: true, queueCapacity: 2, overflowPolicy: 'drop-oldest' });

      for (const message of ['a', 'b', 'c']) {
        engine.log(request(message));
      }

      expect(engine.stats()).toEqual({ loggedErrors: 0, dropped: 0 });
      expect(errors).toEqual([]);

      await engine.flush();
      expect(transport.lines.map((line) => line.split('msg=')[1])).toEqual(['b\n', 'c\n']);
    });

    it('makes callers wait under block and drops nothing', async () => {
      const { engine, transport, errors } = setup({ async: true, queueCapacity: 1, overflowPolicy: 'block' });

      expect(engine.log(request('a'))).toBeUndefined();
      const waiting = engine.log(request('b'));
      expect(waiting).toBeInstanceOf(Promise);

      let admitted = false;
      const admission = Promise.resolve(waiting).then(() => {
        admitted = true;
      });
      await Promise.resolve();
      expect(admitted).toBe(false);

      await admission;
      expect(admitted).toBe(true);

      await engine.flush();
      expect(engine.stats()).toEqual({ loggedErrors: 0, dropped: 0 });
      expect(errors).toEqual([]);
      expect(transport.lines.map((line) => line.split('msg=')[1])).toEqual(['a\n', 'b\n']);
    });

    it('keeps arrival order for several blocked callers', async () => {
      const { engine, transport } = setup({ async: true, queueCapacity: 1, overflowPolicy: 'block' });

      const results = ['a', 'b', 'c', 'd'].map((message) => engine.log(request(message)));
      await Promise.all(results);
      await engine.flush();

      expect(transport.lines.map((line) => line.split('msg=')[1])).toEqual(['a\n', 'b\n', 'c\n', 'd\n']);
    });

    it('shares the queue and counters with child engines', async () => {
      const { engine, transport } = setup({ async: true, queueCapacity: 1 });
      const child = engine.bind([str('svc', 'api')]);

      engine.log(request('parent'));
      child.log(request('child'));

      expect(engine.stats().dropped).toBe(1);
      expect(child.stats().dropped).toBe(1);
      await child.flush();
      expect(transport.lines).toEqual([`ts=${NEW_YEAR} level=0 msg=parent\n`]);
    });
  });

  describe('errors', () => {
    it('counts and reports failed writes and keeps serving', () => {
      const failing = new FailingTransport();
      const { engine, errors } = setup({ writer: failing });

      engine.log(request('lost'));
      engine.log(request('kept'));

      expect(engine.stats()).toEqual({ loggedErrors: 1, dropped: 0 });
      expect(errors).toHaveLength(1);
      const [error] = errors;
      expect(error).toBeInstanceOf(WriteError);
      expect(error.code).toBe('WRITE_FAILED');
      expect(error.message).toBe('write to transport "failing-transport" failed: disk full');
      expect(error.cause).toBeInstanceOf(Error);
    });

    it('counts rejected asynchronous writes', async () => {
      const writer: LogWriter = {
        name: 'rejecting',
        write: () => Promise.reject(new Error(TEST_CONSTANTS.ERRORS.BOOM))
      };
      const { engine, errors } = setup({ writer });

      expect(engine.log(request('m'))).toBeUndefined();
      await engine.flush();

      expect(engine.stats().loggedErrors).toBe(1);
      expect(errors[0].message).toBe('write to transport "rejecting" failed: boom');
    });

    it('converts render faults into reported errors', () => {
      const bufferPool = new BufferPool();
      const { engine, transport, errors } = setup({ bufferPool });

      engine.log(request('bad', [err('e', hostileError())]));
      engine.log(request('good'));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(RenderError);
      expect(errors[0].message).toBe('fault during log formatting: message unavailable');
      expect(engine.stats()).toEqual({ loggedErrors: 1, dropped: 0 });
      expect(transport.lines).toEqual([`ts=${NEW_YEAR} level=0 msg=good\n`]);
      expect(bufferPool.size).toBe(1);
    });

    it('never lets a throwing error handler escape log()', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const { engine } = setup({
        writer: new FailingTransport(),
        errorHandler: () => {
          throw new Error(TEST_CONSTANTS.ERRORS.HANDLER_FAILED);
        }
      });

      expect(() => engine.log(request('m'))).not.toThrow();
      expect(consoleError).toHaveBeenCalledTimes(1);
      expect(consoleError.mock.calls[0][0]).toBe('[emberlog] error handler failed:');
    });

    it('reports to the console by default', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const engine = createDeliveryEngine({ writer: new FailingTransport() });

      engine.log(request('m'));

      expect(consoleError).toHaveBeenCalledTimes(1);
      expect(consoleError.mock.calls[0][0]).toBe('[emberlog] write to transport "failing-transport" failed: disk full');
    });
  });

  describe('metrics', () => {
    it('reports every write to the observer', () => {
      const metrics = new CountingMetricsObserver();
      const { engine, transport } = setup({ metrics });

      engine.log(request('m', [], 4));

      expect(metrics.count(4)).toBe(1);
      expect(metrics.bytes(4)).toBe(transport.bytesWritten);
      expect(metrics.errors(4)).toBe(0);
    });

    it('reports failed writes with the error and no bytes', () => {
      const metrics = new CountingMetricsObserver();
      const { engine } = setup({ metrics, writer: new FailingTransport() });

      engine.log(request('m'));

      expect(metrics.count(0)).toBe(1);
      expect(metrics.bytes(0)).toBe(0);
      expect(metrics.errors(0)).toBe(1);
    });

    it('reads the clock only when an observer is installed', () => {
      const now = vi.spyOn(performance, 'now');
      const { engine } = setup();

      engine.log(request('m'));
      expect(now).not.toHaveBeenCalled();

      engine.setMetricsObserver(new CountingMetricsObserver());
      engine.log(request('m'));
      expect(now).toHaveBeenCalledTimes(2);
    });

    it('resets counters on request', () => {
      const { engine } = setup({ writer: new FailingTransport() });
      engine.log(request('m'));

      engine.resetStats();

      expect(engine.stats()).toEqual({ loggedErrors: 0, dropped: 0 });
    });
  });

  describe('lifecycle', () => {
    it('drains queued records on close', async () => {
      const { engine, transport } = setup({ async: true });
      engine.log(request('a'));
      engine.log(request('b'));

      await engine.close();

      expect(engine.state).toBe('closed');
      expect(transport.lines).toHaveLength(2);
    });

    it('shares one completion between close calls', async () => {
      const { engine } = setup({ async: true });

      const first = engine.close();
      expect(engine.close()).toBe(first);
      expect(engine.state).toBe('closing');
      await first;
      await engine.close();

      expect(engine.state).toBe('closed');
    });

    it('writes synchronously while closing', async () => {
      const { engine, transport } = setup({ async: true });
      engine.log(request('queued'));

      const closing = engine.close();
      engine.log(request('late'));

      expect(transport.lines.map((line) => line.split('msg=')[1])).toEqual(['late\n']);
      await closing;
      expect(transport.lines.map((line) => line.split('msg=')[1])).toEqual(['late\n', 'queued\n']);
    });

    it('ignores records after close', async () => {
      const bufferPool = new BufferPool();
      const acquire = vi.spyOn(bufferPool, 'acquire');
      const { engine, transport } = setup({ bufferPool });
      await engine.close();

      expect(engine.log(request('m'))).toBeUndefined();
      expect(engine.enabled(0)).toBe(false);
      expect(acquire).not.toHaveBeenCalled();
      expect(transport.lines).toEqual([]);
    });

    it('flushes transports but leaves them open by default', async () => {
      const transport = new MemoryTransport();
      const flush = vi.spyOn(transport, 'flush');
      const close = vi.spyOn(transport, 'close');
      const engine = createDeliveryEngine({ writer: transport });

      await engine.close();

      expect(flush).toHaveBeenCalledTimes(1);
      expect(close).not.toHaveBeenCalled();
    });

    it('closes transports when asked to', async () => {
      const transport = new MemoryTransport();
      const close = vi.spyOn(transport, 'close');
      const engine = createDeliveryEngine({ writer: transport, closeWritersOnClose: true });

      await engine.close();
      await engine.close();

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('isolates transport flush failures', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const transport = new MemoryTransport();
      vi.spyOn(transport, 'flush').mockRejectedValue(new Error(TEST_CONSTANTS.ERRORS.DISK_FULL));
      const engine = createDeliveryEngine({ writer: transport });

      await expect(engine.flush()).resolves.toBeUndefined();
      expect(consoleError.mock.calls[0][0]).toBe('[emberlog] transport memory flush failed:');
    });
  });
});
