import { describe, it, expect, vi } from 'vitest';
import { bind, BoundFields, BufferPool, DEFAULT_RENDER_OPTIONS, encodePrefix } from '../../src/encoding/index.js';
import { int, str } from '../../src/fields/index.js';

const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe('BoundFields', () => {
  it('renders bound fields once per format', () => {
    const bound = BoundFields.EMPTY.bind([str('svc', 'api'), int('shard', 3)], DEFAULT_RENDER_OPTIONS);

    expect(decode(bound.prefix('text'))).toBe(' svc=api shard=3');
    expect(decode(bound.prefix('json'))).toBe(',"svc":"api","shard":3');
    expect(bound.size).toBe(2);
  });

  it('returns itself when binding nothing', () => {
    const bound = BoundFields.EMPTY.bind([str('svc', 'api')], DEFAULT_RENDER_OPTIONS);

    expect(bound.bind([], DEFAULT_RENDER_OPTIONS)).toBe(bound);
  });

  it('appends new fields after inherited ones and keeps duplicates', () => {
    const parent = BoundFields.EMPTY.bind([str('env', 'dev')], DEFAULT_RENDER_OPTIONS);
    const child = parent.bind([str('env', 'prod')], DEFAULT_RENDER_OPTIONS);

    expect(decode(child.prefix('text'))).toBe(' env=dev env=prod');
    expect(decode(parent.prefix('text'))).toBe(' env=dev');
  });

  it('produces the same bytes whether fields are bound in steps or at once', () => {
    const a = [str('svc', 'api')];
    const b = [int('code', 200), str('region', 'eu')];

    const stepwise = BoundFields.EMPTY.bind(a, DEFAULT_RENDER_OPTIONS).bind(b, DEFAULT_RENDER_OPTIONS);
    const together = BoundFields.EMPTY.bind([...a, ...b], DEFAULT_RENDER_OPTIONS);

    expect(stepwise.prefix('text')).toEqual(together.prefix('text'));
    expect(stepwise.prefix('json')).toEqual(together.prefix('json'));
  });

  it('freezes the bound field list', () => {
    const bound = BoundFields.EMPTY.bind([str('a', 'b')], DEFAULT_RENDER_OPTIONS);

    expect(Object.isFrozen(bound.fields)).toBe(true);
  });
});

describe('bind', () => {
  it('returns the concatenated list with both prefixes', () => {
    const result = bind([str('a', '1')], [str('b', '2')], DEFAULT_RENDER_OPTIONS);

    expect(result.fields).toEqual([str('a', '1'), str('b', '2')]);
    expect(decode(result.prefixes.text)).toBe(' a=1 b=2');
    expect(decode(result.prefixes.json)).toBe(',"a":"1","b":"2"');
  });
});

describe('encodePrefix', () => {
  it('returns pooled buffers after copying out', () => {
    const pool = new BufferPool();
    const release = vi.spyOn(pool, 'release');

    const bytes = encodePrefix('text', [str('k', 'v')], DEFAULT_RENDER_OPTIONS, pool);

    expect(decode(bytes)).toBe(' k=v');
    expect(release).toHaveBeenCalledTimes(1);
    expect(pool.size).toBe(1);
  });

  it('skips the pool for an empty list', () => {
    const pool = new BufferPool();
    const acquire = vi.spyOn(pool, 'acquire');

    expect(encodePrefix('json', [], DEFAULT_RENDER_OPTIONS, pool).length).toBe(0);
    expect(acquire).not.toHaveBeenCalled();
  });
});
