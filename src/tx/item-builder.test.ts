/**
 * Transaction item builder tests
 */

import { describe, it, expect } from 'vitest';
import { TransactionItemBuilder } from './item-builder.js';

const ITEM_30 = `{"n":"${'x'.repeat(22)}"}`;

describe('TransactionItemBuilder', () => {
  it('finalizes an empty items array', () => {
    const builder = new TransactionItemBuilder();
    expect(builder.finalize(1700000000)).toEqual({
      ok: true,
      value: '{"items":[],"ts_created":1700000000,"datum_type":"tx"}',
    });
  });

  it('separates items with commas', () => {
    const builder = new TransactionItemBuilder();
    expect(builder.append('{"a":1}').ok).toBe(true);
    expect(builder.append('{"b":2}').ok).toBe(true);

    expect(builder.itemCount).toBe(2);
    expect(builder.finalize(5)).toEqual({
      ok: true,
      value: '{"items":[{"a":1},{"b":2}],"ts_created":5,"datum_type":"tx"}',
    });
  });

  it('grows by doubling without losing content', () => {
    expect(ITEM_30).toHaveLength(30);
    const builder = new TransactionItemBuilder({ initialCapacity: 16 });
    expect(builder.capacity).toBe(16);

    builder.append(ITEM_30);
    expect(builder.size).toBe(40);
    expect(builder.capacity).toBe(64);

    builder.append(ITEM_30);
    expect(builder.size).toBe(71);
    expect(builder.capacity).toBe(128);

    for (let i = 0; i < 20; i++) {
      builder.append(ITEM_30);
    }

    const document = builder.finalize(1);
    expect(document.ok).toBe(true);
    if (document.ok) {
      const parsed: { items: unknown[] } = JSON.parse(document.value);
      expect(parsed.items).toHaveLength(22);
      expect(parsed.items[21]).toEqual({ n: 'x'.repeat(22) });
    }
  });

  it('fails with AllocationFailure past the capacity ceiling and keeps prior content', () => {
    const builder = new TransactionItemBuilder({ initialCapacity: 16, maxCapacity: 32 });

    const result = builder.append(ITEM_30);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('AllocationFailure');
    }
    expect(builder.itemCount).toBe(0);
    expect(builder.size).toBe(10);
  });

  it('exposes the serialized items as the signing payload', () => {
    const builder = new TransactionItemBuilder();
    builder.append('{"a":1}');
    builder.append('{"b":2}');

    expect(Buffer.from(builder.itemsPayload()).toString('utf-8')).toBe('{"a":1},{"b":2}');
  });

  it('rejects an empty item', () => {
    const builder = new TransactionItemBuilder();
    const result = builder.append('');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidArgument');
    }
  });

  it('rejects invalid timestamps', () => {
    const builder = new TransactionItemBuilder();
    expect(builder.finalize(-1).ok).toBe(false);
    expect(builder.finalize(1.5).ok).toBe(false);
    expect(builder.isFinalized).toBe(false);
  });

  it('is sealed after finalize', () => {
    const builder = new TransactionItemBuilder();
    builder.append('{"a":1}');
    expect(builder.finalize(1).ok).toBe(true);

    expect(builder.isFinalized).toBe(true);
    expect(builder.size).toBe(0);

    const append = builder.append('{"b":2}');
    const again = builder.finalize(2);
    expect(append.ok).toBe(false);
    expect(again.ok).toBe(false);
    if (!again.ok) {
      expect(again.error.kind).toBe('InvalidArgument');
    }
  });

  it('is sealed after discard', () => {
    const builder = new TransactionItemBuilder();
    builder.append('{"a":1}');
    builder.discard();

    expect(builder.isFinalized).toBe(true);
    expect(builder.append('{"b":2}').ok).toBe(false);
  });
});
