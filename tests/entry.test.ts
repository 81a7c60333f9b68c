import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createEntry, isExpired, parseEntry } from '../src/entry.js';

describe('entry utilities', () => {
  describe('createEntry', () => {
    it('should create an entry with correct timestamps', () => {
      const before = Date.now();
      const entry = createEntry('test-value', 1000);
      const after = Date.now();

      assert.strictEqual(entry.value, 'test-value');
      assert.ok(entry.createdAt >= before && entry.createdAt <= after);
      assert.strictEqual(entry.expiresAt - entry.createdAt, 1000);
    });

    it('should read time from the given clock', () => {
      assert.deepStrictEqual(createEntry('v', 500, () => 2000), {
        value: 'v',
        createdAt: 2000,
        expiresAt: 2500,
      });
    });
  });

  describe('isExpired', () => {
    const entry = { value: 'value', createdAt: 1000, expiresAt: 2000 };

    it('should return false before expiresAt', () => {
      assert.strictEqual(isExpired(entry, () => 1999), false);
    });

    it('should return true once expiresAt is reached', () => {
      assert.strictEqual(isExpired(entry, () => 2000), true);
      assert.strictEqual(isExpired(entry, () => 5000), true);
    });

    it('should default to the wall clock', () => {
      assert.strictEqual(isExpired(createEntry('v', 10_000)), false);
    });
  });

  describe('parseEntry', () => {
    it('should decode a JSON entry', () => {
      const raw = JSON.stringify({ value: 'a', createdAt: 1, expiresAt: 2 });
      assert.deepStrictEqual(parseEntry(raw), { value: 'a', createdAt: 1, expiresAt: 2 });
    });

    it('should return undefined for anything else', () => {
      assert.strictEqual(parseEntry(null), undefined);
      assert.strictEqual(parseEntry(''), undefined);
      assert.strictEqual(parseEntry('{'), undefined);
      assert.strictEqual(parseEntry('"just a string"'), undefined);
      assert.strictEqual(parseEntry(JSON.stringify({ value: 'a', createdAt: '1', expiresAt: 2 })), undefined);
    });
  });
});
