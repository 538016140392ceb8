import {suite, test} from 'node:test';
import * as assert from 'node:assert';
import {
  Aggregation,
  Cell,
  ReentrantUpdateError,
  setListenerErrorHandler,
} from '../../index.js';
import {waitMicrotasks} from './test-utils.js';

void suite('Cell', () => {
  void suite('get()', () => {
    void test('returns the initial value with an unfired signal', () => {
      const cell = new Cell(42);
      const [value, changed] = cell.get();
      assert.strictEqual(value, 42);
      assert.strictEqual(changed.fired, false);
      assert.strictEqual(cell.value, 42);
    });

    void test('returns the same signal until the cell changes', () => {
      const cell = new Cell('a');
      const [, first] = cell.get();
      const [, second] = cell.get();
      assert.strictEqual(first, second);
    });
  });

  void suite('set()', () => {
    void test('replaces the value and fires the previous signal', () => {
      const cell = new Cell(1);
      const [, before] = cell.get();

      cell.set(2);

      const [value, after] = cell.get();
      assert.strictEqual(value, 2);
      assert.strictEqual(before.fired, true);
      assert.strictEqual(after.fired, false);
      assert.notStrictEqual(before, after);
    });

    void test('setting an equal value still fires', () => {
      const cell = new Cell(1);
      const [, before] = cell.get();
      cell.set(1);
      assert.strictEqual(before.fired, true);
    });

    void test('does not throw when a listener throws', () => {
      const reported: Array<unknown> = [];
      const previous = setListenerErrorHandler((error) => reported.push(error));
      try {
        const cell = new Cell('a');
        const [, changed] = cell.get();
        changed.subscribe(() => {
          throw new Error('listener failed');
        });

        cell.set('b');

        assert.strictEqual(cell.value, 'b');
        assert.strictEqual(reported.length, 1);
      } finally {
        setListenerErrorHandler(previous);
      }
    });

    void test('each signal fires at most once', () => {
      const cell = new Cell(0);
      const [, changed] = cell.get();
      let calls = 0;
      changed.subscribe(() => calls++);

      cell.set(1);
      cell.set(2);
      cell.set(3);

      assert.strictEqual(calls, 1);
      assert.strictEqual(changed.fired, true);
    });

    void test('listeners observe the new generation', () => {
      const cell = new Cell('old');
      const [, changed] = cell.get();
      let seen: string | undefined;
      let seenFired: boolean | undefined;
      changed.subscribe(() => {
        const [value, next] = cell.get();
        seen = value;
        seenFired = next.fired;
      });

      cell.set('new');

      assert.strictEqual(seen, 'new');
      assert.strictEqual(seenFired, false);
    });

    void test('a waiter woken by the signal reads the newest value', async () => {
      const cell = new Cell(0);
      const [, changed] = cell.get();
      let seen: number | undefined;
      void changed.wait().then(() => {
        seen = cell.value;
      });

      cell.set(1);
      cell.set(2);
      await waitMicrotasks();

      assert.strictEqual(seen, 2);
    });
  });

  void suite('update()', () => {
    void test('applies the transform and returns old and new values', () => {
      const cell = new Cell(10);
      const [, before] = cell.get();

      const result = cell.update((old) => old + 5);

      assert.deepStrictEqual(result, {value: 15, previous: 10});
      assert.strictEqual(cell.value, 15);
      assert.strictEqual(before.fired, true);
    });

    void test('an identity transform still starts a new generation', () => {
      const cell = new Cell(10);
      const [, before] = cell.get();

      const result = cell.update((old) => old);

      assert.strictEqual(result.value, 10);
      assert.strictEqual(result.previous, 10);
      assert.strictEqual(result.error, undefined);
      assert.strictEqual(before.fired, true);
    });

    void test('a failing transform leaves the cell unchanged', () => {
      const cell = new Cell(10);
      const [, before] = cell.get();
      const failure = new Error('nope');

      const result = cell.update(() => {
        throw failure;
      });

      assert.strictEqual(result.error, failure);
      assert.strictEqual(result.value, 10);
      assert.strictEqual(result.previous, 10);
      assert.strictEqual(cell.value, 10);
      assert.strictEqual(before.fired, false);
      assert.strictEqual(cell.get()[1], before);
    });

    void test('returns its result when a listener on the old signal throws', () => {
      const reported: Array<unknown> = [];
      const previous = setListenerErrorHandler((error) => reported.push(error));
      try {
        const cell = new Cell(1);
        const agg = new Aggregation();
        agg.register(cell);
        const failure = new Error('listener failed');
        agg.updated(new AbortController().signal).subscribe(() => {
          throw failure;
        });

        const result = cell.update((v) => v + 1);

        assert.deepStrictEqual(result, {value: 2, previous: 1});
        assert.strictEqual(cell.value, 2);
        assert.strictEqual(agg.choose(), cell);
        assert.deepStrictEqual(reported, [failure]);
      } finally {
        setListenerErrorHandler(previous);
      }
    });

    void test('get() inside the transform sees the current generation', () => {
      const cell = new Cell(1);
      const [, before] = cell.get();
      let inside: number | undefined;

      cell.update((old) => {
        const [value, changed] = cell.get();
        inside = value;
        assert.strictEqual(changed, before);
        return old + 1;
      });

      assert.strictEqual(inside, 1);
      assert.strictEqual(cell.value, 2);
    });

    void test('set() inside the transform is rejected', () => {
      const cell = new Cell(1);
      const [, before] = cell.get();

      const result = cell.update((old) => {
        cell.set(100);
        return old + 1;
      });

      assert.ok(result.error instanceof ReentrantUpdateError);
      assert.strictEqual(result.error.operation, 'set');
      assert.strictEqual(cell.value, 1);
      assert.strictEqual(before.fired, false);
    });

    void test('the cell accepts updates again after a rejected one', () => {
      const cell = new Cell(1);
      cell.update(() => {
        throw new Error('fail');
      });
      cell.set(2);
      assert.strictEqual(cell.update((old) => old * 10).value, 20);
    });
  });

  void suite('notify()', () => {
    void test('fires the signal and keeps the value', () => {
      const cell = new Cell({name: 'x'});
      const [value, before] = cell.get();

      cell.notify();

      const [after, next] = cell.get();
      assert.strictEqual(after, value);
      assert.strictEqual(before.fired, true);
      assert.strictEqual(next.fired, false);
    });
  });

  void suite('snapshot atomicity', () => {
    void test('a signal fires iff a change followed the get() it came from', async () => {
      const cell = new Cell(0);
      const observed: Array<{value: number; fired: () => boolean}> = [];

      const writers = Array.from({length: 5}, async (_, i) => {
        for (let n = 0; n < 20; n++) {
          const [value, changed] = cell.get();
          observed.push({value, fired: () => changed.fired});
          await Promise.resolve();
          cell.set(i * 100 + n);
        }
      });
      await Promise.all(writers);

      const [finalValue, finalChanged] = cell.get();
      assert.strictEqual(finalChanged.fired, false);
      assert.strictEqual(finalValue, 419);
      // Every snapshot taken before the last set has been superseded.
      for (const entry of observed) {
        assert.strictEqual(entry.fired(), true);
      }
    });
  });
});
