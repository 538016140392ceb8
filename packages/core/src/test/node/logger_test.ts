import {suite, test} from 'node:test';
import * as assert from 'node:assert';
import {createLogger, noopLogger} from '../../index.js';
import type {LogEntry} from '../../index.js';

void suite('createLogger', () => {
  void test('drops entries below the configured level', () => {
    const entries: Array<LogEntry> = [];
    const logger = createLogger({
      level: 'warn',
      handler: (entry) => entries.push(entry),
    });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    assert.deepStrictEqual(
      entries.map((e) => e.level),
      ['warn', 'error'],
    );
  });

  void test('attaches context, data and error', () => {
    const entries: Array<LogEntry> = [];
    const failure = new Error('boom');
    const logger = createLogger({
      context: 'Stopper',
      handler: (entry) => entries.push(entry),
    });

    logger.error('task failed', failure, {tasks: 2});

    assert.strictEqual(entries.length, 1);
    const [entry] = entries;
    assert.strictEqual(entry.context, 'Stopper');
    assert.strictEqual(entry.message, 'task failed');
    assert.strictEqual(entry.error, failure);
    assert.deepStrictEqual(entry.data, {tasks: 2});
    assert.strictEqual(typeof entry.timestamp, 'number');
  });

  void test('omits keys that were not given', () => {
    const entries: Array<LogEntry> = [];
    createLogger({handler: (entry) => entries.push(entry)}).info('hi');
    assert.deepStrictEqual(Object.keys(entries[0] ?? {}).sort(), [
      'level',
      'message',
      'timestamp',
    ]);
  });

  void test('a disabled logger emits nothing', () => {
    const entries: Array<LogEntry> = [];
    const logger = createLogger({
      enabled: false,
      handler: (entry) => entries.push(entry),
    });
    logger.error('e');
    assert.strictEqual(entries.length, 0);
  });

  void test('noopLogger accepts every level', () => {
    noopLogger.debug('d');
    noopLogger.info('i');
    noopLogger.warn('w');
    noopLogger.error('e', new Error('x'));
  });
});
