/**
 * Command Parsing and Queue Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CommandQueue, parseCommand } from '../src/commands.js';
import { DEFAULT_PLANT } from '../src/config.js';
import { UnknownCommandError, ValidationError } from '../src/errors.js';

describe('parseCommand', () => {
  it('should parse a setpoint', () => {
    assert.deepStrictEqual(
      parseCommand({ type: 'setpoint', tank: 'C', variable: 'level', value: 2 }, DEFAULT_PLANT),
      { type: 'setpoint', tank: 'C', variable: 'level', value: 2 }
    );
  });

  it('should parse clear-setpoint', () => {
    assert.deepStrictEqual(
      parseCommand({ type: 'clear-setpoint', tank: 'D', variable: 'concentration' }, DEFAULT_PLANT),
      { type: 'clear-setpoint', tank: 'D', variable: 'concentration' }
    );
  });

  it('should accept bare strings for commands without arguments', () => {
    assert.deepStrictEqual(parseCommand('pause', DEFAULT_PLANT), { type: 'pause' });
    assert.deepStrictEqual(parseCommand('resume', DEFAULT_PLANT), { type: 'resume' });
    assert.deepStrictEqual(parseCommand({ type: 'reset', extra: true }, DEFAULT_PLANT), { type: 'reset' });
  });

  it('should parse noise with and without a level', () => {
    assert.deepStrictEqual(parseCommand({ type: 'noise', enabled: true, level: 0.1 }, DEFAULT_PLANT), {
      type: 'noise',
      enabled: true,
      level: 0.1,
    });
    assert.deepStrictEqual(parseCommand({ type: 'noise', enabled: false }, DEFAULT_PLANT), {
      type: 'noise',
      enabled: false,
    });
  });

  it('should raise UnknownCommandError for unknown types', () => {
    assert.throws(() => parseCommand({ type: 'explode' }, DEFAULT_PLANT), {
      name: 'UnknownCommandError',
      message: 'Unknown command: explode',
    });
    assert.throws(() => parseCommand('stop', DEFAULT_PLANT), UnknownCommandError);
  });

  it('should raise UnknownCommandError for malformed input', () => {
    assert.throws(() => parseCommand(42, DEFAULT_PLANT), { message: 'Unknown command: 42' });
    assert.throws(() => parseCommand(null, DEFAULT_PLANT), { message: 'Unknown command: null' });
    assert.throws(() => parseCommand({ kind: 'pause' }, DEFAULT_PLANT), {
      message: 'Unknown command: {"kind":"pause"}',
    });
  });

  it('should raise ValidationError for bad arguments of known commands', () => {
    assert.throws(
      () => parseCommand({ type: 'setpoint', tank: 'Z', variable: 'level', value: 1 }, DEFAULT_PLANT),
      ValidationError
    );
    assert.throws(
      () => parseCommand({ type: 'setpoint', tank: 'C', variable: 'pressure', value: 1 }, DEFAULT_PLANT),
      { message: `Invalid command: variable must be 'level' or 'concentration'` }
    );
    assert.throws(
      () => parseCommand({ type: 'setpoint', tank: 'C', variable: 'level', value: 2.8 }, DEFAULT_PLANT),
      ValidationError
    );
    assert.throws(() => parseCommand({ type: 'noise', enabled: 'on', level: 3 }, DEFAULT_PLANT), {
      message: 'Invalid command: enabled must be a boolean; level must be within [0, 1]',
    });
  });
});

describe('CommandQueue', () => {
  it('should drain in receipt order with increasing sequence numbers', () => {
    const queue = new CommandQueue();
    queue.enqueue({ type: 'pause' }, 1000);
    queue.enqueue({ type: 'resume' }, 1001);
    queue.enqueue({ type: 'reset' }, 1002);

    assert.strictEqual(queue.size, 3);
    const drained = queue.drain();
    assert.deepStrictEqual(
      drained.map((q) => [q.seq, q.command.type, q.receivedAt]),
      [
        [1, 'pause', 1000],
        [2, 'resume', 1001],
        [3, 'reset', 1002],
      ]
    );
    assert.strictEqual(queue.size, 0);
    assert.deepStrictEqual(queue.drain(), []);
  });

  it('should keep numbering across drains', () => {
    const queue = new CommandQueue();
    queue.enqueue({ type: 'pause' });
    queue.drain();
    assert.strictEqual(queue.enqueue({ type: 'resume' }).seq, 2);
  });

  it('should report how many commands clear() discarded', () => {
    const queue = new CommandQueue();
    queue.enqueue({ type: 'pause' });
    queue.enqueue({ type: 'resume' });
    assert.strictEqual(queue.clear(), 2);
    assert.strictEqual(queue.size, 0);
  });
});
