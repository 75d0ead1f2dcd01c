import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { EventBus } from '@hudlink/event-bus';
import { CommandSequencer, type QueuedCommand } from '../src/sequencer/CommandSequencer.js';
import { createBusLogger } from '../src/logging/logger.js';
import { ManualScheduler } from './helpers/ManualScheduler.js';

const BARRIERS = new Set(['freeze', 'continue']);

describe('CommandSequencer', () => {
  let scheduler: ManualScheduler;
  let executed: string[];
  let faults: Array<{ callId: number; message: string }>;
  let sequencer: CommandSequencer;

  const push = (callId: number, name: string) => sequencer.enqueue({ callId, name, args: [] });

  beforeEach(() => {
    scheduler = new ManualScheduler();
    executed = [];
    faults = [];
    sequencer = new CommandSequencer({
      scheduler,
      logger: createBusLogger(new EventBus(), 'sequencer', { level: 'debug' }),
      isBarrier: (name) => BARRIERS.has(name),
      execute: (command: QueuedCommand) => {
        if (command.name === 'boom') throw new Error(`boom #${command.callId}`);
        if (command.name === 'nested') sequencer.drain();
        executed.push(`${command.callId}:${command.name}`);
      },
      onFault: (command, error) => {
        faults.push({ callId: command.callId, message: error instanceof Error ? error.message : String(error) });
      },
    });
  });

  it('runs plain commands in call id order, not arrival order', () => {
    push(3, 'rect');
    push(1, 'rect');
    push(2, 'text');
    assert.deepStrictEqual(executed, []);

    scheduler.flush();

    assert.deepStrictEqual(executed, ['1:rect', '2:text', '3:rect']);
    assert.strictEqual(sequencer.lastProcessedCallId, 3);
    assert.strictEqual(sequencer.pendingCount, 0);
  });

  it('holds a barrier until its predecessor has run', () => {
    push(1, 'rect');
    scheduler.flush();

    push(3, 'freeze');
    scheduler.flush();
    assert.deepStrictEqual(executed, ['1:rect']);
    assert.deepStrictEqual(sequencer.pendingCallIds(), [3]);

    push(2, 'rect');
    scheduler.flush();
    assert.deepStrictEqual(executed, ['1:rect', '2:rect', '3:freeze']);
  });

  it('blocks everything queued behind a waiting barrier', () => {
    push(1, 'rect');
    scheduler.flush();

    push(4, 'rect');
    push(3, 'continue');
    scheduler.flush();

    assert.deepStrictEqual(executed, ['1:rect']);
    assert.deepStrictEqual(sequencer.pendingCallIds(), [3, 4]);
  });

  it('lets a barrier through when nothing has run yet', () => {
    push(5, 'freeze');
    scheduler.flush();

    assert.deepStrictEqual(executed, ['5:freeze']);
  });

  it('never holds plain commands for gaps', () => {
    push(1, 'rect');
    push(7, 'line');
    scheduler.flush();

    assert.deepStrictEqual(executed, ['1:rect', '7:line']);
  });

  it('keeps arrival order for equal call ids', () => {
    push(2, 'a');
    push(2, 'b');
    push(1, 'c');
    scheduler.flush();

    assert.deepStrictEqual(executed, ['1:c', '2:a', '2:b']);
  });

  it('reports a failing command and keeps draining; the failure still counts as processed', () => {
    push(1, 'boom');
    push(2, 'freeze');
    scheduler.flush();

    assert.deepStrictEqual(faults, [{ callId: 1, message: 'boom #1' }]);
    assert.deepStrictEqual(executed, ['2:freeze']);
    assert.strictEqual(sequencer.lastProcessedCallId, 2);
  });

  it('coalesces drains and ignores re-entrant drain calls', () => {
    push(1, 'nested');
    push(2, 'rect');
    push(3, 'rect');
    assert.strictEqual(scheduler.pendingCount, 1);

    scheduler.flush();
    assert.deepStrictEqual(executed, ['1:nested', '2:rect', '3:rect']);
    assert.strictEqual(scheduler.pendingCount, 0);
  });

  it('reset drops pending commands and forgets the last call id', () => {
    push(1, 'rect');
    scheduler.flush();
    push(3, 'freeze');
    push(4, 'rect');
    scheduler.flush();

    assert.strictEqual(sequencer.reset(), 2);
    assert.strictEqual(sequencer.lastProcessedCallId, null);
    assert.deepStrictEqual(sequencer.pendingCallIds(), []);

    push(9, 'freeze');
    scheduler.flush();
    assert.deepStrictEqual(executed, ['1:rect', '9:freeze']);
  });
});
