import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  EventBus,
  Topics,
  type EngineLogPayload,
  type OverlayCommandFailedPayload,
  type OverlayCommandRejectedPayload,
  type OverlayResetPayload,
} from '@hudlink/event-bus';
import { Canvas2DSurface } from '@hudlink/renderer-canvas2d';
import { isGroupHandle } from '@hudlink/rendering-core';
import { OverlayEngine, type OverlayEngineConfig } from '../src/kernel/OverlayEngine.js';
import { ManualScheduler } from './helpers/ManualScheduler.js';

const WHITE = 0xffffffff;

function rectArgs(timeout: number): unknown[] {
  return [WHITE, 0, 0, 10, 10, timeout, 10];
}

function setup(config: Partial<OverlayEngineConfig> = {}) {
  const bus = new EventBus();
  const scheduler = new ManualScheduler();
  const surface = new Canvas2DSurface();
  const engine = new OverlayEngine({ bus, scheduler, surface, options: { platform: 'linux' }, ...config });

  const hidden: string[] = [];
  const rejected: OverlayCommandRejectedPayload[] = [];
  const failed: OverlayCommandFailedPayload[] = [];
  const resets: OverlayResetPayload[] = [];
  const logs: EngineLogPayload[] = [];
  bus.subscribe(Topics.OVERLAY_GROUP_HIDDEN, (p) => hidden.push(p.name));
  bus.subscribe(Topics.OVERLAY_COMMAND_REJECTED, (p) => rejected.push(p));
  bus.subscribe(Topics.OVERLAY_COMMAND_FAILED, (p) => failed.push(p));
  bus.subscribe(Topics.OVERLAY_RESET, (p) => resets.push(p));
  bus.subscribe(Topics.ENGINE_LOG, (p) => logs.push(p));

  return { bus, scheduler, surface, engine, hidden, rejected, failed, resets, logs };
}

describe('OverlayEngine', () => {
  describe('group lifecycle through sequenced commands', () => {
    it('hides a rect group once its timeout has elapsed', () => {
      const { engine, scheduler, hidden } = setup();
      engine.enqueue(1, 'overlay_set_group', ['hud']);
      engine.enqueue(2, 'overlay_rect', rectArgs(5000));
      scheduler.flush();

      assert.deepStrictEqual(engine.snapshot().groups, [
        { name: 'hud', state: 'active', timeoutMs: 5000, primitiveCount: 1, hasModel: false, followingPointer: false },
      ]);

      scheduler.advance(4999);
      assert.strictEqual(engine.snapshot().groups.length, 1);
      scheduler.advance(1);
      assert.deepStrictEqual(engine.snapshot().groups, []);
      assert.deepStrictEqual(hidden, ['hud']);
    });

    it('freezing a group that does not exist yet only records it as current', () => {
      const { engine, scheduler } = setup();
      engine.enqueue(1, 'overlay_freeze_group', ['hud']);
      scheduler.flush();

      let snapshot = engine.snapshot();
      assert.deepStrictEqual(snapshot.groups, []);
      assert.deepStrictEqual(snapshot.contextStack, ['hud']);
      assert.strictEqual(snapshot.lastProcessedCallId, 1);

      engine.enqueue(2, 'overlay_rect', rectArgs(300));
      scheduler.flush();
      snapshot = engine.snapshot();
      assert.strictEqual(snapshot.groups[0]?.name, 'hud');
      assert.strictEqual(snapshot.groups[0]?.state, 'active');
    });

    it('clamps oversized timeouts to 20000 ms', () => {
      const { engine, scheduler } = setup();
      engine.enqueue(1, 'overlay_rect', rectArgs(999999));
      scheduler.flush();

      assert.strictEqual(engine.snapshot().groups[0]?.timeoutMs, 20000);
      scheduler.advance(19999);
      assert.strictEqual(engine.snapshot().groups.length, 1);
      scheduler.advance(1);
      assert.strictEqual(engine.snapshot().groups.length, 0);
    });

    it('a freeze that arrives early waits for the draw before it', () => {
      const { engine, scheduler } = setup();
      engine.enqueue(1, 'overlay_set_group', ['hud']);
      scheduler.flush();

      engine.enqueue(3, 'overlay_freeze_group', ['hud']);
      scheduler.flush();
      assert.deepStrictEqual(engine.snapshot().pendingCallIds, [3]);

      engine.enqueue(2, 'overlay_rect', rectArgs(5000));
      scheduler.flush();
      assert.deepStrictEqual(engine.snapshot().groups, [
        { name: 'hud', state: 'frozen', timeoutMs: 0, primitiveCount: 1, hasModel: false, followingPointer: false },
      ]);

      scheduler.advance(20000);
      assert.strictEqual(engine.snapshot().groups.length, 1);
    });

    it('continue, set_group_z and clear drive a frozen group to removal', () => {
      const { engine, scheduler, surface, hidden } = setup();
      engine.enqueue(1, 'overlay_set_group', ['hud']);
      engine.enqueue(2, 'overlay_rect', rectArgs(0));
      engine.enqueue(3, 'overlay_continue_group', ['hud']);
      engine.enqueue(4, 'overlay_set_group_z', ['hud', 7]);
      scheduler.flush();

      const [group] = engine.snapshot().groups;
      assert.strictEqual(group?.state, 'active');
      assert.strictEqual(group?.timeoutMs, 20000);
      const [root] = surface.rootHandles();
      assert.ok(root);
      assert.strictEqual(surface.zOf(root), 7);

      engine.enqueue(5, 'overlay_freeze_group', ['hud']);
      engine.enqueue(6, 'overlay_clear_group', ['hud']);
      scheduler.flush();
      assert.deepStrictEqual(engine.snapshot().groups, []);
      assert.deepStrictEqual(hidden, ['hud']);
      assert.strictEqual(surface.itemCount(), 0);
    });
  });

  describe('reset', () => {
    it('call id 0 drops all state before running', () => {
      const { engine, scheduler, surface, resets } = setup();
      engine.enqueue(1, 'overlay_set_group', ['hud', { hp: 1 }]);
      engine.enqueue(2, 'overlay_rect', rectArgs(0));
      scheduler.flush();
      engine.enqueue(5, 'overlay_clear_group', ['hud']);
      scheduler.flush();

      engine.enqueue(0, 'overlay_set_group', ['fresh']);
      assert.deepStrictEqual(resets, [{ droppedCommands: 1, removedGroups: ['hud'] }]);
      assert.strictEqual(surface.itemCount(), 0);

      scheduler.flush();
      const snapshot = engine.snapshot();
      assert.deepStrictEqual(snapshot.contextStack, ['fresh']);
      assert.strictEqual(snapshot.lastProcessedCallId, 0);
      assert.deepStrictEqual(snapshot.pendingCallIds, []);

      engine.enqueue(1, 'overlay_set_group', ['hud']);
      engine.enqueue(2, 'overlay_text', ['HP {self.hp}', WHITE, 12, 0, 0, 0, '', 0, 0]);
      scheduler.flush();
      const [root] = surface.rootHandles();
      assert.ok(root && isGroupHandle(root));
      const [text] = surface.childrenOf(root);
      assert.ok(text && !isGroupHandle(text));
      assert.strictEqual(surface.textOf(text), 'HP {self.hp}');
    });
  });

  describe('rejections and faults', () => {
    it('refuses reserved, unknown and badly numbered commands without queueing them', () => {
      const { engine, rejected } = setup();

      assert.deepStrictEqual(engine.enqueue(1, '_reset'), { accepted: false, reason: 'command "_reset" is reserved' });
      assert.deepStrictEqual(engine.enqueue(2, 'overlay_spin'), {
        accepted: false,
        reason: 'unknown command "overlay_spin"',
      });
      assert.deepStrictEqual(engine.enqueue(1.5, 'overlay_rect', rectArgs(1)), {
        accepted: false,
        reason: 'call id must be an integer, got 1.5',
      });

      assert.deepStrictEqual(
        rejected.map((r) => [r.callId, r.command]),
        [
          [1, '_reset'],
          [2, 'overlay_spin'],
          [null, 'overlay_rect'],
        ],
      );
      assert.deepStrictEqual(engine.snapshot().pendingCallIds, []);
    });

    it('rejects everything while no surface is attached', () => {
      const { engine } = setup({ surface: undefined });

      assert.deepStrictEqual(engine.enqueue(1, 'overlay_rect', rectArgs(1)), {
        accepted: false,
        reason: 'no surface attached',
      });
      engine.setGroup('hud');
      assert.deepStrictEqual(engine.snapshot().contextStack, []);
    });

    it('a malformed command is reported and still counts as processed', () => {
      const { engine, scheduler, failed } = setup();
      engine.enqueue(1, 'overlay_rect', [1, 2]);
      engine.enqueue(2, 'overlay_freeze_group', ['hud']);
      scheduler.flush();

      assert.deepStrictEqual(failed, [
        {
          callId: 1,
          command: 'overlay_rect',
          args: '[1,2]',
          message: 'expected 7 arguments, got 2',
          code: 'BAD_ARGUMENT',
        },
      ]);
      assert.strictEqual(engine.snapshot().lastProcessedCallId, 2);
    });

    it('batch entries run in order, each on its own', () => {
      const { engine, scheduler, failed, logs } = setup();
      engine.enqueue(1, 'overlay_batch', [
        [
          ['overlay_set_group', ['b']],
          ['_evil', []],
          ['overlay_rect', [1]],
          ['overlay_rect', [WHITE, 0, 0, 5, 5, 0, 10]],
        ],
      ]);
      scheduler.flush();

      assert.deepStrictEqual(engine.snapshot().groups.map((g) => [g.name, g.state, g.primitiveCount]), [
        ['b', 'frozen', 1],
      ]);
      assert.deepStrictEqual(
        failed.map((f) => [f.callId, f.command, f.code]),
        [[null, 'overlay_rect', 'BAD_ARGUMENT']],
      );
      assert.ok(logs.some((l) => l.message === 'batch entry skipped' && l.data?.command === '_evil'));
    });
  });

  it('logs each accepted command with a bounded argument preview', () => {
    const { engine, logs } = setup({ options: { argPreviewLength: 8 } });
    engine.enqueue(1, 'overlay_set_group', ['abcdefghij']);

    const record = logs.find((l) => l.message === 'enqueue');
    assert.deepStrictEqual(record?.data, { callId: 1, command: 'overlay_set_group', args: '["abcdef' });
    assert.strictEqual(record?.source, 'overlay');
    assert.strictEqual(record?.level, 'info');
  });

  it('detaching the surface drops its groups', () => {
    const { engine, scheduler, surface } = setup();
    engine.enqueue(1, 'overlay_rect', rectArgs(0));
    scheduler.flush();

    engine.detachSurface();
    assert.strictEqual(engine.isAttached(), false);
    assert.strictEqual(surface.itemCount(), 0);
    assert.strictEqual(engine.enqueue(2, 'overlay_rect', rectArgs(0)).accepted, false);

    engine.attachSurface(surface);
    assert.strictEqual(engine.enqueue(2, 'overlay_rect', rectArgs(0)).accepted, true);
  });
});
