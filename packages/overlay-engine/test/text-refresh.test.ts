import { describe, it } from 'node:test';
import assert from 'node:assert';
import { EventBus, Topics, type OverlayCommandFailedPayload } from '@hudlink/event-bus';
import { Canvas2DSurface } from '@hudlink/renderer-canvas2d';
import { isGroupHandle, type PrimitiveHandle } from '@hudlink/rendering-core';
import { OverlayEngine } from '../src/kernel/OverlayEngine.js';
import { TextTemplates } from '../src/model/TextTemplates.js';
import { toModelValue } from '../src/model/textModel.js';
import { ManualScheduler } from './helpers/ManualScheduler.js';

function textArgs(message: string, timeout: number): unknown[] {
  return [message, 0xffffffff, 12, 0, 0, timeout, '', false, false];
}

function setup() {
  let now = 0;
  const bus = new EventBus();
  const scheduler = new ManualScheduler();
  const surface = new Canvas2DSurface({ clock: () => now });
  const engine = new OverlayEngine({ bus, scheduler, surface, options: { platform: 'linux' } });
  const failed: OverlayCommandFailedPayload[] = [];
  bus.subscribe(Topics.OVERLAY_COMMAND_FAILED, (p) => failed.push(p));

  let callId = 0;
  const run = (name: string, args: unknown[]) => {
    engine.enqueue(++callId, name, args);
    scheduler.flush();
  };
  const texts = (): PrimitiveHandle[] => {
    const out: PrimitiveHandle[] = [];
    for (const root of surface.rootHandles()) {
      if (!isGroupHandle(root)) continue;
      for (const child of surface.childrenOf(root)) {
        if (!isGroupHandle(child) && child.kind === 'text') out.push(child);
      }
    }
    return out;
  };

  return {
    engine,
    surface,
    failed,
    run,
    texts,
    setNow: (value: number) => {
      now = value;
    },
  };
}

describe('Text templates bound to group models', () => {
  it('binding a model re-renders the group texts; only __animate models animate', () => {
    const { surface, run, texts, setNow } = setup();
    run('overlay_set_group', ['stats']);
    run('overlay_text', textArgs('HP {self.hp}', 0));

    const [text] = texts();
    assert.ok(text);
    assert.strictEqual(surface.textOf(text), 'HP {self.hp}');

    run('overlay_set_group', ['stats', { hp: 5 }]);
    assert.strictEqual(surface.textOf(text), 'HP 5');
    assert.strictEqual(surface.isAnimating(text), false);

    run('overlay_set_group', ['stats', { hp: 6, __animate: true }]);
    assert.strictEqual(surface.textOf(text), 'HP 6');
    assert.strictEqual(surface.isAnimating(text), true);

    setNow(600);
    run('overlay_set_group', ['stats', { hp: 6, __animate: true }]);
    assert.strictEqual(surface.isAnimating(text), false);
  });

  it('texts drawn after binding are formatted straight away', () => {
    const { surface, run, texts } = setup();
    run('overlay_set_group', ['stats', { name: 'Kyra', hp: 9 }]);
    run('overlay_text', textArgs('{self.name}: {self.hp:>3}', 5000));

    const [text] = texts();
    assert.ok(text);
    assert.strictEqual(surface.textOf(text), 'Kyra:   9');
  });

  it('active groups are re-rendered as well as frozen ones', () => {
    const { surface, run, texts } = setup();
    run('overlay_set_group', ['stats']);
    run('overlay_text', textArgs('x={self.x}', 5000));
    run('overlay_set_group', ['stats', { x: 1 }]);

    const [text] = texts();
    assert.ok(text);
    assert.strictEqual(surface.textOf(text), 'x=1');
  });

  it('refresh re-evaluates templates against the bound model', () => {
    const { engine, surface, run, texts } = setup();
    run('overlay_set_group', ['stats', { hp: 3 }]);
    run('overlay_text', textArgs('HP {self.hp}', 0));

    const [text] = texts();
    assert.ok(text);
    surface.setText(text, 'stale');

    run('overlay_refresh_group', ['stats']);
    assert.strictEqual(surface.textOf(text), 'HP 3');
    assert.strictEqual(engine.snapshot().groups[0]?.state, 'frozen');
  });

  it('a template that cannot be rendered fails the command', () => {
    const { failed, run } = setup();
    run('overlay_set_group', ['stats']);
    run('overlay_text', textArgs('HP {self.hp}', 0));
    run('overlay_set_group', ['stats', { mp: 1 }]);

    assert.deepStrictEqual(
      failed.map((f) => [f.command, f.code, f.message]),
      [['overlay_set_group', 'TEMPLATE', 'self.hp is not set']],
    );
  });

  it('nested groups are walked recursively', () => {
    const surface = new Canvas2DSurface();
    const templates = new TextTemplates();
    const font = { family: '', size: 10, styleHint: 'sans-serif' as const };
    const color = { r: 0, g: 0, b: 0, a: 255 };
    const inner = surface.createText({ kind: 'text', text: '?', color, font });
    const plain = surface.createText({ kind: 'text', text: 'plain', color, font });
    templates.remember(inner, 'lvl {self.level}');
    const outer = surface.group([surface.group([inner]), plain]);

    const changed = templates.refresh(surface, outer, toModelValue({ level: 4 }));

    assert.strictEqual(changed, 1);
    assert.strictEqual(surface.textOf(inner), 'lvl 4');
    assert.strictEqual(surface.textOf(plain), 'plain');
  });
});
