/**
 * Unit tests for FadeOverlay and WorldFrameScheduler
 */

import { describe, expect, it } from 'vitest';
import { World } from '@waystone/shared';
import { ManualScheduler } from '../__tests__/utils/ManualScheduler';
import { FadeOverlay } from './FadeOverlay';
import { WorldFrameScheduler } from './WorldFrameScheduler';

function record(overlay: FadeOverlay): number[] {
  const alphas: number[] = [];
  overlay.on('change', (alpha: number) => alphas.push(alpha));
  return alphas;
}

describe('FadeOverlay', () => {
  it('tweens alpha over frames', async () => {
    const overlay = new FadeOverlay(new ManualScheduler(16), 32);
    const alphas = record(overlay);

    await overlay.fadeOut();
    expect(overlay.visible).toBe(true);
    await overlay.fadeIn();

    expect(alphas).toEqual([0.5, 1, 0.5, 0]);
    expect(overlay.visible).toBe(false);
  });

  it('switches instantly with no duration', async () => {
    const scheduler = new ManualScheduler();
    const overlay = new FadeOverlay(scheduler, 0);

    await overlay.fadeOut();

    expect(overlay.alpha).toBe(1);
    expect(scheduler.frames).toBe(0);
  });

  it('stops a running fade when cleared', async () => {
    const overlay = new FadeOverlay(new ManualScheduler(16), 160);
    const alphas = record(overlay);

    const fading = overlay.fadeOut();
    overlay.clear();
    await fading;

    expect(overlay.alpha).toBe(0);
    expect(alphas).toEqual([]);
  });
});

describe('WorldFrameScheduler', () => {
  it('releases waiters on tick and reads the world clock', async () => {
    const world = new World();
    const scheduler = new WorldFrameScheduler(world);
    let released = false;

    const waiting = scheduler.nextFrame().then(() => {
      released = true;
    });
    expect(scheduler.pending).toBe(1);

    world.tick(20);
    scheduler.tick();
    await waiting;

    expect(released).toBe(true);
    expect(scheduler.pending).toBe(0);
    expect(scheduler.now()).toBeCloseTo(20);
  });
});
