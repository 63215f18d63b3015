import type { World } from '@waystone/shared';
import type { FrameScheduler } from '../types/collaborators';

/**
 * Frame clock backed by the world tick. Waiters are released once per frame
 * by whichever system owns the scheduler.
 */
export class WorldFrameScheduler implements FrameScheduler {
  private waiters: Array<() => void> = [];

  constructor(private world: World) {}

  nextFrame(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  now(): number {
    return this.world.time * 1000;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Release everything waiting on the current frame
   */
  tick(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
