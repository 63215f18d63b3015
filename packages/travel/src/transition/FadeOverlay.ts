import EventEmitter from 'eventemitter3';
import type { FrameScheduler, ScreenOverlay } from '../types/collaborators';

/**
 * Full-screen black overlay raised while the player is in transit.
 * Alpha is tweened on the frame clock and every change is emitted.
 */
export class FadeOverlay extends EventEmitter implements ScreenOverlay {
  private _alpha = 0;
  // Bumped on every fade or clear so a superseded tween stops
  private generation = 0;

  constructor(private scheduler: FrameScheduler, private durationMs: number) {
    super();
  }

  get alpha(): number {
    return this._alpha;
  }

  get visible(): boolean {
    return this._alpha > 0;
  }

  fadeOut(): Promise<void> {
    return this.tweenTo(1);
  }

  fadeIn(): Promise<void> {
    return this.tweenTo(0);
  }

  clear(): void {
    this.generation++;
    this.setAlpha(0);
  }

  private setAlpha(value: number): void {
    if (value === this._alpha) return;
    this._alpha = value;
    this.emit('change', value);
  }

  private async tweenTo(target: number): Promise<void> {
    const generation = ++this.generation;
    const from = this._alpha;
    if (this.durationMs <= 0 || from === target) {
      this.setAlpha(target);
      return;
    }

    const startedAt = this.scheduler.now();
    while (generation === this.generation) {
      const t = Math.min(1, (this.scheduler.now() - startedAt) / this.durationMs);
      this.setAlpha(from + (target - from) * t);
      if (t >= 1) return;
      await this.scheduler.nextFrame();
    }
  }
}
