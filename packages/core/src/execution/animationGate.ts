import { DEFAULT_MIN_VISIBLE_MS } from '../constants.js';
import type { CommandResult } from '../contracts/command.js';

export type AnimationGateState =
  | { readonly phase: 'idle' }
  | { readonly phase: 'running'; readonly startedAt: number }
  | { readonly phase: 'result-buffered'; readonly startedAt: number; readonly result: CommandResult }
  | { readonly phase: 'settled'; readonly startedAt: number; readonly result: CommandResult };

/**
 * Holds a finished result back until the running indicator has been visible
 * for at least `minVisibleMs`.
 */
export class AnimationGate {
  private current: AnimationGateState = { phase: 'idle' };

  constructor(private readonly minVisibleMs: number = DEFAULT_MIN_VISIBLE_MS) {}

  get state(): AnimationGateState {
    return this.current;
  }

  isAnimating(): boolean {
    return this.current.phase === 'running' || this.current.phase === 'result-buffered';
  }

  start(now: number): void {
    this.current = { phase: 'running', startedAt: now };
  }

  /**
   * Buffer a finished result. Ignored unless the gate is running.
   */
  offer(result: CommandResult): boolean {
    if (this.current.phase !== 'running') {
      return false;
    }
    this.current = { phase: 'result-buffered', startedAt: this.current.startedAt, result };
    return true;
  }

  /**
   * Returns the buffered result once the minimum visible time has passed.
   */
  release(now: number): CommandResult | null {
    const state = this.current;
    if (state.phase !== 'result-buffered') {
      return null;
    }
    if (now - state.startedAt < this.minVisibleMs) {
      return null;
    }
    this.current = { phase: 'settled', startedAt: state.startedAt, result: state.result };
    return state.result;
  }

  elapsedMs(now: number): number {
    if (this.current.phase === 'idle') {
      return 0;
    }
    return Math.max(0, now - this.current.startedAt);
  }

  reset(): void {
    this.current = { phase: 'idle' };
  }
}

export default AnimationGate;
