/**
 * Phase Timer
 *
 * Tracks how long the research and generation phases take.
 */

import { systemClock, type ArticleWriterPhase, type Clock } from './types';

export interface PhaseDurations {
  readonly research: number;
  readonly generation: number;
}

/**
 * @example
 * const timer = new PhaseTimer(clock);
 * timer.start('research');
 * // ... Wikipedia lookup ...
 * timer.end('research');
 * timer.getDurations(); // { research: 420, generation: 0 }
 */
export class PhaseTimer {
  private readonly startTimes = new Map<ArticleWriterPhase, number>();
  private readonly durations = new Map<ArticleWriterPhase, number>();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Starts (or restarts) timing for a phase.
   */
  start(phase: ArticleWriterPhase): void {
    this.startTimes.set(phase, this.clock.now());
  }

  /**
   * Ends timing for a phase and records the duration. A phase that was never
   * started records 0.
   */
  end(phase: ArticleWriterPhase): number {
    const startTime = this.startTimes.get(phase);
    // startTime of 0 is valid
    const duration = startTime !== undefined ? this.clock.now() - startTime : 0;
    this.durations.set(phase, duration);
    this.startTimes.delete(phase);
    return duration;
  }

  getDuration(phase: ArticleWriterPhase): number {
    return this.durations.get(phase) ?? 0;
  }

  getDurations(): PhaseDurations {
    return {
      research: this.getDuration('research'),
      generation: this.getDuration('generation'),
    };
  }

  getTotalDuration(): number {
    let total = 0;
    for (const duration of this.durations.values()) {
      total += duration;
    }
    return total;
  }

  isRunning(phase: ArticleWriterPhase): boolean {
    return this.startTimes.has(phase);
  }
}
