import { ConfigurationError } from '../errors';
import { defaultRandom, type RandomSource } from '../random';

/**
 * Draws one task at a time with probability weight / sum(weights),
 * independently on every call (sampling with replacement).
 */
export class WeightedTaskSelector<Task extends { key: string; weight: number }> {
  private readonly candidates: Task[];
  private readonly cumulative: number[];
  private readonly total: number;

  constructor(
    tasks: readonly Task[],
    private readonly random: RandomSource = defaultRandom,
  ) {
    // Zero-weight tasks stay visible elsewhere but never get drawn
    this.candidates = tasks.filter((t) => t.weight > 0);
    this.cumulative = [];
    let running = 0;
    for (const task of this.candidates) {
      running += task.weight;
      this.cumulative.push(running);
    }
    this.total = running;
  }

  get hasCandidates(): boolean {
    return this.total > 0;
  }

  pick(): Task {
    if (!this.hasCandidates) {
      throw new ConfigurationError('At least one task with a positive weight is required.');
    }
    const r = this.random() * this.total;
    for (let idx = 0; idx < this.cumulative.length; idx++) {
      if (r < this.cumulative[idx]) return this.candidates[idx];
    }
    // only reachable when the source returns exactly 1
    return this.candidates[this.candidates.length - 1];
  }
}
