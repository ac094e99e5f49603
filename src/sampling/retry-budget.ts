/**
 * Retry Budget
 *
 * Bounded attempt counter scoped to one movement/settle cycle.
 */

export class RetryBudget {
  private used = 0;

  constructor(readonly max: number) {}

  /**
   * Consume one attempt if any remain.
   *
   * @returns true if an attempt was available
   */
  tryConsume(): boolean {
    if (this.used >= this.max) {
      return false;
    }
    this.used++;
    return true;
  }

  reset(): void {
    this.used = 0;
  }

  get count(): number {
    return this.used;
  }

  get exhausted(): boolean {
    return this.used >= this.max;
  }
}
