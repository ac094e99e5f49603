/**
 * RetryBudget Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { RetryBudget } from '../../../src/sampling/retry-budget.js';

describe('RetryBudget', () => {
  it('should allow exactly max attempts', () => {
    const budget = new RetryBudget(3);

    expect(budget.tryConsume()).toBe(true);
    expect(budget.tryConsume()).toBe(true);
    expect(budget.tryConsume()).toBe(true);
    expect(budget.tryConsume()).toBe(false);
    expect(budget.count).toBe(3);
    expect(budget.exhausted).toBe(true);
  });

  it('should be exhausted immediately with a zero budget', () => {
    const budget = new RetryBudget(0);
    expect(budget.exhausted).toBe(true);
    expect(budget.tryConsume()).toBe(false);
  });

  it('should start over after reset', () => {
    const budget = new RetryBudget(1);
    budget.tryConsume();
    budget.reset();

    expect(budget.count).toBe(0);
    expect(budget.exhausted).toBe(false);
    expect(budget.tryConsume()).toBe(true);
  });
});
