import type { RateLimits } from "../../config";

export interface DailyBudgetCheck {
  estimatedRequests: number;
  requestsPerDay: number;
  exceeded: boolean;
}

/**
 * Stateless pacing derived from provider quotas. Nothing is counted at run
 * time; the driver simply waits `delayMs` between consecutive batches.
 */
export class RateGovernor {
  readonly limits: Readonly<RateLimits>;

  constructor(limits: Readonly<RateLimits>) {
    this.limits = limits;
  }

  /** floor(TPM / tokens per item), capped by the configured ceiling, never below 1. */
  get maxBatchSize(): number {
    const { tokensPerMinute, estimatedTokensPerItem, maxBatchSize } =
      this.limits;
    const byTokens = Math.floor(tokensPerMinute / estimatedTokensPerItem);
    return Math.max(1, Math.min(Math.floor(maxBatchSize), byTokens));
  }

  /**
   * Content length of the batch, or `items × estimatedTokensPerItem` when the
   * texts are all empty.
   */
  estimateTokens(texts: readonly string[]): number {
    const total = texts.reduce((sum, text) => sum + text.length, 0);
    if (total > 0) return total;
    return texts.length * this.limits.estimatedTokensPerItem;
  }

  delayMs(tokenCount: number): number {
    const { requestsPerMinute, tokensPerMinute } = this.limits;
    const perRequest = 60 / requestsPerMinute;
    const perTokens = (tokenCount / tokensPerMinute) * 60;
    return Math.max(perRequest, perTokens) * 1000;
  }

  estimateRequests(itemCount: number): number {
    return Math.ceil(itemCount / this.maxBatchSize);
  }

  checkDailyBudget(itemCount: number): DailyBudgetCheck {
    const estimatedRequests = this.estimateRequests(itemCount);
    return {
      estimatedRequests,
      requestsPerDay: this.limits.requestsPerDay,
      exceeded: estimatedRequests > this.limits.requestsPerDay,
    };
  }
}
