/**
 * Run budget
 *
 * Post count and wall-clock limits of one pass
 */

import type { RunBudget, StopReason } from "@/types";

export function createRunBudget(
  maxPosts: number,
  runBudgetMs: number | null,
  nowMs: number = Date.now(),
): RunBudget {
  return {
    maxPosts,
    deadlineMs: runBudgetMs !== null ? nowMs + runBudgetMs : null,
    posted: 0,
  };
}

/**
 * Reason to stop before starting the next candidate, or null to go on
 */
export function budgetExhausted(budget: RunBudget, nowMs: number = Date.now()): StopReason | null {
  if (budget.posted >= budget.maxPosts) {
    return "max_posts";
  }
  if (budget.deadlineMs !== null && nowMs >= budget.deadlineMs) {
    return "run_budget";
  }
  return null;
}
