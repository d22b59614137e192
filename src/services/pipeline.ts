import type { ExpenseExtractor } from "./ai.js";
import type { AuthorizationGate } from "./auth.js";
import type { ExpenseStore } from "./supabase.js";
import { validateExpense } from "./validator.js";
import type { PipelineOutcome, ProcessExpenseResponse } from "../types/index.js";
import { MESSAGE_HIDDEN, maskId } from "../utils/redact.js";

export interface PipelineDeps {
  gate: AuthorizationGate;
  extractor: ExpenseExtractor;
  store: Pick<ExpenseStore, "resolveUserId" | "save">;
}

export interface ExpensePipeline {
  process(externalUserId: string, messageText: string): Promise<PipelineOutcome>;
}

export const OUTCOME_MESSAGES = {
  unauthorized: "User not authorized to use this bot",
  not_expense: "Message does not appear to be an expense",
  invalid_extraction: "Could not extract valid expense information",
  persistence_failed: "Failed to save expense to database",
} as const;

/**
 * The one short message the user sees for an outcome
 */
export function describeOutcome(outcome: PipelineOutcome): string {
  switch (outcome.status) {
    case "recorded":
      return `${outcome.category} expense added ✅`;
    default:
      return OUTCOME_MESSAGES[outcome.status];
  }
}

export function toResponse(outcome: PipelineOutcome): ProcessExpenseResponse {
  if (outcome.status !== "recorded") {
    return { success: false, message: describeOutcome(outcome) };
  }
  return {
    success: true,
    message: describeOutcome(outcome),
    description: outcome.description,
    amount: outcome.amount,
    category: outcome.category,
  };
}

/**
 * Authorize → extract → validate → persist. Each step can end the run;
 * nothing is retried.
 */
export function createExpensePipeline({ gate, extractor, store }: PipelineDeps): ExpensePipeline {
  return {
    async process(externalUserId: string, messageText: string): Promise<PipelineOutcome> {
      const who = maskId(externalUserId);
      console.log(`[Pipeline] Processing message from ${who}`);

      if (!(await gate.isAuthorized(externalUserId))) {
        console.warn(`[Pipeline] Unauthorized user attempt: ${who}`);
        return { status: "unauthorized" };
      }

      const extraction = await extractor.extract(messageText);
      if (extraction.kind === "not_expense") {
        console.log(`[Pipeline] Non-expense message from ${who}: ${MESSAGE_HIDDEN}`);
        return { status: "not_expense" };
      }

      const fields = validateExpense(extraction);
      if (!fields) {
        console.error(`[Pipeline] Invalid expense data extracted for ${who}`);
        return { status: "invalid_extraction" };
      }

      const userId = await store.resolveUserId(externalUserId);
      if (userId === null || !(await store.save(userId, fields))) {
        console.error(`[Pipeline] Failed to save expense for ${who}`);
        return { status: "persistence_failed" };
      }

      console.log(`[Pipeline] Recorded ${fields.category} expense for ${who}`);
      return { status: "recorded", ...fields };
    },
  };
}
