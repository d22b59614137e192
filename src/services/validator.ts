import {
  EXPENSE_CATEGORIES,
  FALLBACK_CATEGORY,
  type ExpenseCategory,
} from "../schemas/expense.js";
import type { ExpenseFields, ExtractionResult } from "../types/index.js";
import { MAX_AMOUNT, roundToCents } from "../utils/money.js";

/**
 * Map a free-form category onto the fixed set. Unknown values become "Other".
 */
export function coerceCategory(category: string | null | undefined): ExpenseCategory {
  if (!category) return FALLBACK_CATEGORY;

  const wanted = category.trim().toLowerCase();
  const match = EXPENSE_CATEGORIES.find((c) => c.toLowerCase() === wanted);
  return match ?? FALLBACK_CATEGORY;
}

/**
 * Final check before anything is persisted. The amount is rounded to cents,
 * the scale it is stored at; null when the extraction is not a usable expense.
 */
export function validateExpense(result: ExtractionResult): ExpenseFields | null {
  if (result.kind !== "expense") return null;

  const description = result.description.trim();
  if (description.length === 0) return null;

  if (!Number.isFinite(result.amount)) return null;

  const amount = roundToCents(result.amount);
  if (!(amount > 0) || amount > MAX_AMOUNT) return null;

  return {
    description,
    amount,
    category: coerceCategory(result.category),
  };
}
