import type { ExpenseCategory } from "../schemas/expense.js";

export interface ExpenseFields {
  description: string;
  amount: number;
  category: ExpenseCategory;
}

/**
 * What the extractor made of a message. `category` is the model's raw
 * string; it is only mapped onto the fixed set by the validator.
 */
export type ExtractionResult =
  | { kind: "not_expense" }
  | {
      kind: "expense";
      description: string;
      amount: number;
      category: string | null;
    };

export interface Expense {
  description: string;
  amount: number;
  category: string;
  addedAt: string | null;
}

export interface CategoryStats {
  category: string;
  count: number;
  totalAmount: number;
}

export interface ExpenseStats {
  totalExpenses: number;
  totalAmount: number;
  categories: CategoryStats[];
}

export type PipelineOutcome =
  | { status: "unauthorized" }
  | { status: "not_expense" }
  | { status: "invalid_extraction" }
  | { status: "persistence_failed" }
  | ({ status: "recorded" } & ExpenseFields);

export interface ProcessExpenseResponse {
  success: boolean;
  message: string;
  description?: string;
  amount?: number;
  category?: ExpenseCategory;
}

export interface ListExpensesResponse {
  expenses: Expense[];
  count: number;
}
