import { z } from "zod";
import { MAX_AMOUNT, isWholeCents } from "../utils/money.js";

// Ordered for client enumeration; "Other" is the catch-all
export const EXPENSE_CATEGORIES = [
  "Housing",
  "Transportation",
  "Food",
  "Utilities",
  "Insurance",
  "Medical/Healthcare",
  "Savings",
  "Debt",
  "Education",
  "Entertainment",
  "Other",
] as const;

export const ExpenseCategorySchema = z.enum(EXPENSE_CATEGORIES);

export type ExpenseCategory = z.infer<typeof ExpenseCategorySchema>;

export const FALLBACK_CATEGORY: ExpenseCategory = "Other";

// Numbers sometimes come back quoted ("20.5") from the model and from numeric columns
const numericValue = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

// Payload the model is asked to return. Every field is optional because the
// model is not trusted to follow the instruction exactly.
export const ExtractionPayloadSchema = z.object({
  is_expense: z.boolean().nullish(),
  description: z.string().nullish(),
  amount: numericValue.nullish(),
  category: z.string().nullish(),
});

export type ExtractionPayload = z.infer<typeof ExtractionPayloadSchema>;

// Incoming message forwarded by the chat connector
export const ProcessExpenseRequestSchema = z.object({
  telegram_id: z.string().trim().min(1, "telegram_id is required"),
  message: z.string(),
});

export const ListExpensesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

// Row shapes returned by PostgREST
export const UserRowSchema = z.object({
  id: z.number().int(),
});

export const ExpenseRowSchema = z.object({
  description: z.string(),
  amount: numericValue,
  category: z.string(),
  added_at: z.string().nullable(),
});

// Row of the expense_category_totals() function; bigint/numeric may arrive as text
export const CategoryTotalRowSchema = z.object({
  category: z.string(),
  count: numericValue.pipe(z.number().int().nonnegative()),
  total_amount: numericValue,
});

export const ExpenseInsertSchema = z.object({
  user_id: z.number().int(),
  description: z.string().min(1),
  amount: z.number().positive().max(MAX_AMOUNT).refine(isWholeCents, "amount must be in whole cents"),
  category: ExpenseCategorySchema,
  added_at: z.string().datetime(),
});
