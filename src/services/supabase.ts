import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  CategoryTotalRowSchema,
  ExpenseInsertSchema,
  ExpenseRowSchema,
  UserRowSchema,
} from "../schemas/expense.js";
import type { Expense, ExpenseFields, ExpenseStats } from "../types/index.js";
import { errorMessage, maskId } from "../utils/redact.js";

export interface ExpenseStore {
  resolveUserId(externalUserId: string): Promise<number | null>;
  save(userId: number, fields: ExpenseFields): Promise<boolean>;
  listRecent(externalUserId: string, limit: number): Promise<Expense[]>;
  aggregate(externalUserId: string): Promise<ExpenseStats>;
}

export function emptyStats(): ExpenseStats {
  return { totalExpenses: 0, totalAmount: 0, categories: [] };
}

/**
 * Create a Supabase client with the service role key (bypasses RLS).
 * `fetch` is swappable so tests can answer PostgREST requests in process.
 */
export function createSupabase(
  url: string,
  serviceRoleKey: string,
  options: { fetch?: typeof fetch } = {}
): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}

const toCents = (amount: number) => Math.round(amount * 100);

/**
 * Expense persistence over the `users` / `expenses` tables.
 * No method throws: failures are logged and reported as null, false or empty.
 */
export class SupabaseExpenseStore implements ExpenseStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Internal user id for a Telegram id, or null when unknown
   */
  async resolveUserId(externalUserId: string): Promise<number | null> {
    try {
      const { data, error } = await this.supabase
        .from("users")
        .select("id")
        .eq("telegram_id", externalUserId)
        .maybeSingle();

      if (error) {
        console.error(`[Store] Failed to look up user ${maskId(externalUserId)}:`, error.message);
        return null;
      }
      if (!data) return null;

      const row = UserRowSchema.safeParse(data);
      if (!row.success) {
        console.error(`[Store] Unexpected user row for ${maskId(externalUserId)}`);
        return null;
      }
      return row.data.id;
    } catch (error) {
      console.error(`[Store] Failed to look up user ${maskId(externalUserId)}:`, errorMessage(error));
      return null;
    }
  }

  /**
   * Insert one expense stamped with the current time
   */
  async save(userId: number, fields: ExpenseFields): Promise<boolean> {
    const insert = ExpenseInsertSchema.safeParse({
      user_id: userId,
      description: fields.description,
      amount: fields.amount,
      category: fields.category,
      added_at: this.now().toISOString(),
    });
    if (!insert.success) {
      console.error(`[Store] Refusing to insert invalid expense for user ${userId}`);
      return false;
    }

    try {
      const { error } = await this.supabase.from("expenses").insert(insert.data);
      if (error) {
        console.error(`[Store] Failed to insert expense for user ${userId}:`, error.code, error.message);
        return false;
      }
    } catch (error) {
      console.error(`[Store] Failed to insert expense for user ${userId}:`, errorMessage(error));
      return false;
    }

    console.log(`[Store] Expense saved for user ${userId}: ${fields.amount} - ${fields.category}`);
    return true;
  }

  /**
   * Most recent expenses first, at most `limit` of them
   */
  async listRecent(externalUserId: string, limit: number): Promise<Expense[]> {
    try {
      const { data, error } = await this.supabase
        .from("expenses")
        .select("description, amount, category, added_at, users!inner(telegram_id)")
        .eq("users.telegram_id", externalUserId)
        .order("added_at", { ascending: false })
        .order("id", { ascending: false })
        .limit(limit);

      if (error) {
        console.error(`[Store] Failed to list expenses for ${maskId(externalUserId)}:`, error.message);
        return [];
      }

      const rows = z.array(ExpenseRowSchema).safeParse(data ?? []);
      if (!rows.success) {
        console.error(`[Store] Unexpected expense rows for ${maskId(externalUserId)}`);
        return [];
      }

      return rows.data.map((row) => ({
        description: row.description,
        amount: row.amount,
        category: row.category,
        addedAt: row.added_at,
      }));
    } catch (error) {
      console.error(`[Store] Failed to list expenses for ${maskId(externalUserId)}:`, errorMessage(error));
      return [];
    }
  }

  /**
   * Totals per category, largest first. Grouped in the database by the
   * `expense_category_totals` function (database/schema.sql), one statement.
   */
  async aggregate(externalUserId: string): Promise<ExpenseStats> {
    try {
      const { data, error } = await this.supabase.rpc("expense_category_totals", {
        p_telegram_id: externalUserId,
      });

      if (error) {
        console.error(`[Store] Failed to aggregate expenses for ${maskId(externalUserId)}:`, error.message);
        return emptyStats();
      }

      const rows = z.array(CategoryTotalRowSchema).safeParse(data ?? []);
      if (!rows.success) {
        console.error(`[Store] Unexpected category totals for ${maskId(externalUserId)}`);
        return emptyStats();
      }

      return toStats(
        rows.data.map((row) => ({ category: row.category, count: row.count, cents: toCents(row.total_amount) }))
      );
    } catch (error) {
      console.error(`[Store] Failed to aggregate expenses for ${maskId(externalUserId)}:`, errorMessage(error));
      return emptyStats();
    }
  }
}

interface CategoryTotal {
  category: string;
  count: number;
  cents: number;
}

function toStats(totals: CategoryTotal[]): ExpenseStats {
  const categories = totals
    .filter((t) => t.count > 0)
    .sort((a, b) => b.cents - a.cents || a.category.localeCompare(b.category));

  return {
    totalExpenses: categories.reduce((n, t) => n + t.count, 0),
    totalAmount: categories.reduce((sum, t) => sum + t.cents, 0) / 100,
    categories: categories.map(({ category, count, cents }) => ({ category, count, totalAmount: cents / 100 })),
  };
}

/**
 * Group individual expenses by category. Sums are kept in cents.
 */
export function summarize(rows: { amount: number; category: string }[]): ExpenseStats {
  const byCategory = new Map<string, CategoryTotal>();

  for (const row of rows) {
    const entry = byCategory.get(row.category) ?? { category: row.category, count: 0, cents: 0 };
    entry.count++;
    entry.cents += toCents(row.amount);
    byCategory.set(row.category, entry);
  }

  return toStats([...byCategory.values()]);
}
