import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import {
  EXPENSE_CATEGORIES,
  ListExpensesQuerySchema,
  ProcessExpenseRequestSchema,
} from "../schemas/expense.js";
import { toResponse, type ExpensePipeline } from "../services/pipeline.js";
import type { ExpenseStore } from "../services/supabase.js";
import type { ListExpensesResponse } from "../types/index.js";

export interface ExpenseRouteDeps {
  pipeline: ExpensePipeline;
  store: Pick<ExpenseStore, "listRecent" | "aggregate">;
}

// Express 4 does not forward rejected promises to the error handler
const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

export function createExpenseRouter({ pipeline, store }: ExpenseRouteDeps): Router {
  const router = Router();

  /**
   * POST /api/expenses/process
   *
   * Receives one chat message forwarded by the connector, records it when it
   * is an expense, and answers with the text to send back to the user.
   */
  router.post("/process", asyncHandler(async (req: Request, res: Response) => {
    const parseResult = ProcessExpenseRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({
        success: false,
        error: "Invalid request body",
        details: parseResult.error.errors.map((e) => ({ path: e.path, message: e.message })),
      });
      return;
    }

    const { telegram_id, message } = parseResult.data;
    const outcome = await pipeline.process(telegram_id, message);

    res.json(toResponse(outcome));
  }));

  /**
   * GET /api/expenses/categories
   */
  router.get("/categories", (_req: Request, res: Response) => {
    res.json({ categories: EXPENSE_CATEGORIES });
  });

  /**
   * GET /api/expenses/health
   *
   * Health check endpoint
   */
  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy", service: "expense-bot", timestamp: new Date().toISOString() });
  });

  /**
   * GET /api/expenses/:telegramId/stats
   *
   * Totals per category for one user
   */
  router.get("/:telegramId/stats", asyncHandler(async (req: Request, res: Response) => {
    res.json(await store.aggregate(req.params.telegramId));
  }));

  /**
   * GET /api/expenses/:telegramId?limit=10
   *
   * Most recent expenses for one user
   */
  router.get("/:telegramId", asyncHandler(async (req: Request, res: Response) => {
    const query = ListExpensesQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: "limit must be an integer between 1 and 100" });
      return;
    }

    const expenses = await store.listRecent(req.params.telegramId, query.data.limit);
    const response: ListExpensesResponse = { expenses, count: expenses.length };
    res.json(response);
  }));

  return router;
}
