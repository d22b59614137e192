import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import { createExpenseRouter, type ExpenseRouteDeps } from "./routes/expenses.js";

export interface AppDeps extends ExpenseRouteDeps {
  isDev: boolean;
}

export function createApp({ pipeline, store, isDev }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // Request logging in development (paths only, bodies carry user messages)
  if (isDev) {
    app.use((req, _res, next) => {
      console.log(`${req.method} ${req.path}`);
      next();
    });
  }

  // Routes
  app.use("/api/expenses", createExpenseRouter({ pipeline, store }));

  // Root health check
  app.get("/", (_req, res) => {
    res.json({
      name: "Expense Bot Service",
      version: "1.0.0",
      status: "running",
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler
  const errorHandler: ErrorRequestHandler = (
    err: Error,
    _req: Request,
    res: Response,
    _next: NextFunction
  ) => {
    // body-parser errors carry their own 4xx status
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    if (status >= 500) {
      console.error("Unhandled error:", err);
    }
    res.status(status).json({
      error: status >= 500 ? "Internal server error" : "Bad request",
      message: isDev ? err.message : undefined,
    });
  };
  app.use(errorHandler);

  return app;
}
