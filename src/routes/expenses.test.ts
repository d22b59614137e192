import type { Server } from "node:http";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../app.js";
import type { ExpenseExtractor } from "../services/ai.js";
import { createAuthorizationGate } from "../services/auth.js";
import { createExpensePipeline } from "../services/pipeline.js";
import { InMemoryExpenseStore } from "../test/memoryStore.js";

const extract = vi.fn<ExpenseExtractor["extract"]>();
const store = new InMemoryExpenseStore({ "tg-alice": 1 });
const pipeline = createExpensePipeline({
  gate: createAuthorizationGate(store),
  extractor: { extract },
  store,
});

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({ pipeline, store, isDev: false });
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  extract.mockReset();
  store.rows.length = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

const post = (path: string, body: unknown) =>
  fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });

describe("POST /api/expenses/process", () => {
  it("records an expense and returns the confirmation", async () => {
    extract.mockResolvedValue({ kind: "expense", description: "Pizza", amount: 20, category: "Food" });

    const res = await post("/api/expenses/process", { telegram_id: "tg-alice", message: "Pizza 20 bucks" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      message: "Food expense added ✅",
      description: "Pizza",
      amount: 20,
      category: "Food",
    });
    expect(store.rows).toHaveLength(1);
  });

  it("answers unauthorized users with a failure message", async () => {
    const res = await post("/api/expenses/process", { telegram_id: "tg-mallory", message: "Pizza 20 bucks" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: false, message: "User not authorized to use this bot" });
    expect(extract).not.toHaveBeenCalled();
  });

  it("rejects a body without telegram_id", async () => {
    const res = await post("/api/expenses/process", { message: "Pizza 20 bucks" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, error: "Invalid request body" });
  });

  it("rejects malformed JSON", async () => {
    const res = await post("/api/expenses/process", "{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Bad request" });
  });

  it("turns unexpected defects into a 500", async () => {
    extract.mockRejectedValue(new Error("bug"));

    const res = await post("/api/expenses/process", { telegram_id: "tg-alice", message: "Pizza 20 bucks" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Internal server error" });
  });
});

describe("read endpoints", () => {
  beforeEach(async () => {
    await store.save(1, { description: "Bus", amount: 2.1, category: "Transportation" });
    await store.save(1, { description: "Lunch", amount: 12.35, category: "Food" });
    await store.save(1, { description: "Coffee", amount: 3.45, category: "Food" });
  });

  it("lists the categories in order", async () => {
    const res = await fetch(`${baseUrl}/api/expenses/categories`);

    expect(await res.json()).toEqual({
      categories: [
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
      ],
    });
  });

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/expenses/health`);

    expect(await res.json()).toMatchObject({ status: "healthy", service: "expense-bot" });
  });

  it("lists recent expenses with a limit", async () => {
    const res = await fetch(`${baseUrl}/api/expenses/tg-alice?limit=2`);

    expect(await res.json()).toMatchObject({
      count: 2,
      expenses: [{ description: "Coffee" }, { description: "Lunch" }],
    });
  });

  it("defaults to ten expenses", async () => {
    const res = await fetch(`${baseUrl}/api/expenses/tg-alice`);

    expect(await res.json()).toMatchObject({ count: 3 });
  });

  it("rejects an invalid limit", async () => {
    const res = await fetch(`${baseUrl}/api/expenses/tg-alice?limit=0`);

    expect(res.status).toBe(400);
  });

  it("returns per-category stats", async () => {
    const res = await fetch(`${baseUrl}/api/expenses/tg-alice/stats`);

    expect(await res.json()).toEqual({
      totalExpenses: 3,
      totalAmount: 17.9,
      categories: [
        { category: "Food", count: 2, totalAmount: 15.8 },
        { category: "Transportation", count: 1, totalAmount: 2.1 },
      ],
    });
  });

  it("returns 404 JSON for unknown routes", async () => {
    const res = await fetch(`${baseUrl}/api/nothing-here`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });
});
