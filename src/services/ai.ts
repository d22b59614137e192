import { generateText } from "ai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import {
  EXPENSE_CATEGORIES,
  ExtractionPayloadSchema,
  type ExtractionPayload,
} from "../schemas/expense.js";
import type { ExtractionResult } from "../types/index.js";
import { RESPONSE_HIDDEN, errorMessage } from "../utils/redact.js";

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  abortSignal: AbortSignal;
}

/**
 * Anything that turns a prompt into text. Resolves with the raw completion
 * or rejects; the extractor does not care which model sits behind it.
 */
export type TextGenerator = (request: CompletionRequest) => Promise<string>;

export interface ExpenseExtractor {
  extract(messageText: string): Promise<ExtractionResult>;
}

export interface ExtractorOptions {
  generate: TextGenerator;
  timeoutMs: number;
  systemPrompt?: string;
}

const NOT_EXPENSE: ExtractionResult = { kind: "not_expense" };

/**
 * Build the system prompt for expense extraction
 */
export function buildSystemPrompt(categories: readonly string[] = EXPENSE_CATEGORIES): string {
  return `You are an expense analysis expert. Decide whether a chat message records an expense and, if it does, extract it.

TASK: Only a message that mentions a purchase, payment or expense together with a monetary amount is an expense.

AVAILABLE CATEGORIES:
${categories.join(", ")}

RULES:
1. Messages without a monetary amount are NOT expenses
2. Greetings, questions, random text and other non-financial messages are NOT expenses
3. If the message is not an expense, set is_expense to false and the other fields to null
4. description: what was purchased, in a few words
5. amount: the numeric value, always a positive number
6. category: the most appropriate category from the list above

EXAMPLES OF EXPENSES:
- "Pizza 20 bucks" → {"is_expense": true, "description": "Pizza", "amount": 20.0, "category": "Food"}
- "Gas 45.50" → {"is_expense": true, "description": "Gas", "amount": 45.50, "category": "Transportation"}
- "Netflix subscription 15.99" → {"is_expense": true, "description": "Netflix subscription", "amount": 15.99, "category": "Entertainment"}

EXAMPLES OF NON-EXPENSES:
- "Hello there" → {"is_expense": false, "description": null, "amount": null, "category": null}
- "How are you?" → {"is_expense": false, "description": null, "amount": null, "category": null}
- "What's the weather?" → {"is_expense": false, "description": null, "amount": null, "category": null}
- "I'm feeling great" → {"is_expense": false, "description": null, "amount": null, "category": null}

OUTPUT: Return only a JSON object with the fields is_expense, description, amount, category.`;
}

/**
 * Default generator backed by Gemini through the AI SDK
 */
export function createGeminiGenerator(options: { apiKey: string; modelId: string }): TextGenerator {
  const google = createGoogleGenerativeAI({ apiKey: options.apiKey });
  const model = google(options.modelId);

  return async ({ system, prompt, temperature, abortSignal }) => {
    const result = await generateText({
      model,
      system,
      prompt,
      temperature,
      abortSignal,
      maxRetries: 0, // the caller decides whether to re-deliver
    });
    return result.text;
  };
}

/**
 * Return the first balanced `{...}` region in `text`, or null.
 * Braces inside JSON string literals are ignored.
 */
export function findJsonObject(text: string): string | null {
  let start = text.indexOf("{");

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];

      if (inString) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }

      if (ch === '"') inString = true;
      else if (ch === "{") depth++;
      else if (ch === "}") {
        depth--;
        if (depth === 0) return text.slice(start, i + 1);
      }
    }

    start = text.indexOf("{", start + 1);
  }

  return null;
}

/**
 * Parse the model's completion into the optional-field payload.
 * Returns null when no valid payload can be recovered.
 */
export function parseCompletion(text: string): ExtractionPayload | null {
  const candidate = findJsonObject(text) ?? text.trim();

  let raw: unknown;
  try {
    raw = JSON.parse(candidate);
  } catch {
    // parser messages quote the input, so only the marker is logged
    console.warn(`[Extractor] Completion is not valid JSON: ${RESPONSE_HIDDEN}`);
    return null;
  }

  const parsed = ExtractionPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)");
    console.warn(`[Extractor] Completion failed validation on: ${fields.join(", ")}`);
    return null;
  }

  return parsed.data;
}

/**
 * Promote a parsed payload to an extraction result
 */
export function toExtractionResult(payload: ExtractionPayload): ExtractionResult {
  if (!payload.is_expense) return NOT_EXPENSE;

  const description = payload.description?.trim() ?? "";
  const amount = payload.amount;

  if (!description || amount == null || !Number.isFinite(amount) || amount <= 0) {
    console.warn("[Extractor] Model flagged an expense without a usable description or amount");
    return NOT_EXPENSE;
  }

  return {
    kind: "expense",
    description,
    amount,
    category: payload.category ?? null,
  };
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason ?? new Error("Aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Extract expenses from chat messages with a language model.
 * Never rejects: every failure degrades to "not an expense".
 */
export function createExpenseExtractor(options: ExtractorOptions): ExpenseExtractor {
  const system = options.systemPrompt ?? buildSystemPrompt();

  return {
    async extract(messageText: string): Promise<ExtractionResult> {
      const abortSignal = AbortSignal.timeout(options.timeoutMs);

      let completion: string;
      try {
        completion = await abortable(
          options.generate({ system, prompt: messageText, temperature: 0, abortSignal }),
          abortSignal
        );
      } catch (error) {
        console.error("[Extractor] Model request failed:", errorMessage(error));
        return NOT_EXPENSE;
      }

      console.log(`[Extractor] Model response: ${RESPONSE_HIDDEN}`);

      const payload = parseCompletion(completion);
      if (!payload) return NOT_EXPENSE;

      return toExtractionResult(payload);
    },
  };
}
