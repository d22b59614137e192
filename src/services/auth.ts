import type { ExpenseStore } from "./supabase.js";
import { errorMessage, maskId } from "../utils/redact.js";

export interface AuthorizationGate {
  isAuthorized(externalUserId: string): Promise<boolean>;
}

/**
 * A user is allowed in when their Telegram id has a row in `users`.
 * A failed lookup counts as "not authorized".
 */
export function createAuthorizationGate(store: Pick<ExpenseStore, "resolveUserId">): AuthorizationGate {
  return {
    async isAuthorized(externalUserId: string): Promise<boolean> {
      try {
        return (await store.resolveUserId(externalUserId)) !== null;
      } catch (error) {
        console.error(`[Auth] Lookup failed for ${maskId(externalUserId)}:`, errorMessage(error));
        return false;
      }
    },
  };
}
