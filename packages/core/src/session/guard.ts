import type { Logger } from "pino";
import { SessionScopeError, describeCause } from "../errors/catalog.js";
import type { SessionInfo, SessionProvider } from "./types.js";

export interface SessionGuardDeps {
  provider: SessionProvider;
  logger: Logger;
}

export interface SessionGuard {
  /**
   * Idempotent. Leaves an authenticated session scoped to exactly this
   * tenant and subscription, or throws SessionScopeError.
   */
  ensureSession(tenantId: string, subscriptionId: string): Promise<void>;
}

/** Tenant and subscription ids are GUIDs; compare them case-insensitively. */
function sameId(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function createSessionGuard(deps: SessionGuardDeps): SessionGuard {
  const { provider, logger } = deps;

  async function step<T>(
    action: string,
    details: Record<string, unknown>,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new SessionScopeError(
        `Session ${action} failed: ${describeCause(err)}`,
        details,
        { cause: err },
      );
    }
  }

  return {
    async ensureSession(tenantId, subscriptionId) {
      const expected = { tenantId, subscriptionId };
      let session: SessionInfo | null = await step("lookup", expected, () =>
        provider.getCurrentSession(),
      );

      if (!session || !sameId(session.tenantId, tenantId)) {
        logger.info(
          { tenantId, currentTenantId: session?.tenantId ?? null },
          session ? "Session scoped to another tenant, signing in again" : "No session, signing in",
        );
        await step("login", expected, () => provider.login(tenantId));
        session = await step("lookup", expected, () => provider.getCurrentSession());

        if (!session || !sameId(session.tenantId, tenantId)) {
          throw new SessionScopeError("Sign-in did not produce a session for the requested tenant", {
            ...expected,
            actualTenantId: session?.tenantId ?? null,
          });
        }
      }

      if (!sameId(session.subscriptionId, subscriptionId)) {
        logger.info(
          { from: session.subscriptionId, to: subscriptionId },
          "Switching subscription",
        );
        await step("scope switch", expected, () => provider.setActiveScope(subscriptionId));

        const verified = await step("lookup", expected, () => provider.getCurrentSession());
        if (
          !verified ||
          !sameId(verified.tenantId, tenantId) ||
          !sameId(verified.subscriptionId, subscriptionId)
        ) {
          throw new SessionScopeError("Subscription switch could not be verified", {
            ...expected,
            actualTenantId: verified?.tenantId ?? null,
            actualSubscriptionId: verified?.subscriptionId ?? null,
          });
        }
        session = verified;
      }

      logger.info(
        { tenantId: session.tenantId, subscriptionId: session.subscriptionId, user: session.user },
        "Session ready",
      );
    },
  };
}
