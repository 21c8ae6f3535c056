export interface SessionInfo {
  tenantId: string;
  subscriptionId: string;
  /** Signed-in principal, when the provider reports one. */
  user?: string;
}

/** Authentication capability the session guard drives. */
export interface SessionProvider {
  /** Current session, or null when nobody is signed in. */
  getCurrentSession(): Promise<SessionInfo | null>;
  /** Interactive sign-in scoped to a tenant. Blocks until it completes. */
  login(tenantId: string): Promise<void>;
  setActiveScope(subscriptionId: string): Promise<void>;
}
