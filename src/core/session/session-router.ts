/**
 * Routes transport events to per-user conversation sessions.
 *
 * Owns the user -> session table. Sessions are created by the start command
 * only; events from unknown users are dropped. Every event for one user runs
 * through that user's mailbox lane, so lookup, handling and eviction of a
 * session never interleave with another event from the same user.
 */

import type { TransportEvent, UserId } from "../../types/transport";
import type { ConversationSession } from "./conversation-session";
import { KeyedMailbox } from "./keyed-mailbox";

const DEFAULT_CLEANUP_INTERVAL_MS = 60 * 1000;

export type SessionFactory = (userId: UserId) => ConversationSession;

export type DispatchResult = "handled" | "dropped" | "evicted";

export interface SessionRouterOptions {
  /** Evict sessions idle for longer than this; 0 disables expiry. */
  idleTtlMs?: number;
  cleanupIntervalMs?: number;
  now?: () => number;
}

export class SessionRouter {
  private readonly sessions = new Map<UserId, ConversationSession>();
  private readonly lanes = new KeyedMailbox<UserId>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;
  private readonly idleTtlMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly createSession: SessionFactory,
    options: SessionRouterOptions = {}
  ) {
    this.idleTtlMs = Math.max(0, options.idleTtlMs ?? 0);
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  dispatch(event: TransportEvent): Promise<DispatchResult> {
    return this.lanes.run(event.userId, () => this.route(event));
  }

  private async route(event: TransportEvent): Promise<DispatchResult> {
    const session =
      event.kind === "command" && event.name === "start"
        ? this.getOrCreateSession(event.userId)
        : this.sessions.get(event.userId);

    if (!session) {
      return "dropped";
    }

    const result = await session.handle(event);
    if (result.loggedOut) {
      this.evict(event.userId);
      return "evicted";
    }
    return "handled";
  }

  private getOrCreateSession(userId: UserId): ConversationSession {
    const existing = this.sessions.get(userId);
    if (existing) {
      return existing;
    }

    const session = this.createSession(userId);
    this.sessions.set(userId, session);
    console.log(`[SessionRouter] Created new session for ${userId}`);
    return session;
  }

  getSession(userId: UserId): ConversationSession | undefined {
    return this.sessions.get(userId);
  }

  hasSession(userId: UserId): boolean {
    return this.sessions.has(userId);
  }

  /**
   * Drop a user's session.
   * @returns Whether a session was removed
   */
  evict(userId: UserId): boolean {
    const removed = this.sessions.delete(userId);
    if (removed) {
      console.log(`[SessionRouter] Evicted session for ${userId}`);
    }
    return removed;
  }

  /**
   * Evict sessions idle past the TTL. Sessions with an event in flight are
   * left alone.
   * @returns Number of sessions evicted
   */
  evictIdle(): number {
    if (this.idleTtlMs <= 0) return 0;

    const cutoff = this.now() - this.idleTtlMs;
    let evicted = 0;
    for (const [userId, session] of this.sessions) {
      if (session.lastActivityAt < cutoff && !this.lanes.isBusy(userId)) {
        this.sessions.delete(userId);
        evicted += 1;
      }
    }

    if (evicted > 0) {
      console.log(`[SessionRouter] Expired ${evicted} idle session(s)`);
    }
    return evicted;
  }

  startCleanupTimer(): void {
    if (this.idleTtlMs <= 0 || this.cleanupInterval) return;
    this.cleanupInterval = setInterval(() => {
      this.evictIdle();
    }, this.cleanupIntervalMs);
  }

  stopCleanupTimer(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  getActiveUserIds(): UserId[] {
    return Array.from(this.sessions.keys());
  }
}
