import type { PresenceHandle } from "./remoteStatClient";

export type PresenceSubscription = Readonly<{
  userId: string;
  handle: PresenceHandle;
}>;

export type PresenceRegistry = Readonly<{
  /** Returns false when the user already has a subscription. */
  add(subscription: PresenceSubscription): boolean;
  remove(userId: string): PresenceSubscription | null;
  has(userId: string): boolean;
  size(): number;
  /** Registration order; the copy is safe to iterate while the registry changes. */
  snapshot(): ReadonlyArray<PresenceSubscription>;
}>;

export function createPresenceRegistry(): PresenceRegistry {
  const byUserId = new Map<string, PresenceSubscription>();

  return {
    add(subscription: PresenceSubscription): boolean {
      if (byUserId.has(subscription.userId)) return false;
      byUserId.set(subscription.userId, subscription);
      return true;
    },

    remove(userId: string): PresenceSubscription | null {
      const existing = byUserId.get(userId);
      if (!existing) return null;
      byUserId.delete(userId);
      return existing;
    },

    has(userId: string): boolean {
      return byUserId.has(userId);
    },

    size(): number {
      return byUserId.size;
    },

    snapshot(): ReadonlyArray<PresenceSubscription> {
      return Array.from(byUserId.values());
    }
  };
}
