/**
 * Maps whatever handle the host application uses for a signed-in user to the
 * stable id the engine keys its state by. `null` means the handle is unusable.
 */
export type UserRegistry<TUser> = Readonly<{
  resolveUserId(user: TUser): string | null;
}>;

export function createStringUserRegistry(): UserRegistry<string> {
  return {
    resolveUserId(user: string): string | null {
      if (typeof user !== "string") return null;
      const trimmed = user.trim();
      return trimmed === "" ? null : trimmed;
    }
  };
}
