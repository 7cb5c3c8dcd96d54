/**
 * Single-flight guard for the presence fan-out. `tryAcquire` is the
 * compare-and-set: it only succeeds when nothing is in flight.
 */
export type WriteGate = Readonly<{
  tryAcquire(): boolean;
  release(): void;
  isHeld(): boolean;
}>;

export function createWriteGate(): WriteGate {
  let held = false;

  return {
    tryAcquire(): boolean {
      if (held) return false;
      held = true;
      return true;
    },

    release(): void {
      held = false;
    },

    isHeld(): boolean {
      return held;
    }
  };
}
