export type TickerHandle = Readonly<{
  stop(): void;
}>;

export type Ticker = Readonly<{
  start(onTick: () => void): TickerHandle;
}>;

export function createIntervalTicker(intervalMs: number): Ticker {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new Error("ticker requires a positive intervalMs.");
  }

  return {
    start(onTick: () => void): TickerHandle {
      let stopped = false;
      const timer = setInterval(() => {
        // clearInterval does not recall a callback that is already queued.
        if (stopped) return;
        onTick();
      }, intervalMs);

      return {
        stop(): void {
          if (stopped) return;
          stopped = true;
          clearInterval(timer);
        }
      };
    }
  };
}
