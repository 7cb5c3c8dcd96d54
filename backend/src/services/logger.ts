export type Logger = Readonly<{
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}>;

export function createConsoleLogger(prefix = "[StatSync]"): Logger {
  return {
    info(message: string): void {
      console.log(`${prefix} ${message}`);
    },
    warn(message: string): void {
      console.warn(`${prefix} ${message}`);
    },
    error(message: string): void {
      console.error(`${prefix} ${message}`);
    }
  };
}

export const silentLogger: Logger = {
  info(): void {},
  warn(): void {},
  error(): void {}
};
