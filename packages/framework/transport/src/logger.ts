/**
 * Minimal logging surface the transport writes to. Applications pass their
 * own logger; by default nothing is written.
 */
export interface TransportLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
}

export const silentLogger: TransportLogger = {
  debug(): void {},
  warn(): void {},
};
