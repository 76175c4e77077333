/** The input driver is unreachable, or the connection to it was lost. */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class ConnectTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Connection timeout after ${timeoutMs} ms`);
    this.name = 'ConnectTimeoutError';
  }
}

export class FixtureDisconnectedError extends Error {
  constructor(message = 'Fixture is not connected') {
    super(message);
    this.name = 'FixtureDisconnectedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
