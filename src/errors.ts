export type FailureKind = 'fetch' | 'classification' | 'modal' | 'setup' | 'notification';

export class StockwatchError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Network error, timeout or non-2xx response while loading a product page. */
export class FetchFailure extends StockwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fetch', message, options);
  }
}

export class ClassificationFailure extends StockwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('classification', message, options);
  }
}

export class ModalFailure extends StockwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('modal', message, options);
  }
}

export class NotificationFailure extends StockwatchError {
  readonly channel: string;

  constructor(channel: string, message: string, options?: { cause?: unknown }) {
    super('notification', message, options);
    this.channel = channel;
  }
}

/** The headless browser could not be started. The next browser check tries again. */
export class SetupFailure extends StockwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('setup', message, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
