export type FetchErrorKind = 'timeout' | 'http' | 'network';

/**
 * A page request that did not produce a 2xx response.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * A selector matched nothing, or fewer elements than the page layout requires.
 */
export class MalformedPageError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = 'MalformedPageError';
  }
}

/**
 * One half of a label/value stat row is absent. Never fatal.
 */
export class MissingFieldError extends Error {
  constructor(public readonly slot: string, public readonly missing: 'label' | 'value' | 'both') {
    super(`Stat row "${slot}" is missing its ${missing === 'both' ? 'label and value' : missing}`);
    this.name = 'MissingFieldError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
