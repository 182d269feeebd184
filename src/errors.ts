// ─── Error taxonomy ─────────────────────────────────────────────────
// Every failure the library raises extends HeritageApiError so callers
// can catch the whole family with one instanceof check.

export class HeritageApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Non-2xx HTTP status or a network failure. `status` is null when no response arrived. */
export class TransportError extends HeritageApiError {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** The response body was not XML, or lacked a tag the record requires. */
export class MalformedResponseError extends HeritageApiError {
  constructor(message: string, readonly tag: string | null = null, options?: ErrorOptions) {
    super(message, options);
  }

  static missingTag(tag: string, parent: string): MalformedResponseError {
    return new MalformedResponseError(`Missing required <${tag}> in <${parent}>`, tag);
  }

  static badValue(tag: string, value: string, expected: string): MalformedResponseError {
    return new MalformedResponseError(
      `Invalid value for <${tag}>: "${value}" (expected ${expected})`,
      tag
    );
  }
}

export class UnknownCodeError extends HeritageApiError {
  constructor(readonly set: string, readonly key: string) {
    super(`"${key}" not found in ${set}`);
  }
}

export class ConfigurationError extends HeritageApiError {}
