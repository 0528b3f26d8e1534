/**
 * Error taxonomy.
 *
 * Only `ConfigurationError` (client construction) and `RegistrationError`
 * (explicit agent registration) ever reach the host application. The
 * others are produced and consumed inside the delivery pipeline, where
 * they end up in log records.
 */
export class BeaconError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid credential/option; the SDK cannot work at all. */
export class ConfigurationError extends BeaconError {
  public readonly issues: readonly string[];

  public constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.issues = issues;
  }
}

/** A producer handed over something that is not a valid event. */
export class ProducerError extends BeaconError {}

export type TransientCause = 'network' | 'timeout' | 'server' | 'rate_limit';

/** Network error, timeout, 408/429 or 5xx. Retried until the budget runs out. */
export class TransientDeliveryError extends BeaconError {
  public readonly kind: TransientCause;
  public readonly status: number | undefined;

  public constructor(kind: TransientCause, message: string, options: { status?: number | undefined; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.status = options.status;
  }
}

/** Authentication/validation rejection (4xx). The batch is dropped at once. */
export class FatalDeliveryError extends BeaconError {
  public readonly status: number;

  public constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

/** The collector refused or failed the registration call. */
export class RegistrationError extends BeaconError {
  public readonly status: number | undefined;

  public constructor(message: string, options: { status?: number | undefined; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
  }
}
