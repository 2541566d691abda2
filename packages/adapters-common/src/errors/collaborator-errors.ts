/**
 * Errors raised by provider collaborators.
 *
 * Adapters translate SDK-specific failures into these classes so callers can
 * decide on retry behaviour without knowing which provider is underneath.
 */

/** The provider rejected a capacity request (quota, invalid template, ...) */
export class ProvisionError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProvisionError";
  }
}

/** A status query failed for a reason that may clear on retry */
export class TransientQueryError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransientQueryError";
  }
}

/** The provider does not know the requested resource */
export class NotFoundError extends Error {
  constructor(
    message: string,
    public readonly resourceId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** The provider refused to attach a volume */
export class AttachError extends Error {
  constructor(
    message: string,
    public readonly volumeId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AttachError";
  }
}
