export class MomentumError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Series too short (or unusable) to score. Recoverable: the keyword is skipped. */
export class InsufficientDataError extends MomentumError {
  constructor(
    readonly points: number,
    readonly required: number,
    detail?: string,
  ) {
    super(detail ?? `Insufficient data: ${points} weeks, need at least ${required}`);
  }
}

/** Raised by a TrendsTransport for a single failed external call. */
export class TransportError extends MomentumError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** All attempts failed and no cached series exists to fall back on. */
export class FetchError extends MomentumError {
  constructor(
    readonly keyword: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Trends fetch for "${keyword}" failed after ${attempts} attempt(s): ${describeError(options?.cause)}`, options);
  }
}

/** The live tree could not be swapped. Earlier snapshot writes stay valid. */
export class PublishError extends MomentumError {}

/** Keyword source, store or filesystem unavailable. Aborts the run. */
export class InfrastructureError extends MomentumError {}

export function describeError(err: unknown): string {
  if (err === undefined) return 'unknown error';
  return err instanceof Error ? err.message : String(err);
}
