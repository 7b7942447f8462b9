/** Error codes */
export const ReconcileErrorCode = {
  CLIENT_UNAVAILABLE: 'CLIENT_UNAVAILABLE',
  INFO_UNAVAILABLE: 'INFO_UNAVAILABLE',
  UNKNOWN_STRATEGY: 'UNKNOWN_STRATEGY',
  CATEGORY_QUERY_FAILED: 'CATEGORY_QUERY_FAILED',
  NOT_CONFIRMED: 'NOT_CONFIRMED'
} as const

export type ReconcileErrorCodeType =
  (typeof ReconcileErrorCode)[keyof typeof ReconcileErrorCode]

/**
 * Base class of every error raised by the reconciler.
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCodeType,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ReconcileError'
  }
}

/**
 * The cluster client could not be created.
 */
export class ClientUnavailableError extends ReconcileError {
  constructor(apiServer: string, cause: unknown) {
    super(
      `creating client for '${apiServer}': ${describe(cause)}`,
      ReconcileErrorCode.CLIENT_UNAVAILABLE,
      { cause }
    )
    this.name = 'ClientUnavailableError'
  }
}

/**
 * The cluster did not answer the info query.
 */
export class InfoUnavailableError extends ReconcileError {
  constructor(cause: unknown) {
    super(
      `obtaining cluster info: ${describe(cause)}`,
      ReconcileErrorCode.INFO_UNAVAILABLE,
      { cause }
    )
    this.name = 'InfoUnavailableError'
  }
}

export class UnknownStrategyError extends ReconcileError {
  constructor(
    public readonly strategy: string,
    known: readonly string[]
  ) {
    super(
      `unknown diff strategy '${strategy}' (known: ${known.join(', ')})`,
      ReconcileErrorCode.UNKNOWN_STRATEGY
    )
    this.name = 'UnknownStrategyError'
  }
}

/**
 * Listing the members of one resource category failed.
 */
export class CategoryQueryError extends ReconcileError {
  constructor(
    public readonly category: string,
    cause: unknown
  ) {
    super(
      `getting orphans of kind '${category}': ${describe(cause)}`,
      ReconcileErrorCode.CATEGORY_QUERY_FAILED,
      { cause }
    )
    this.name = 'CategoryQueryError'
  }
}

export class NotConfirmedError extends ReconcileError {
  constructor(approval: string) {
    super(
      `aborted: confirmation '${approval}' was not given`,
      ReconcileErrorCode.NOT_CONFIRMED
    )
    this.name = 'NotConfirmedError'
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
