/**
 * Base for every error the service raises on purpose. `statusCode` is what the
 * HTTP layer answers with; `code` is stable for API consumers.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PoolExhaustedError extends AppError {
  constructor() {
    super('No deposit addresses available. Please try again later.', 'POOL_EXHAUSTED', 503);
  }
}

export class NotAssignedError extends AppError {
  constructor(
    readonly address: string,
    readonly actualStatus: string | null,
  ) {
    super(
      actualStatus === null
        ? `Address ${address} is not in the pool`
        : `Address ${address} is ${actualStatus}, expected cooldown`,
      'NOT_ASSIGNED',
      409,
    );
  }
}

export class ChainUnavailableError extends AppError {
  constructor(
    message: string,
    /** Provider-suggested wait before the next attempt, if it gave one. */
    readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, 'CHAIN_UNAVAILABLE', 503);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class AddressNotFoundError extends AppError {
  constructor(readonly address: string) {
    super(`Address ${address} is not in the pool`, 'ADDRESS_NOT_FOUND', 404);
  }
}

export class DepositNotFoundError extends AppError {
  constructor(readonly depositId: string) {
    super(`Deposit ${depositId} not found`, 'DEPOSIT_NOT_FOUND', 404);
  }
}

export class InvalidDepositRequestError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_DEPOSIT_REQUEST', 400);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(depositId: string, from: string, to: string) {
    super(`Deposit ${depositId} cannot move from ${from} to ${to}`, 'INVALID_TRANSITION', 409);
  }
}
