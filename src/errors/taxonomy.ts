export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidAmount: 'invalid_amount',
  InvalidCollateralAmount: 'invalid_collateral_amount',
  InvalidAsset: 'invalid_asset',
  InvalidAddress: 'invalid_address',
  InvalidConfig: 'invalid_config',
  InvalidLeverage: 'invalid_leverage',
  InvalidRate: 'invalid_rate',
  NotPositionOwner: 'not_position_owner',
  MissingRole: 'missing_role',
  VaultNotCaller: 'vault_not_caller',
  ReentrantCall: 'reentrant_call',
  LoanExceedsLtvLimit: 'loan_exceeds_ltv_limit',
  InsufficientCollateralAfterWithdrawal: 'insufficient_collateral_after_withdrawal',
  AmountExceedsLoan: 'amount_exceeds_loan',
  PositionHealthy: 'position_healthy',
  NoInterestToCollect: 'no_interest_to_collect',
  StalePrice: 'stale_price',
  InvalidPrice: 'invalid_price',
  InsufficientBalance: 'insufficient_balance',
  InsufficientAllowance: 'insufficient_allowance',
  SlippageExceeded: 'slippage_exceeded',
  NoBorrowCapacity: 'no_borrow_capacity',
  LeverageTooHigh: 'leverage_too_high',
  PositionNotFound: 'position_not_found',
  PositionClosed: 'position_closed',
  VaultNotRegistered: 'vault_not_registered',
  VaultAlreadyRegistered: 'vault_already_registered',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export type ErrorKind =
  | 'validation'
  | 'authorization'
  | 'invariant'
  | 'external'
  | 'capacity'
  | 'not_found'
  | 'conflict'
  | 'internal';

const KIND_BY_CODE: Record<ErrorCode, ErrorKind> = {
  invalid_payload: 'validation',
  invalid_amount: 'validation',
  invalid_collateral_amount: 'validation',
  invalid_asset: 'validation',
  invalid_address: 'validation',
  invalid_config: 'validation',
  invalid_leverage: 'validation',
  invalid_rate: 'validation',
  not_position_owner: 'authorization',
  missing_role: 'authorization',
  vault_not_caller: 'authorization',
  reentrant_call: 'authorization',
  loan_exceeds_ltv_limit: 'invariant',
  insufficient_collateral_after_withdrawal: 'invariant',
  amount_exceeds_loan: 'invariant',
  position_healthy: 'invariant',
  no_interest_to_collect: 'invariant',
  stale_price: 'external',
  invalid_price: 'external',
  insufficient_balance: 'external',
  insufficient_allowance: 'external',
  slippage_exceeded: 'external',
  no_borrow_capacity: 'capacity',
  leverage_too_high: 'capacity',
  position_not_found: 'not_found',
  position_closed: 'invariant',
  vault_not_registered: 'not_found',
  vault_already_registered: 'conflict',
  internal_error: 'internal',
};

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  authorization: 403,
  invariant: 422,
  external: 424,
  capacity: 422,
  not_found: 404,
  conflict: 409,
  internal: 500,
};

export const errorKindOf = (code: ErrorCode): ErrorKind => KIND_BY_CODE[code];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }

  get kind(): ErrorKind {
    return errorKindOf(this.code);
  }
}

/** Builds a DomainError whose HTTP status follows from the code's kind. */
export const domainError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): DomainError => new DomainError(code, STATUS_BY_KIND[errorKindOf(code)], message, details);

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
