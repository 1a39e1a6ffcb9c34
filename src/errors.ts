/**
 * Error taxonomy of the protocol.
 *
 * Every failure aborts the whole call; the ledger restores the state that
 * existed before the call started, so errors never leave partial effects.
 */

export type PreconditionCode =
  | "ZeroAmount"
  | "ZeroAddress"
  | "TimestampTooOld"
  | "StaleReference"
  | "PendingActionAlreadyExists"
  | "NoPendingAction"
  | "InvalidPendingAction"
  | "InvalidPendingActionData"
  | "PendingActionNotExpired"
  | "SecurityDepositTooLow"
  | "InsufficientFee"
  | "InsufficientBalance"
  | "Unauthorized"
  | "PositionNotValidated"
  | "AmountToCloseTooHigh"
  | "NothingToRefund"
  | "ReentrantCall"
  | "AlreadyInitialized"
  | "NotInitialized";

export type PolicyCode =
  | "LeverageTooLow"
  | "LeverageTooHigh"
  | "ImbalanceLimitReached"
  | "EmptyVault"
  | "InvalidLongExpo"
  | "LiquidationPriceSafetyMargin"
  | "LongPositionTooSmall"
  | "InvalidLiquidationPrice"
  | "InitAmountTooLow";

export type ArithmeticCode =
  | "Overflow"
  | "Underflow"
  | "DivisionByZero"
  | "MultiplierUnderflow"
  | "HugeUintDivisionFailed"
  | "TickOutOfRange"
  | "PriceOutOfRange";

export type OracleCode = "InsufficientFee" | "InvalidPriceData" | "PriceTooOld" | "PriceTooRecent";

export type ProtocolErrorCode = PreconditionCode | PolicyCode | ArithmeticCode | OracleCode;

export class ProtocolError extends Error {
  constructor(
    readonly code: ProtocolErrorCode,
    message?: string,
  ) {
    super(message ? `${code}: ${message}` : code);
    this.name = new.target.name;
  }
}

/**
 * Zero amounts, stale references, duplicate pending actions and the like.
 */
export class PreconditionError extends ProtocolError {
  constructor(
    override readonly code: PreconditionCode,
    message?: string,
  ) {
    super(code, message);
  }
}

/**
 * A configured bound was crossed. `value` is the offending computed value.
 */
export class PolicyError extends ProtocolError {
  constructor(
    override readonly code: PolicyCode,
    readonly value: bigint,
    readonly limit?: bigint,
  ) {
    super(code, limit === undefined ? `value ${value}` : `value ${value}, limit ${limit}`);
  }
}

export class ArithmeticError extends ProtocolError {
  constructor(
    override readonly code: ArithmeticCode,
    message?: string,
  ) {
    super(code, message);
  }
}

export class OracleError extends ProtocolError {
  constructor(
    override readonly code: OracleCode,
    message?: string,
  ) {
    super(code, message);
  }
}
