import { OracleError } from "../errors.js";
import { decodePriceData, type PriceRecord } from "../abi/priceData.js";
import { ProtocolAction, type Address } from "../engine/types.js";

export type ValidatedPrice = PriceRecord;

export interface Oracle {
  /** receiver of validation fees */
  readonly address: Address;
  validationCost(priceData: Uint8Array, action: ProtocolAction): bigint;
  /**
   * Validates `priceData` for `action`. Initiating actions pass the current
   * time as `targetTimestamp`; validations pass the timestamp of the pending
   * action.
   */
  getValidatedPrice(
    action: ProtocolAction,
    targetTimestamp: bigint,
    priceData: Uint8Array,
    fee: bigint,
  ): ValidatedPrice;
}

export interface PriceDataOracleParams {
  address: Address;
  /** fee per price update, in native currency */
  fee: bigint;
  /** oldest accepted price for an initiating action, in seconds */
  maxPriceAge: bigint;
  /** validation prices must be at least this much newer than the action */
  validationDelay: bigint;
  /**
   * end of the low-latency window: until then a validation may use any price
   * in [action + validationDelay, action + lowLatencyDelay], afterwards only
   * the price at action + lowLatencyDelay
   */
  lowLatencyDelay: bigint;
}

function isValidation(action: ProtocolAction): boolean {
  return (
    action === ProtocolAction.ValidateDeposit ||
    action === ProtocolAction.ValidateWithdrawal ||
    action === ProtocolAction.ValidateOpenPosition ||
    action === ProtocolAction.ValidateClosePosition
  );
}

/**
 * Accepts self-describing price records (see abi/priceData) and checks their
 * age against the ledger clock. A validation price is tied to the pending
 * action's own timestamp, so whoever validates cannot pick the moment.
 */
export class PriceDataOracle implements Oracle {
  readonly address: Address;

  constructor(
    private readonly params: PriceDataOracleParams,
    private readonly clock: () => bigint,
  ) {
    this.address = params.address;
  }

  validationCost(_priceData: Uint8Array, _action: ProtocolAction): bigint {
    return this.params.fee;
  }

  getValidatedPrice(
    action: ProtocolAction,
    targetTimestamp: bigint,
    priceData: Uint8Array,
    fee: bigint,
  ): ValidatedPrice {
    const cost = this.validationCost(priceData, action);
    if (fee < cost) {
      throw new OracleError("InsufficientFee", `fee ${fee} is below validation cost ${cost}`);
    }
    const record = decodePriceData(priceData);
    if (record.price === 0n) {
      throw new OracleError("InvalidPriceData", "price is zero");
    }
    const now = this.clock();
    if (record.timestamp > now) {
      throw new OracleError("PriceTooRecent", `price at ${record.timestamp} is after now (${now})`);
    }
    if (isValidation(action)) {
      const { earliest, latest } = this.validationWindow(targetTimestamp);
      if (record.timestamp < earliest) {
        throw new OracleError("PriceTooOld", `price at ${record.timestamp}, expected at least ${earliest}`);
      }
      if (record.timestamp > latest) {
        throw new OracleError("PriceTooRecent", `price at ${record.timestamp}, expected at most ${latest}`);
      }
    } else if (record.timestamp + this.params.maxPriceAge < targetTimestamp) {
      throw new OracleError("PriceTooOld", `price at ${record.timestamp} is older than ${this.params.maxPriceAge}s`);
    }
    return record;
  }

  /**
   * Price timestamps accepted now for validating an action initiated at
   * `actionTimestamp`.
   */
  validationWindow(actionTimestamp: bigint): { earliest: bigint; latest: bigint } {
    const end = actionTimestamp + this.params.lowLatencyDelay;
    if (this.clock() <= end) {
      return { earliest: actionTimestamp + this.params.validationDelay, latest: end };
    }
    return { earliest: end, latest: end };
  }

  /**
   * Latest price timestamp a validation of an action at `actionTimestamp`
   * may carry right now.
   */
  validationTimestamp(actionTimestamp: bigint): bigint {
    const { earliest, latest } = this.validationWindow(actionTimestamp);
    const now = this.clock();
    if (now < earliest) return earliest;
    return now < latest ? now : latest;
  }
}
