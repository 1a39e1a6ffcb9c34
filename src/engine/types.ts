/**
 * Base58 encoding of an account key. Ledger state keys users by string so
 * that the whole state stays structured-cloneable.
 */
export type Address = string;

export const ProtocolAction = {
  None: 0,
  Initialize: 1,
  InitiateDeposit: 2,
  ValidateDeposit: 3,
  InitiateWithdrawal: 4,
  ValidateWithdrawal: 5,
  InitiateOpenPosition: 6,
  ValidateOpenPosition: 7,
  InitiateClosePosition: 8,
  ValidateClosePosition: 9,
  Liquidation: 10,
} as const;

export type ProtocolAction = (typeof ProtocolAction)[keyof typeof ProtocolAction];

export function actionName(action: ProtocolAction): string {
  for (const [name, value] of Object.entries(ProtocolAction)) {
    if (value === action) return name;
  }
  return `Unknown(${action})`;
}

export interface PositionId {
  tick: number;
  tickVersion: number;
  index: number;
}

export interface Position {
  validated: boolean;
  timestamp: bigint;
  user: Address;
  amount: bigint;
  totalExpo: bigint;
}

export interface TickData {
  totalExpo: bigint;
  totalPos: number;
  /** penalty in ticks, captured when the bucket was first populated */
  liquidationPenalty: number;
}

interface PendingActionHeader {
  timestamp: bigint;
  to: Address;
  validator: Address;
  securityDepositValue: bigint;
}

export interface DepositPendingAction extends PendingActionHeader {
  action: typeof ProtocolAction.ValidateDeposit;
  amount: bigint;
  assetPrice: bigint;
  totalExpo: bigint;
  balanceVault: bigint;
  balanceLong: bigint;
  usdnTotalShares: bigint;
}

export interface WithdrawalPendingAction extends PendingActionHeader {
  action: typeof ProtocolAction.ValidateWithdrawal;
  sharesAmount: bigint;
  assetPrice: bigint;
  totalExpo: bigint;
  balanceVault: bigint;
  balanceLong: bigint;
  usdnTotalShares: bigint;
}

export interface OpenPendingAction extends PendingActionHeader {
  action: typeof ProtocolAction.ValidateOpenPosition;
  tick: number;
  tickVersion: number;
  index: number;
  startPrice: bigint;
}

export interface ClosePendingAction extends PendingActionHeader {
  action: typeof ProtocolAction.ValidateClosePosition;
  tick: number;
  tickVersion: number;
  index: number;
  closeAmount: bigint;
  closePosTotalExpo: bigint;
  closeLiqPriceWithoutPenalty: bigint;
  closeLiqPrice: bigint;
  closeBoundedPositionValue: bigint;
}

export type PendingAction =
  | DepositPendingAction
  | WithdrawalPendingAction
  | OpenPendingAction
  | ClosePendingAction;

export interface LiqTickInfo {
  tick: number;
  tickVersion: number;
  totalPositions: number;
  totalExpo: bigint;
  /** signed value left in the bucket at the liquidation price */
  remainingCollateral: bigint;
  tickPrice: bigint;
  priceWithoutPenalty: bigint;
}

/**
 * Price data for the actionable pending actions of other users, matched by
 * raw queue index.
 */
export interface PreviousActionsData {
  priceData: Uint8Array[];
  rawIndices: number[];
}

export const EMPTY_PREVIOUS_ACTIONS_DATA: PreviousActionsData = { priceData: [], rawIndices: [] };

export type ProtocolEvent =
  | { type: "Initialized"; depositAmount: bigint; longAmount: bigint; posId: PositionId }
  | { type: "InitiatedDeposit"; to: Address; validator: Address; amount: bigint; timestamp: bigint }
  | { type: "ValidatedDeposit"; to: Address; validator: Address; amount: bigint; usdnShares: bigint }
  | { type: "InitiatedWithdrawal"; to: Address; validator: Address; shares: bigint; timestamp: bigint }
  | { type: "ValidatedWithdrawal"; to: Address; validator: Address; assetAmount: bigint; shares: bigint }
  | {
      type: "InitiatedOpenPosition";
      owner: Address;
      validator: Address;
      posId: PositionId;
      amount: bigint;
      leverage: bigint;
      startPrice: bigint;
      totalExpo: bigint;
    }
  | {
      type: "ValidatedOpenPosition";
      owner: Address;
      validator: Address;
      posId: PositionId;
      leverage: bigint;
      startPrice: bigint;
      totalExpo: bigint;
    }
  | { type: "LiquidationPriceUpdated"; oldPosId: PositionId; newPosId: PositionId }
  | {
      type: "InitiatedClosePosition";
      owner: Address;
      to: Address;
      posId: PositionId;
      originalAmount: bigint;
      amountToClose: bigint;
      totalExpoRemaining: bigint;
    }
  | { type: "ValidatedClosePosition"; to: Address; posId: PositionId; amountReceived: bigint; profit: bigint }
  | { type: "LiquidatedTick"; tick: number; tickVersion: number; liquidationPrice: bigint; effectiveTickPrice: bigint; remainingCollateral: bigint }
  | { type: "LiquidatedPosition"; user: Address; posId: PositionId; liquidationPrice: bigint; effectiveTickPrice: bigint }
  | { type: "LiquidatorRewarded"; liquidator: Address; rewards: bigint }
  | { type: "StalePendingActionRemoved"; validator: Address; posId: PositionId }
  | { type: "ExpiredPendingActionRemoved"; validator: Address; rawIndex: number; forfeited: boolean }
  | { type: "SecurityDepositRefunded"; pendingActionValidator: Address; receiver: Address; amount: bigint }
  | { type: "PositionOwnershipTransferred"; posId: PositionId; oldOwner: Address; newOwner: Address }
  | { type: "ProtocolFeeDistributed"; feeCollector: Address; amount: bigint }
  | { type: "Rebase"; oldDivisor: bigint; newDivisor: bigint }
  | { type: "RebalancerTriggered"; amount: bigint; newPosId: PositionId; previousPosValue: bigint }
  | { type: "ConfigUpdated"; keys: string[] };
