import { PublicKey } from "@solana/web3.js";
import { PolicyError, PreconditionError } from "../errors.js";
import { ASSET_DECIMALS, BPS_DIVISOR, MIN_USDN_SUPPLY, WAD } from "../constants.js";
import { parseConfig, type ProtocolConfig, type ProtocolConfigInput } from "../config.js";
import { checkedSub, clamp, min, mulDiv } from "../math/fixedPoint.js";
import type { ElasticToken } from "../collaborators/elasticToken.js";
import type { Oracle, ValidatedPrice } from "../collaborators/oracle.js";
import type { Rebalancer } from "../collaborators/rebalancer.js";
import type { Checkpointable, Ledger } from "../runtime/ledger.js";
import { DEAD_ADDRESS, deriveCustody, deriveTreasury } from "../solana/pda.js";
import { applyPnlAndFunding, funding, vaultAssetAvailable, type FundingResult } from "./funding.js";
import {
  checkCloseImbalance,
  checkDepositImbalance,
  checkOpenImbalance,
  checkWithdrawalImbalance,
  vaultImbalanceBps,
  type ExposureSnapshot,
} from "./imbalance.js";
import { effectivePrice, tickForPrice } from "./liquidationMultiplier.js";
import {
  getLeverage,
  liquidationPriceForLeverage,
  longTradingExpo,
  positionTotalExpo,
  positionValue,
} from "./longMath.js";
import {
  addPendingAction,
  getActionablePendingAction,
  getActionablePendingActions,
  getPendingActionAt,
  getUserPendingAction,
  isExpired,
  removePendingAction,
  type ActionabilityWindows,
  type QueuedAction,
} from "./pendingQueue.js";
import { maybeRebase, usdnPrice } from "./rebase.js";
import { createInitialState, type ProtocolState } from "./state.js";
import {
  getPosition,
  getTickData,
  getTickVersion,
  highestPopulatedTick,
  isStale,
  liquidateBucketsUpTo,
  registerPosition,
  removePosition,
  tickLiquidationPenalty,
  updatePositionExpo,
  type LiquidationOutcome,
} from "./tickLadder.js";
import {
  EMPTY_PREVIOUS_ACTIONS_DATA,
  ProtocolAction,
  type Address,
  type ClosePendingAction,
  type DepositPendingAction,
  type LiqTickInfo,
  type OpenPendingAction,
  type PendingAction,
  type Position,
  type PositionId,
  type PreviousActionsData,
  type ProtocolEvent,
  type TickData,
  type WithdrawalPendingAction,
} from "./types.js";

export interface ProtocolDeps {
  ledger: Ledger;
  oracle: Oracle;
  usdn: ElasticToken;
  owner: PublicKey;
  config: ProtocolConfig;
  rebalancer?: Rebalancer;
}

export interface CallOptions {
  priceData: Uint8Array;
  /** price data for other users' actionable actions, by raw queue index */
  previousActionsData?: PreviousActionsData;
  /** native currency sent along: security deposit plus oracle fees; the rest is refunded */
  value?: bigint;
}

export interface InitializeArgs {
  depositAmount: bigint;
  longAmount: bigint;
  desiredLiqPrice: bigint;
  priceData: Uint8Array;
  value?: bigint;
}

export interface InitiateDepositArgs extends CallOptions {
  amount: bigint;
  to?: PublicKey;
  validator?: PublicKey;
}

export interface InitiateWithdrawalArgs extends CallOptions {
  shares: bigint;
  to?: PublicKey;
  validator?: PublicKey;
}

export interface InitiateOpenPositionArgs extends CallOptions {
  amount: bigint;
  desiredLiqPrice: bigint;
  to?: PublicKey;
  validator?: PublicKey;
}

export interface InitiateClosePositionArgs extends CallOptions {
  posId: PositionId;
  amountToClose: bigint;
  to?: PublicKey;
  validator?: PublicKey;
}

export interface ValidateActionablePendingActionsArgs {
  previousActionsData: PreviousActionsData;
  maxValidations: number;
  value?: bigint;
}

export interface InitiateOpenPositionResult {
  initiated: boolean;
  posId: PositionId | undefined;
}

export interface PositionView {
  position: Position;
  liquidationPenalty: number;
  liqPrice: bigint;
  liqPriceWithoutPenalty: bigint;
}

export interface Balances {
  balanceLong: bigint;
  balanceVault: bigint;
  pendingBalanceVault: bigint;
  escrowedAssets: bigint;
  pendingProtocolFee: bigint;
  totalFeesSkimmed: bigint;
  shortfall: bigint;
}

export interface FundingState {
  lastFunding: bigint;
  lastUpdateTimestamp: bigint;
  lastPrice: bigint;
  ema: bigint;
}

interface CallContext {
  caller: Address;
  /** native currency still held for the caller */
  budget: bigint;
}

type ValidationOutcome = "validated" | "stale" | "pending";

interface TickPlan {
  tick: number;
  tickWithoutPenalty: number;
  liquidationPenalty: number;
  liqPrice: bigint;
  liqPriceWithoutPenalty: bigint;
}

const IMMUTABLE_KEYS = ["programId", "tickSpacing"] as const;

const VALIDATION_OF = {
  [ProtocolAction.ValidateDeposit]: "validateDeposit",
  [ProtocolAction.ValidateWithdrawal]: "validateWithdrawal",
  [ProtocolAction.ValidateOpenPosition]: "validateOpenPosition",
  [ProtocolAction.ValidateClosePosition]: "validateClosePosition",
} as const;

/**
 * Vault of the reference asset backing an elastic-supply token, with
 * tick-indexed leveraged longs on the other side.
 *
 * Each user action is two calls: an initiate that records a pending action
 * and a validate, at least `validationDelay` later, priced at the timestamp
 * of the initiate. Every entry point first validates one actionable action of
 * another user, then brings balances to the submitted price, liquidates, and
 * only then performs its own effect.
 */
export class TickVaultProtocol implements Checkpointable<ProtocolState> {
  readonly custody: Address;
  readonly owner: Address;

  private state: ProtocolState;
  private inCall = false;
  private readonly ledger: Ledger;
  private readonly oracle: Oracle;
  private readonly usdn: ElasticToken;
  private readonly rebalancer: Rebalancer | undefined;

  constructor(deps: ProtocolDeps) {
    this.ledger = deps.ledger;
    this.oracle = deps.oracle;
    this.usdn = deps.usdn;
    this.rebalancer = deps.rebalancer;
    this.owner = deps.owner.toBase58();

    const programId = new PublicKey(deps.config.programId);
    this.custody = deriveCustody(programId)[0].toBase58();
    const feeCollector = deps.config.feeCollector ?? deriveTreasury(programId)[0].toBase58();
    this.state = createInitialState(deps.config, feeCollector);
    this.rebalancer?.notifyMinDepositChanged(deps.config.minLongPosition);

    this.ledger.register(this);
  }

  /* ---------------------------------------------------------------- */
  /* Ledger plumbing                                                  */
  /* ---------------------------------------------------------------- */

  checkpoint(): ProtocolState {
    return structuredClone(this.state);
  }

  restore(snapshot: ProtocolState): void {
    this.state = snapshot;
  }

  private run<T>(caller: PublicKey, value: bigint, fn: (ctx: CallContext) => T): T {
    if (this.inCall) {
      throw new PreconditionError("ReentrantCall", "the protocol is already executing a call");
    }
    return this.ledger.execute(() => {
      this.inCall = true;
      try {
        const ctx: CallContext = { caller: caller.toBase58(), budget: value };
        if (value > 0n) this.ledger.native.transfer(ctx.caller, this.custody, value);
        const result = fn(ctx);
        if (ctx.budget > 0n) this.ledger.native.transfer(this.custody, ctx.caller, ctx.budget);
        return result;
      } finally {
        this.inCall = false;
      }
    });
  }

  private emit(event: ProtocolEvent): void {
    this.ledger.events.emit(this.ledger.timestamp(), event);
  }

  private get config(): ProtocolConfig {
    return this.state.config;
  }

  private now(): bigint {
    return this.ledger.timestamp();
  }

  private windows(): ActionabilityWindows {
    return {
      lowLatencyDelay: this.config.lowLatencyDelay,
      lowLatencyValidatorDeadline: this.config.lowLatencyValidatorDeadline,
      onChainValidatorDeadline: this.config.onChainValidatorDeadline,
      pendingActionExpiry: this.config.pendingActionExpiry,
    };
  }

  private exposure(): ExposureSnapshot {
    return {
      totalExpo: this.state.ladder.totalExpo,
      balanceLong: this.state.balanceLong,
      balanceVault: this.state.balanceVault,
      pendingBalanceVault: this.state.pendingBalanceVault,
    };
  }

  private requireInitialized(): void {
    if (!this.state.initialized) throw new PreconditionError("NotInitialized");
  }

  private requireOwner(caller: Address): void {
    if (caller !== this.owner) throw new PreconditionError("Unauthorized", `${caller} is not the owner`);
  }

  /* ---------------------------------------------------------------- */
  /* Shared steps                                                     */
  /* ---------------------------------------------------------------- */

  private validatePrice(
    ctx: CallContext,
    action: ProtocolAction,
    targetTimestamp: bigint,
    priceData: Uint8Array,
  ): ValidatedPrice {
    const price = this.oracle.getValidatedPrice(action, targetTimestamp, priceData, ctx.budget);
    const cost = this.oracle.validationCost(priceData, action);
    if (cost > 0n) {
      this.ledger.native.transfer(this.custody, this.oracle.address, cost);
      ctx.budget -= cost;
    }
    return price;
  }

  private takeSecurityDeposit(ctx: CallContext): bigint {
    const required = this.config.securityDepositValue;
    if (ctx.budget < required) {
      throw new PreconditionError("SecurityDepositTooLow", `sent ${ctx.budget}, need ${required}`);
    }
    ctx.budget -= required;
    return required;
  }

  /**
   * Signed transfer between the two sides; a negative amount moves value
   * from the vault to the long side. Whatever a side cannot cover is
   * recorded as shortfall.
   */
  private moveLongToVault(amount: bigint): void {
    const s = this.state;
    if (amount >= 0n) {
      const moved = min(amount, s.balanceLong);
      s.balanceLong -= moved;
      s.balanceVault += moved;
      s.shortfall += amount - moved;
    } else {
      const moved = min(-amount, s.balanceVault);
      s.balanceVault -= moved;
      s.balanceLong += moved;
      s.shortfall += -amount - moved;
    }
  }

  /**
   * Splits a fee between the vault and the protocol.
   */
  private collectFee(fee: bigint): void {
    const protocolFee = mulDiv(fee, BigInt(this.config.protocolFeeBps), BPS_DIVISOR);
    this.state.balanceVault += fee - protocolFee;
    this.state.pendingProtocolFee += protocolFee;
    this.state.totalFeesSkimmed += protocolFee;
  }

  private adjustedPrice(price: bigint): bigint {
    return price + mulDiv(price, BigInt(this.config.positionFeeBps), BPS_DIVISOR);
  }

  private planTick(desiredLiqPrice: bigint): TickPlan {
    const { ladder, liquidationMultiplier } = this.state;
    const tickWithoutPenalty = tickForPrice(desiredLiqPrice, liquidationMultiplier, ladder.tickSpacing);
    const liquidationPenalty = tickLiquidationPenalty(
      ladder,
      tickWithoutPenalty + this.config.liquidationPenalty,
      this.config.liquidationPenalty,
    );
    const tick = tickWithoutPenalty + liquidationPenalty;
    return {
      tick,
      tickWithoutPenalty,
      liquidationPenalty,
      liqPrice: effectivePrice(tick, liquidationMultiplier),
      liqPriceWithoutPenalty: effectivePrice(tickWithoutPenalty, liquidationMultiplier),
    };
  }

  private checkLeverage(startPrice: bigint, liqPriceWithoutPenalty: bigint): bigint {
    const leverage = getLeverage(startPrice, liqPriceWithoutPenalty);
    if (leverage < this.config.minLeverage) {
      throw new PolicyError("LeverageTooLow", leverage, this.config.minLeverage);
    }
    if (leverage > this.config.maxLeverage) {
      throw new PolicyError("LeverageTooHigh", leverage, this.config.maxLeverage);
    }
    return leverage;
  }

  private checkSafetyMargin(price: bigint, liqPrice: bigint): void {
    const maxLiqPrice = mulDiv(price, BPS_DIVISOR - BigInt(this.config.safetyMarginBps), BPS_DIVISOR);
    if (liqPrice >= maxLiqPrice) {
      throw new PolicyError("LiquidationPriceSafetyMargin", liqPrice, maxLiqPrice);
    }
  }

  /**
   * Funding, PnL and liquidations up to `price`. Liquidated buckets pay
   * rewards to the caller and may wake the rebalancer. Buckets are only
   * liquidated at a price the balances reflect: one just applied, or the
   * last applied price at its own timestamp.
   */
  private settle(ctx: CallContext, price: ValidatedPrice): LiquidationOutcome {
    const { applied } = applyPnlAndFunding(this.state, price.price, price.timestamp);
    const recent =
      applied || (price.timestamp === this.state.lastUpdateTimestamp && price.price === this.state.lastPrice);
    if (!recent) return { liquidatedTicks: [], isLiquidationPending: false };

    const outcome = liquidateBucketsUpTo(
      this.state.ladder,
      price.price,
      this.state.liquidationMultiplier,
      this.config.liquidationIteration,
    );
    if (outcome.liquidatedTicks.length > 0) {
      this.settleLiquidatedTicks(ctx, price.price, outcome.liquidatedTicks);
      this.triggerRebalancer(price.price);
    }
    return outcome;
  }

  private settleLiquidatedTicks(ctx: CallContext, price: bigint, ticks: LiqTickInfo[]): void {
    let rewardBase = 0n;
    for (const info of ticks) {
      this.moveLongToVault(info.remainingCollateral);
      if (info.remainingCollateral > 0n) rewardBase += info.remainingCollateral;
      this.emit({
        type: "LiquidatedTick",
        tick: info.tick,
        tickVersion: info.tickVersion,
        liquidationPrice: price,
        effectiveTickPrice: info.tickPrice,
        remainingCollateral: info.remainingCollateral,
      });
    }
    const rewards = min(
      mulDiv(rewardBase, BigInt(this.config.liquidationRewardsBps), BPS_DIVISOR),
      this.state.balanceVault,
    );
    if (rewards > 0n) {
      this.state.balanceVault -= rewards;
      this.ledger.asset.transfer(this.custody, ctx.caller, rewards);
      this.emit({ type: "LiquidatorRewarded", liquidator: ctx.caller, rewards });
    }
  }

  /**
   * When liquidations leave the vault too heavy, the rebalancer's pooled
   * assets (and its previous position) become one new long at its leverage.
   */
  private triggerRebalancer(price: bigint): void {
    const limit = this.config.rebalancerCloseExpoImbalanceLimitBps;
    if (this.rebalancer === undefined || limit === 0) return;
    const imbalance = vaultImbalanceBps(this.exposure());
    if (imbalance !== undefined && imbalance < BigInt(limit)) return;

    const data = this.rebalancer.getCurrentStateData();
    const s = this.state;
    let previousPosValue = 0n;
    if (data.currentPosId !== null && !isStale(s.ladder, data.currentPosId)) {
      const { position, liquidationPenalty } = getPosition(s.ladder, data.currentPosId);
      const liqPriceWithoutPenalty = effectivePrice(data.currentPosId.tick - liquidationPenalty, s.liquidationMultiplier);
      previousPosValue = clamp(positionValue(price, liqPriceWithoutPenalty, position.totalExpo), 0n, s.balanceLong);
      removePosition(s.ladder, data.currentPosId, position.amount, position.totalExpo);
      s.balanceLong -= previousPosValue;
    }

    const amount = previousPosValue + data.pendingAssets;
    if (amount === 0n) return;
    if (data.pendingAssets > 0n) {
      this.ledger.asset.transfer(this.rebalancer.address, this.custody, data.pendingAssets);
    }

    const plan = this.planTick(liquidationPriceForLeverage(price, data.maxLeverage));
    const totalExpo = positionTotalExpo(amount, price, plan.liqPriceWithoutPenalty);
    const newPosId = registerPosition(
      s.ladder,
      plan.tick,
      { validated: true, timestamp: this.now(), user: this.rebalancer.address, amount, totalExpo },
      plan.liquidationPenalty,
    );
    s.balanceLong += amount;
    this.rebalancer.updatePosition(newPosId, previousPosValue);
    this.emit({ type: "RebalancerTriggered", amount, newPosId, previousPosValue });
  }

  /**
   * Validates the first actionable action of someone other than the caller,
   * with the price data the caller supplied for its raw index.
   */
  private executePendingActionOrRevert(ctx: CallContext, data: PreviousActionsData): void {
    const queued = getActionablePendingAction(this.state.queue, ctx.caller, this.now(), this.windows());
    if (queued === undefined) return;
    const i = data.rawIndices.indexOf(queued.rawIndex);
    if (i < 0 || i >= data.priceData.length) {
      throw new PreconditionError("InvalidPendingActionData", `no price data for raw index ${queued.rawIndex}`);
    }
    this.validatePendingAction(ctx, queued, data.priceData[i]);
  }

  /**
   * Runs the validation of a queued action and, unless liquidations are
   * still pending, removes it and settles its security deposit.
   */
  private validatePendingAction(ctx: CallContext, queued: QueuedAction, priceData: Uint8Array): boolean {
    const { action, rawIndex } = queued;
    const price = this.validatePrice(ctx, action.action, action.timestamp, priceData);

    const outcome = this.dispatchValidation(ctx, action, price);
    if (outcome === "pending") return false;

    removePendingAction(this.state.queue, rawIndex, action.validator);
    if (outcome === "stale") {
      this.creditRefund(action.validator, action.securityDepositValue);
    } else if (action.securityDepositValue > 0n) {
      this.ledger.native.transfer(this.custody, ctx.caller, action.securityDepositValue);
    }
    return true;
  }

  private dispatchValidation(ctx: CallContext, action: PendingAction, price: ValidatedPrice): ValidationOutcome {
    switch (action.action) {
      case ProtocolAction.ValidateDeposit:
        return this.validateDepositAction(ctx, action, price);
      case ProtocolAction.ValidateWithdrawal:
        return this.validateWithdrawalAction(ctx, action, price);
      case ProtocolAction.ValidateOpenPosition:
        return this.validateOpenAction(ctx, action, price);
      case ProtocolAction.ValidateClosePosition:
        return this.validateCloseAction(ctx, action, price);
    }
  }

  private creditRefund(user: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.state.refunds.set(user, (this.state.refunds.get(user) ?? 0n) + amount);
  }

  /**
   * Rebase check and protocol fee flush, at the end of every state change.
   */
  private finish(forceRebase = false): void {
    const s = this.state;
    const now = this.now();
    const result = maybeRebase(this.usdn, {
      vaultBalance: s.balanceVault,
      assetPrice: s.lastPrice,
      assetDecimals: ASSET_DECIMALS,
      targetUsdnPrice: this.config.targetUsdnPrice,
      usdnRebaseThreshold: this.config.usdnRebaseThreshold,
      usdnRebaseInterval: this.config.usdnRebaseInterval,
      lastRebaseCheck: s.lastRebaseCheck,
      now,
      forceCheck: forceRebase,
    });
    if (result.rebased) {
      s.lastRebaseCheck = now;
      this.emit({ type: "Rebase", oldDivisor: result.oldDivisor, newDivisor: result.newDivisor });
    }

    if (s.pendingProtocolFee > 0n && s.pendingProtocolFee >= this.config.feeThreshold) {
      const amount = s.pendingProtocolFee;
      s.pendingProtocolFee = 0n;
      this.ledger.asset.transfer(this.custody, s.feeCollector, amount);
      this.emit({ type: "ProtocolFeeDistributed", feeCollector: s.feeCollector, amount });
    }
  }

  private target(key: PublicKey | undefined, fallback: Address): Address {
    if (key === undefined) return fallback;
    if (key.equals(PublicKey.default)) throw new PreconditionError("ZeroAddress");
    return key.toBase58();
  }

  /* ---------------------------------------------------------------- */
  /* Initialization                                                   */
  /* ---------------------------------------------------------------- */

  /**
   * Seeds the vault with `depositAmount` and opens the first long with
   * `longAmount`. Owner only, once.
   */
  initialize(caller: PublicKey, args: InitializeArgs): PositionId {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireOwner(ctx.caller);
      const s = this.state;
      if (s.initialized) throw new PreconditionError("AlreadyInitialized");
      if (args.depositAmount === 0n || args.longAmount === 0n) throw new PreconditionError("ZeroAmount");

      const price = this.validatePrice(ctx, ProtocolAction.Initialize, this.now(), args.priceData);
      const usdnAmount = mulDiv(args.depositAmount, price.price, WAD);
      if (usdnAmount <= MIN_USDN_SUPPLY) {
        throw new PolicyError("InitAmountTooLow", usdnAmount, MIN_USDN_SUPPLY);
      }

      const plan = this.planTick(args.desiredLiqPrice);
      this.checkLeverage(price.price, plan.liqPriceWithoutPenalty);
      this.checkSafetyMargin(price.price, plan.liqPrice);
      const totalExpo = positionTotalExpo(args.longAmount, price.price, plan.liqPriceWithoutPenalty);

      this.ledger.asset.transfer(ctx.caller, this.custody, args.depositAmount + args.longAmount);
      s.balanceVault = args.depositAmount;
      s.balanceLong = args.longAmount;
      s.lastPrice = price.price;
      s.lastUpdateTimestamp = price.timestamp;
      s.lastRebaseCheck = this.now();

      this.usdn.mint(DEAD_ADDRESS.toBase58(), MIN_USDN_SUPPLY);
      this.usdn.mint(ctx.caller, usdnAmount - MIN_USDN_SUPPLY);

      const posId = registerPosition(
        s.ladder,
        plan.tick,
        { validated: true, timestamp: this.now(), user: ctx.caller, amount: args.longAmount, totalExpo },
        plan.liquidationPenalty,
      );
      s.initialized = true;
      this.emit({ type: "Initialized", depositAmount: args.depositAmount, longAmount: args.longAmount, posId });
      return posId;
    });
  }

  /* ---------------------------------------------------------------- */
  /* Vault side                                                       */
  /* ---------------------------------------------------------------- */

  initiateDeposit(caller: PublicKey, args: InitiateDepositArgs): boolean {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireInitialized();
      if (args.amount === 0n) throw new PreconditionError("ZeroAmount");
      const to = this.target(args.to, ctx.caller);
      const validator = this.target(args.validator, ctx.caller);
      const securityDeposit = this.takeSecurityDeposit(ctx);

      this.executePendingActionOrRevert(ctx, args.previousActionsData ?? EMPTY_PREVIOUS_ACTIONS_DATA);
      const price = this.validatePrice(ctx, ProtocolAction.InitiateDeposit, this.now(), args.priceData);
      if (this.settle(ctx, price).isLiquidationPending) {
        ctx.budget += securityDeposit;
        this.finish();
        return false;
      }

      const s = this.state;
      checkDepositImbalance(this.exposure(), this.config.depositExpoImbalanceLimitBps, args.amount);
      this.ledger.asset.transfer(ctx.caller, this.custody, args.amount);
      s.pendingBalanceVault += args.amount;
      s.escrowedAssets += args.amount;

      addPendingAction(s.queue, validator, {
        action: ProtocolAction.ValidateDeposit,
        timestamp: this.now(),
        to,
        validator,
        securityDepositValue: securityDeposit,
        amount: args.amount,
        assetPrice: price.price,
        totalExpo: s.ladder.totalExpo,
        balanceVault: s.balanceVault,
        balanceLong: s.balanceLong,
        usdnTotalShares: this.usdn.totalShares(),
      });
      this.emit({ type: "InitiatedDeposit", to, validator, amount: args.amount, timestamp: this.now() });
      this.finish();
      return true;
    });
  }

  /**
   * Shares for `amount` at a vault/share ratio; an empty side mints at the
   * asset price.
   */
  private sharesFor(amount: bigint, vaultBalance: bigint, totalShares: bigint, price: bigint): bigint {
    if (vaultBalance > 0n && totalShares > 0n) return mulDiv(amount, totalShares, vaultBalance);
    return mulDiv(amount, price, WAD) * this.usdn.divisor();
  }

  private validateDepositAction(
    ctx: CallContext,
    action: DepositPendingAction,
    price: ValidatedPrice,
  ): ValidationOutcome {
    if (this.settle(ctx, price).isLiquidationPending) return "pending";
    const s = this.state;
    s.escrowedAssets -= action.amount;
    s.pendingBalanceVault -= action.amount;

    const fee = mulDiv(action.amount, BigInt(this.config.vaultFeeBps), BPS_DIVISOR);
    const net = action.amount - fee;
    const vaultThen = vaultAssetAvailable(
      action.totalExpo,
      action.balanceVault,
      action.balanceLong,
      price.price,
      action.assetPrice,
    );
    const shares = min(
      this.sharesFor(net, vaultThen, action.usdnTotalShares, price.price),
      this.sharesFor(net, s.balanceVault, this.usdn.totalShares(), price.price),
    );

    s.balanceVault += net;
    this.collectFee(fee);
    this.usdn.mintShares(action.to, shares);
    this.emit({
      type: "ValidatedDeposit",
      to: action.to,
      validator: action.validator,
      amount: action.amount,
      usdnShares: shares,
    });
    return "validated";
  }

  initiateWithdrawal(caller: PublicKey, args: InitiateWithdrawalArgs): boolean {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireInitialized();
      if (args.shares === 0n) throw new PreconditionError("ZeroAmount");
      const to = this.target(args.to, ctx.caller);
      const validator = this.target(args.validator, ctx.caller);
      const securityDeposit = this.takeSecurityDeposit(ctx);

      this.executePendingActionOrRevert(ctx, args.previousActionsData ?? EMPTY_PREVIOUS_ACTIONS_DATA);
      const price = this.validatePrice(ctx, ProtocolAction.InitiateWithdrawal, this.now(), args.priceData);
      if (this.settle(ctx, price).isLiquidationPending) {
        ctx.budget += securityDeposit;
        this.finish();
        return false;
      }

      const s = this.state;
      const totalShares = this.usdn.totalShares();
      const estimate = mulDiv(args.shares, s.balanceVault, totalShares);
      checkWithdrawalImbalance(this.exposure(), this.config.withdrawalExpoImbalanceLimitBps, estimate);
      this.usdn.transferShares(ctx.caller, this.custody, args.shares);
      s.pendingBalanceVault -= estimate;

      addPendingAction(s.queue, validator, {
        action: ProtocolAction.ValidateWithdrawal,
        timestamp: this.now(),
        to,
        validator,
        securityDepositValue: securityDeposit,
        sharesAmount: args.shares,
        assetPrice: price.price,
        totalExpo: s.ladder.totalExpo,
        balanceVault: s.balanceVault,
        balanceLong: s.balanceLong,
        usdnTotalShares: totalShares,
      });
      this.emit({ type: "InitiatedWithdrawal", to, validator, shares: args.shares, timestamp: this.now() });
      this.finish();
      return true;
    });
  }

  private withdrawalEstimate(action: WithdrawalPendingAction): bigint {
    return mulDiv(action.sharesAmount, action.balanceVault, action.usdnTotalShares);
  }

  private validateWithdrawalAction(
    ctx: CallContext,
    action: WithdrawalPendingAction,
    price: ValidatedPrice,
  ): ValidationOutcome {
    if (this.settle(ctx, price).isLiquidationPending) return "pending";
    const s = this.state;
    s.pendingBalanceVault += this.withdrawalEstimate(action);

    const vaultThen = vaultAssetAvailable(
      action.totalExpo,
      action.balanceVault,
      action.balanceLong,
      price.price,
      action.assetPrice,
    );
    const assets = min(
      mulDiv(action.sharesAmount, vaultThen, action.usdnTotalShares),
      mulDiv(action.sharesAmount, s.balanceVault, this.usdn.totalShares()),
    );
    const fee = mulDiv(assets, BigInt(this.config.vaultFeeBps), BPS_DIVISOR);
    const payout = assets - fee;

    s.balanceVault = checkedSub(s.balanceVault, assets, "balanceVault");
    this.collectFee(fee);
    this.usdn.burnShares(this.custody, action.sharesAmount);
    this.ledger.asset.transfer(this.custody, action.to, payout);
    this.emit({
      type: "ValidatedWithdrawal",
      to: action.to,
      validator: action.validator,
      assetAmount: payout,
      shares: action.sharesAmount,
    });
    return "validated";
  }

  /* ---------------------------------------------------------------- */
  /* Long side                                                        */
  /* ---------------------------------------------------------------- */

  /**
   * Registers the position right away so it can be liquidated while it
   * waits for validation.
   */
  initiateOpenPosition(caller: PublicKey, args: InitiateOpenPositionArgs): InitiateOpenPositionResult {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireInitialized();
      if (args.amount === 0n) throw new PreconditionError("ZeroAmount");
      if (args.amount < this.config.minLongPosition) {
        throw new PolicyError("LongPositionTooSmall", args.amount, this.config.minLongPosition);
      }
      const to = this.target(args.to, ctx.caller);
      const validator = this.target(args.validator, ctx.caller);
      const securityDeposit = this.takeSecurityDeposit(ctx);

      this.executePendingActionOrRevert(ctx, args.previousActionsData ?? EMPTY_PREVIOUS_ACTIONS_DATA);
      const price = this.validatePrice(ctx, ProtocolAction.InitiateOpenPosition, this.now(), args.priceData);
      if (this.settle(ctx, price).isLiquidationPending) {
        ctx.budget += securityDeposit;
        this.finish();
        return { initiated: false, posId: undefined };
      }

      const s = this.state;
      const startPrice = this.adjustedPrice(price.price);
      const plan = this.planTick(args.desiredLiqPrice);
      this.checkSafetyMargin(price.price, plan.liqPrice);
      const leverage = this.checkLeverage(startPrice, plan.liqPriceWithoutPenalty);
      const totalExpo = positionTotalExpo(args.amount, startPrice, plan.liqPriceWithoutPenalty);
      checkOpenImbalance(this.exposure(), this.config.openExpoImbalanceLimitBps, args.amount, totalExpo);

      this.ledger.asset.transfer(ctx.caller, this.custody, args.amount);
      const posId = registerPosition(
        s.ladder,
        plan.tick,
        { validated: false, timestamp: this.now(), user: to, amount: args.amount, totalExpo },
        plan.liquidationPenalty,
      );
      const value = clamp(positionValue(price.price, plan.liqPriceWithoutPenalty, totalExpo), 0n, args.amount);
      s.balanceLong += value;
      this.collectFee(args.amount - value);

      addPendingAction(s.queue, validator, {
        action: ProtocolAction.ValidateOpenPosition,
        timestamp: this.now(),
        to,
        validator,
        securityDepositValue: securityDeposit,
        tick: posId.tick,
        tickVersion: posId.tickVersion,
        index: posId.index,
        startPrice,
      });
      this.emit({
        type: "InitiatedOpenPosition",
        owner: to,
        validator,
        posId,
        amount: args.amount,
        leverage,
        startPrice,
        totalExpo,
      });
      this.finish();
      return { initiated: true, posId };
    });
  }

  private validateOpenAction(ctx: CallContext, action: OpenPendingAction, price: ValidatedPrice): ValidationOutcome {
    if (this.settle(ctx, price).isLiquidationPending) return "pending";
    const s = this.state;
    const posId: PositionId = { tick: action.tick, tickVersion: action.tickVersion, index: action.index };
    // liquidated while waiting, possibly by the settlement above
    if (isStale(s.ladder, posId)) {
      this.emit({ type: "StalePendingActionRemoved", validator: action.validator, posId });
      return "stale";
    }

    const { position, liquidationPenalty } = getPosition(s.ladder, posId);
    const liqPriceWithoutPenalty = effectivePrice(posId.tick - liquidationPenalty, s.liquidationMultiplier);
    const liqPrice = effectivePrice(posId.tick, s.liquidationMultiplier);

    if (price.price <= liqPrice) {
      const value = positionValue(price.price, liqPriceWithoutPenalty, position.totalExpo);
      removePosition(s.ladder, posId, position.amount, position.totalExpo);
      this.moveLongToVault(value);
      this.emit({
        type: "LiquidatedPosition",
        user: position.user,
        posId,
        liquidationPrice: price.price,
        effectiveTickPrice: liqPrice,
      });
      return "validated";
    }

    const startPrice = this.adjustedPrice(price.price);
    const oldValue = positionValue(price.price, liqPriceWithoutPenalty, position.totalExpo);
    let finalPosId = posId;
    let finalLiqPriceWithoutPenalty = liqPriceWithoutPenalty;
    let totalExpo: bigint;

    if (getLeverage(startPrice, liqPriceWithoutPenalty) > this.config.maxLeverage) {
      const plan = this.planTick(liquidationPriceForLeverage(startPrice, this.config.maxLeverage));
      totalExpo = positionTotalExpo(position.amount, startPrice, plan.liqPriceWithoutPenalty);
      const moved: Position = { ...position, validated: true, totalExpo };
      removePosition(s.ladder, posId, position.amount, position.totalExpo);
      finalPosId = registerPosition(s.ladder, plan.tick, moved, plan.liquidationPenalty);
      finalLiqPriceWithoutPenalty = plan.liqPriceWithoutPenalty;
      this.emit({ type: "LiquidationPriceUpdated", oldPosId: posId, newPosId: finalPosId });
    } else {
      totalExpo = positionTotalExpo(position.amount, startPrice, liqPriceWithoutPenalty);
      updatePositionExpo(s.ladder, posId, totalExpo);
      position.validated = true;
    }

    const newValue = positionValue(price.price, finalLiqPriceWithoutPenalty, totalExpo);
    this.moveLongToVault(oldValue - newValue);
    this.emit({
      type: "ValidatedOpenPosition",
      owner: position.user,
      validator: action.validator,
      posId: finalPosId,
      leverage: getLeverage(startPrice, finalLiqPriceWithoutPenalty),
      startPrice,
      totalExpo,
    });
    return "validated";
  }

  /**
   * Takes `amountToClose` out of the ladder at the current price; the value,
   * net of the position fee, waits in escrow for validation.
   */
  initiateClosePosition(caller: PublicKey, args: InitiateClosePositionArgs): boolean {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireInitialized();
      if (args.amountToClose === 0n) throw new PreconditionError("ZeroAmount");
      const to = this.target(args.to, ctx.caller);
      const validator = this.target(args.validator, ctx.caller);
      const securityDeposit = this.takeSecurityDeposit(ctx);

      this.executePendingActionOrRevert(ctx, args.previousActionsData ?? EMPTY_PREVIOUS_ACTIONS_DATA);
      const price = this.validatePrice(ctx, ProtocolAction.InitiateClosePosition, this.now(), args.priceData);
      if (this.settle(ctx, price).isLiquidationPending) {
        ctx.budget += securityDeposit;
        this.finish();
        return false;
      }

      const s = this.state;
      const { position, liquidationPenalty } = getPosition(s.ladder, args.posId);
      if (position.user !== ctx.caller) {
        throw new PreconditionError("Unauthorized", `position belongs to ${position.user}`);
      }
      if (!position.validated) throw new PreconditionError("PositionNotValidated");
      if (args.amountToClose > position.amount) {
        throw new PreconditionError("AmountToCloseTooHigh", `${args.amountToClose} > ${position.amount}`);
      }
      const originalAmount = position.amount;
      const remaining = originalAmount - args.amountToClose;
      if (remaining > 0n && remaining < this.config.minLongPosition) {
        throw new PolicyError("LongPositionTooSmall", remaining, this.config.minLongPosition);
      }

      const closeTotalExpo =
        remaining === 0n ? position.totalExpo : mulDiv(position.totalExpo, args.amountToClose, originalAmount);
      const liqPriceWithoutPenalty = effectivePrice(args.posId.tick - liquidationPenalty, s.liquidationMultiplier);
      const liqPrice = effectivePrice(args.posId.tick, s.liquidationMultiplier);
      const value = clamp(positionValue(price.price, liqPriceWithoutPenalty, closeTotalExpo), 0n, s.balanceLong);
      checkCloseImbalance(this.exposure(), this.config.closeExpoImbalanceLimitBps, value, closeTotalExpo);

      const totalExpoRemaining = position.totalExpo - closeTotalExpo;
      removePosition(s.ladder, args.posId, args.amountToClose, closeTotalExpo);
      const fee = mulDiv(value, BigInt(this.config.positionFeeBps), BPS_DIVISOR);
      s.balanceLong -= value;
      this.collectFee(fee);
      s.escrowedAssets += value - fee;

      addPendingAction(s.queue, validator, {
        action: ProtocolAction.ValidateClosePosition,
        timestamp: this.now(),
        to,
        validator,
        securityDepositValue: securityDeposit,
        tick: args.posId.tick,
        tickVersion: args.posId.tickVersion,
        index: args.posId.index,
        closeAmount: args.amountToClose,
        closePosTotalExpo: closeTotalExpo,
        closeLiqPriceWithoutPenalty: liqPriceWithoutPenalty,
        closeLiqPrice: liqPrice,
        closeBoundedPositionValue: value - fee,
      });
      this.emit({
        type: "InitiatedClosePosition",
        owner: ctx.caller,
        to,
        posId: args.posId,
        originalAmount,
        amountToClose: args.amountToClose,
        totalExpoRemaining,
      });
      this.finish();
      return true;
    });
  }

  private validateCloseAction(ctx: CallContext, action: ClosePendingAction, price: ValidatedPrice): ValidationOutcome {
    if (this.settle(ctx, price).isLiquidationPending) return "pending";
    const s = this.state;
    const posId: PositionId = { tick: action.tick, tickVersion: action.tickVersion, index: action.index };
    const escrow = action.closeBoundedPositionValue;
    s.escrowedAssets -= escrow;

    if (price.price <= action.closeLiqPrice) {
      s.balanceVault += escrow;
      this.emit({
        type: "LiquidatedPosition",
        user: action.to,
        posId,
        liquidationPrice: price.price,
        effectiveTickPrice: action.closeLiqPrice,
      });
      return "validated";
    }

    const value = positionValue(price.price, action.closeLiqPriceWithoutPenalty, action.closePosTotalExpo);
    const net = value - mulDiv(value, BigInt(this.config.positionFeeBps), BPS_DIVISOR);
    let payout: bigint;
    if (net > escrow) {
      const extra = min(net - escrow, s.balanceVault);
      s.balanceVault -= extra;
      payout = escrow + extra;
    } else {
      s.balanceVault += escrow - net;
      payout = net;
    }
    this.ledger.asset.transfer(this.custody, action.to, payout);
    this.emit({
      type: "ValidatedClosePosition",
      to: action.to,
      posId,
      amountReceived: payout,
      profit: payout - action.closeAmount,
    });
    return "validated";
  }

  /* ---------------------------------------------------------------- */
  /* Validation                                                       */
  /* ---------------------------------------------------------------- */

  private validateOwn(caller: PublicKey, kind: PendingAction["action"], args: CallOptions): boolean {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireInitialized();
      this.executePendingActionOrRevert(ctx, args.previousActionsData ?? EMPTY_PREVIOUS_ACTIONS_DATA);
      const own = getUserPendingAction(this.state.queue, ctx.caller);
      if (own === undefined) throw new PreconditionError("NoPendingAction", `${ctx.caller} has nothing to validate`);
      if (own.action.action !== kind) {
        throw new PreconditionError(
          "InvalidPendingAction",
          `pending action needs ${VALIDATION_OF[own.action.action]}, not ${VALIDATION_OF[kind]}`,
        );
      }
      const validated = this.validatePendingAction(ctx, own, args.priceData);
      this.finish();
      return validated;
    });
  }

  validateDeposit(caller: PublicKey, args: CallOptions): boolean {
    return this.validateOwn(caller, ProtocolAction.ValidateDeposit, args);
  }

  validateWithdrawal(caller: PublicKey, args: CallOptions): boolean {
    return this.validateOwn(caller, ProtocolAction.ValidateWithdrawal, args);
  }

  validateOpenPosition(caller: PublicKey, args: CallOptions): boolean {
    return this.validateOwn(caller, ProtocolAction.ValidateOpenPosition, args);
  }

  validateClosePosition(caller: PublicKey, args: CallOptions): boolean {
    return this.validateOwn(caller, ProtocolAction.ValidateClosePosition, args);
  }

  /**
   * Validates up to `maxValidations` actionable actions of other users, in
   * queue order. Stops at the first action without price data or blocked by
   * pending liquidations. Returns how many were validated.
   */
  validateActionablePendingActions(caller: PublicKey, args: ValidateActionablePendingActionsArgs): number {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireInitialized();
      let validated = 0;
      while (validated < args.maxValidations) {
        const queued = getActionablePendingAction(this.state.queue, ctx.caller, this.now(), this.windows());
        if (queued === undefined) break;
        const i = args.previousActionsData.rawIndices.indexOf(queued.rawIndex);
        if (i < 0 || i >= args.previousActionsData.priceData.length) break;
        if (!this.validatePendingAction(ctx, queued, args.previousActionsData.priceData[i])) break;
        validated += 1;
      }
      if (validated > 0) this.finish();
      return validated;
    });
  }

  /* ---------------------------------------------------------------- */
  /* Liquidation                                                      */
  /* ---------------------------------------------------------------- */

  liquidate(caller: PublicKey, args: { priceData: Uint8Array; value?: bigint }): LiqTickInfo[] {
    return this.run(caller, args.value ?? 0n, (ctx) => {
      this.requireInitialized();
      const price = this.validatePrice(ctx, ProtocolAction.Liquidation, this.now(), args.priceData);
      const { liquidatedTicks } = this.settle(ctx, price);
      this.finish(liquidatedTicks.length > 0);
      return liquidatedTicks;
    });
  }

  /* ---------------------------------------------------------------- */
  /* Security deposits and abandoned actions                          */
  /* ---------------------------------------------------------------- */

  /**
   * Clears an action nobody validated before it expired. Escrowed funds go
   * back to `to`; the security deposit is credited to the caller when the
   * caller is the action's validator and forfeited to the fee collector
   * otherwise.
   */
  removeExpiredPendingAction(caller: PublicKey, rawIndex: number): void {
    this.run(caller, 0n, (ctx) => {
      this.requireInitialized();
      const s = this.state;
      const action = getPendingActionAt(s.queue, rawIndex);
      if (action === undefined) throw new PreconditionError("NoPendingAction", `raw index ${rawIndex} is empty`);
      if (!isExpired(action, this.now(), this.windows())) {
        throw new PreconditionError(
          "PendingActionNotExpired",
          `expires at ${action.timestamp + this.config.pendingActionExpiry}`,
        );
      }

      switch (action.action) {
        case ProtocolAction.ValidateDeposit:
          s.escrowedAssets -= action.amount;
          s.pendingBalanceVault -= action.amount;
          this.ledger.asset.transfer(this.custody, action.to, action.amount);
          break;
        case ProtocolAction.ValidateWithdrawal:
          s.pendingBalanceVault += this.withdrawalEstimate(action);
          this.usdn.transferShares(this.custody, action.to, action.sharesAmount);
          break;
        case ProtocolAction.ValidateOpenPosition: {
          const posId = { tick: action.tick, tickVersion: action.tickVersion, index: action.index };
          if (!isStale(s.ladder, posId)) getPosition(s.ladder, posId).position.validated = true;
          break;
        }
        case ProtocolAction.ValidateClosePosition:
          s.escrowedAssets -= action.closeBoundedPositionValue;
          this.ledger.asset.transfer(this.custody, action.to, action.closeBoundedPositionValue);
          break;
      }
      removePendingAction(s.queue, rawIndex, action.validator);

      const forfeited = ctx.caller !== action.validator;
      if (!forfeited) {
        this.creditRefund(action.validator, action.securityDepositValue);
      } else if (action.securityDepositValue > 0n) {
        this.ledger.native.transfer(this.custody, s.feeCollector, action.securityDepositValue);
      }
      this.emit({ type: "ExpiredPendingActionRemoved", validator: action.validator, rawIndex, forfeited });
    });
  }

  refundSecurityDeposit(caller: PublicKey): bigint {
    return this.run(caller, 0n, (ctx) => {
      const s = this.state;
      if (s.queue.userIndex.has(ctx.caller)) {
        throw new PreconditionError("PendingActionAlreadyExists", "validate the pending action first");
      }
      const amount = s.refunds.get(ctx.caller) ?? 0n;
      if (amount === 0n) throw new PreconditionError("NothingToRefund");
      s.refunds.delete(ctx.caller);
      this.ledger.native.transfer(this.custody, ctx.caller, amount);
      this.emit({ type: "SecurityDepositRefunded", pendingActionValidator: ctx.caller, receiver: ctx.caller, amount });
      return amount;
    });
  }

  /* ---------------------------------------------------------------- */
  /* Ownership and admin                                              */
  /* ---------------------------------------------------------------- */

  transferPositionOwnership(caller: PublicKey, posId: PositionId, newOwner: PublicKey): void {
    this.run(caller, 0n, (ctx) => {
      this.requireInitialized();
      const { position } = getPosition(this.state.ladder, posId);
      if (position.user !== ctx.caller) {
        throw new PreconditionError("Unauthorized", `position belongs to ${position.user}`);
      }
      const next = this.target(newOwner, ctx.caller);
      position.user = next;
      this.emit({ type: "PositionOwnershipTransferred", posId, oldOwner: ctx.caller, newOwner: next });
    });
  }

  /**
   * Applies a partial config update after validating the result as a whole.
   * Existing buckets keep the liquidation penalty they were created with.
   */
  updateConfig(caller: PublicKey, changes: Partial<ProtocolConfigInput>): void {
    this.run(caller, 0n, (ctx) => {
      this.requireOwner(ctx.caller);
      const current = this.state.config;
      const next = parseConfig({ ...current, ...changes });
      for (const key of IMMUTABLE_KEYS) {
        if (next[key] !== current[key]) throw new Error(`Invalid config:\n${key}: cannot be changed`);
      }
      const keys = Object.keys(changes);
      this.state.config = next;
      if (next.feeCollector !== undefined) this.state.feeCollector = next.feeCollector;
      if (next.minLongPosition !== current.minLongPosition) {
        this.rebalancer?.notifyMinDepositChanged(next.minLongPosition);
      }
      this.emit({ type: "ConfigUpdated", keys });
    });
  }

  /* ---------------------------------------------------------------- */
  /* Views                                                            */
  /* ---------------------------------------------------------------- */

  getConfig(): ProtocolConfig {
    return { ...this.state.config };
  }

  isInitialized(): boolean {
    return this.state.initialized;
  }

  feeCollector(): Address {
    return this.state.feeCollector;
  }

  getBalances(): Balances {
    const s = this.state;
    return {
      balanceLong: s.balanceLong,
      balanceVault: s.balanceVault,
      pendingBalanceVault: s.pendingBalanceVault,
      escrowedAssets: s.escrowedAssets,
      pendingProtocolFee: s.pendingProtocolFee,
      totalFeesSkimmed: s.totalFeesSkimmed,
      shortfall: s.shortfall,
    };
  }

  totalExpo(): bigint {
    return this.state.ladder.totalExpo;
  }

  totalLongPositions(): number {
    return this.state.ladder.totalLongPositions;
  }

  longTradingExpo(): bigint {
    return longTradingExpo(this.state.ladder.totalExpo, this.state.balanceLong);
  }

  liquidationMultiplier(): bigint {
    return this.state.liquidationMultiplier;
  }

  getFundingState(): FundingState {
    const { lastFunding, lastUpdateTimestamp, lastPrice, ema } = this.state;
    return { lastFunding, lastUpdateTimestamp, lastPrice, ema };
  }

  /**
   * Funding between the last update and `timestamp`, without applying it.
   */
  funding(timestamp: bigint): FundingResult {
    return funding(this.state, timestamp, this.state.ema);
  }

  getPosition(posId: PositionId): PositionView {
    const { position, liquidationPenalty } = getPosition(this.state.ladder, posId);
    const m = this.state.liquidationMultiplier;
    return {
      position: { ...position },
      liquidationPenalty,
      liqPrice: effectivePrice(posId.tick, m),
      liqPriceWithoutPenalty: effectivePrice(posId.tick - liquidationPenalty, m),
    };
  }

  getTickData(tick: number): TickData | undefined {
    const data = getTickData(this.state.ladder, tick);
    return data && { ...data };
  }

  getTickVersion(tick: number): number {
    return getTickVersion(this.state.ladder, tick);
  }

  highestPopulatedTick(): number | undefined {
    return highestPopulatedTick(this.state.ladder);
  }

  effectivePriceForTick(tick: number): bigint {
    return effectivePrice(tick, this.state.liquidationMultiplier);
  }

  getUserPendingAction(user: PublicKey): QueuedAction | undefined {
    return getUserPendingAction(this.state.queue, user.toBase58());
  }

  /**
   * Actionable actions at `now`, in queue order; callers build
   * PreviousActionsData from these.
   */
  getActionablePendingActions(exclude?: PublicKey): QueuedAction[] {
    return getActionablePendingActions(this.state.queue, this.now(), this.windows(), exclude?.toBase58());
  }

  refundOf(user: PublicKey): bigint {
    return this.state.refunds.get(user.toBase58()) ?? 0n;
  }

  usdnPrice(assetPrice: bigint): bigint {
    return usdnPrice(this.state.balanceVault, assetPrice, this.usdn.totalSupply(), ASSET_DECIMALS);
  }

  /**
   * Deep copy of the whole state.
   */
  inspect(): ProtocolState {
    return structuredClone(this.state);
  }
}
