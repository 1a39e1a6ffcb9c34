import { PublicKey } from "@solana/web3.js";
import { LEVERAGE_FACTOR, MIN_USDN_SUPPLY, WAD } from "../src/constants.js";
import { deploy } from "../src/runtime/deploy.js";
import { liquidationPriceForLeverage } from "../src/engine/longMath.js";
import { DEAD_ADDRESS } from "../src/solana/pda.js";
import { ProtocolAction, type PositionId, type PreviousActionsData } from "../src/engine/types.js";
import { encodePriceData } from "../src/abi/priceData.js";
import { OracleError, PolicyError, PreconditionError } from "../src/errors.js";
import type { Deployment } from "../src/runtime/deploy.js";
import {
  custodyCheck,
  fundedUser,
  INIT_TICK,
  INIT_TOTAL_EXPO,
  initialized,
  priceAt,
  QUIET,
  SECURITY_DEPOSIT,
  START,
} from "./fixtures.js";
import { assert, assertEq, expectError, expectThrow, lcg, randomBigInt } from "./helpers.js";

console.log("Testing protocol flows...\n");

const P2000 = 2000n * WAD;
const P2100 = 2100n * WAD;

function assertConserved(d: Deployment, msg: string): void {
  const { held, accounted } = custodyCheck(d);
  assertEq(held, accounted, `custody matches accounting: ${msg}`);
}

function previousActions(d: Deployment, caller: PublicKey, price: bigint): PreviousActionsData {
  const actionable = d.protocol.getActionablePendingActions(caller);
  return {
    priceData: actionable.map((a) => encodePriceData(price, d.oracle.validationTimestamp(a.action.timestamp))),
    rawIndices: actionable.map((a) => a.rawIndex),
  };
}

// Initialization
{
  const { d, initPosId } = initialized();
  const { protocol, ledger, usdn } = d;
  const owner = d.owner.toBase58();

  assert(protocol.isInitialized(), "initialized");
  assertEq(initPosId.tick, INIT_TICK, "first long tick");
  assertEq(initPosId.tickVersion, 0, "first long version");
  assertEq(protocol.totalExpo(), INIT_TOTAL_EXPO, "exposure of the first long");
  assertEq(protocol.getBalances().balanceVault, 10n * WAD, "vault seeded");
  assertEq(protocol.getBalances().balanceLong, 5n * WAD, "long seeded");
  assertEq(ledger.asset.balanceOf(protocol.custody), 15n * WAD, "custody holds both amounts");
  assertEq(usdn.balanceOf(DEAD_ADDRESS.toBase58()), MIN_USDN_SUPPLY, "dead supply");
  assertEq(usdn.balanceOf(owner), 20_000n * WAD - MIN_USDN_SUPPLY, "owner tokens");
  assertEq(protocol.usdnPrice(P2000), WAD, "token starts at 1.0");
  assertEq(protocol.getFundingState().lastUpdateTimestamp, START, "settled at the initialization price time");
  assertEq(ledger.events.ofType("Initialized").length, 1, "Initialized event");

  const init = { depositAmount: 10n * WAD, longAmount: 5n * WAD, desiredLiqPrice: 1000n * WAD, priceData: priceAt(d, P2000) };
  expectError(() => protocol.initialize(d.owner, init), "AlreadyInitialized", "second initialization");

  console.log("✓ initialize");
}

{
  const d = deploy({ config: QUIET, startTimestamp: START });
  const { protocol, ledger } = d;
  ledger.asset.mint(d.owner.toBase58(), 100n * WAD);
  const stranger = fundedUser(d);
  const priceData = priceAt(d, P2000);

  expectError(
    () => protocol.initiateDeposit(stranger, { amount: WAD, priceData, value: SECURITY_DEPOSIT }),
    "NotInitialized",
    "deposit before initialization",
  );
  expectError(
    () => protocol.initialize(stranger, { depositAmount: WAD, longAmount: WAD, desiredLiqPrice: 1000n * WAD, priceData }),
    "Unauthorized",
    "initialize by a stranger",
  );
  expectError(
    () => protocol.initialize(d.owner, { depositAmount: 0n, longAmount: WAD, desiredLiqPrice: 1000n * WAD, priceData }),
    "ZeroAmount",
    "empty vault",
  );
  expectError(
    () =>
      protocol.initialize(d.owner, {
        depositAmount: 1n,
        longAmount: WAD,
        desiredLiqPrice: 200n * WAD,
        priceData: priceAt(d, 500n * WAD),
      }),
    "InitAmountTooLow",
    "tokens minted must exceed the dead supply",
  );
  expectError(
    () => protocol.initialize(d.owner, { depositAmount: WAD, longAmount: WAD, desiredLiqPrice: 1990n * WAD, priceData }),
    "LeverageTooHigh",
    "first long above max leverage",
  );

  assert(!protocol.isInitialized(), "still uninitialized");
  assertEq(ledger.asset.balanceOf(d.owner.toBase58()), 100n * WAD, "failed calls moved nothing");

  console.log("✓ initialize preconditions");
}

// Deposit then withdraw at a constant price
{
  const { d } = initialized();
  const { protocol, ledger, usdn } = d;
  const alice = fundedUser(d);
  const a = alice.toBase58();

  ledger.skip(60n);
  assert(
    protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT }),
    "deposit initiated",
  );
  assertEq(ledger.native.balanceOf(a), WAD / 2n, "security deposit taken");
  assertEq(ledger.native.balanceOf(protocol.custody), SECURITY_DEPOSIT, "held by the protocol");
  assertEq(protocol.getBalances().pendingBalanceVault, WAD, "pending vault");
  assertEq(protocol.getBalances().escrowedAssets, WAD, "escrowed");
  assertEq(protocol.getUserPendingAction(alice)?.rawIndex, 0, "queued");
  assertConserved(d, "after initiateDeposit");

  expectError(
    () => protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT }),
    "PendingActionAlreadyExists",
    "second pending action",
  );
  expectError(
    () => protocol.validateWithdrawal(alice, { priceData: priceAt(d, P2000) }),
    "InvalidPendingAction",
    "wrong validation entry point",
  );

  ledger.skip(10n);
  expectError(
    () => protocol.validateDeposit(alice, { priceData: priceAt(d, P2000) }),
    "PriceTooOld",
    "price inside the validation delay",
  );

  ledger.skip(30n);
  assert(protocol.validateDeposit(alice, { priceData: priceAt(d, P2000) }), "deposit validated");
  assertEq(usdn.sharesOf(a), 2n * 10n ** 39n, "shares at the vault ratio");
  assertEq(usdn.balanceOf(a), 2000n * WAD, "1 unit at 2000 buys 2000 tokens");
  assertEq(protocol.getBalances().balanceVault, 11n * WAD, "vault grew");
  assertEq(protocol.getBalances().pendingBalanceVault, 0n, "nothing pending");
  assertEq(protocol.getBalances().escrowedAssets, 0n, "escrow released");
  assertEq(ledger.native.balanceOf(a), WAD, "own validation returns the security deposit");
  assertEq(protocol.getUserPendingAction(alice), undefined, "dequeued");
  expectError(() => protocol.validateDeposit(alice, { priceData: priceAt(d, P2000) }), "NoPendingAction", "nothing left");
  assertConserved(d, "after validateDeposit");

  ledger.skip(60n);
  assert(
    protocol.initiateWithdrawal(alice, { shares: usdn.sharesOf(a), priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT }),
    "withdrawal initiated",
  );
  assertEq(usdn.sharesOf(a), 0n, "shares held by the protocol");
  assertEq(protocol.getBalances().pendingBalanceVault, -WAD, "estimated outflow");

  ledger.skip(30n);
  assert(protocol.validateWithdrawal(alice, { priceData: priceAt(d, P2000) }), "withdrawal validated");
  assertEq(ledger.asset.balanceOf(a), 5n * WAD, "asset back");
  assertEq(protocol.getBalances().balanceVault, 10n * WAD, "vault back");
  assertEq(protocol.getBalances().pendingBalanceVault, 0n, "pending cleared");
  assertEq(usdn.totalShares(), 2n * 10n ** 40n, "shares burned");
  assertEq(ledger.events.ofType("ValidatedWithdrawal")[0].assetAmount, WAD, "event amount");
  assertConserved(d, "after validateWithdrawal");

  console.log("✓ deposit and withdrawal");
}

// Open, validate and partially close at a higher price
{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const bob = fundedUser(d);
  const alice = fundedUser(d);
  const b = bob.toBase58();

  ledger.skip(60n);
  const { initiated, posId } = protocol.initiateOpenPosition(bob, {
    amount: WAD,
    desiredLiqPrice: 1500n * WAD,
    priceData: priceAt(d, P2000),
    value: SECURITY_DEPOSIT,
  });
  assert(initiated, "open initiated");
  if (posId === undefined) throw new Error("FAIL: no position id");
  assertEq(posId.tick, 73_300, "tick below 1500 plus the penalty");
  assertEq(protocol.getPosition(posId).position.validated, false, "awaiting validation");
  assertEq(protocol.getPosition(posId).position.totalExpo, 3_957_503_051_612_472_750n, "exposure");
  assertEq(protocol.getPosition(posId).liquidationPenalty, 200, "penalty");
  assertEq(ledger.events.ofType("InitiatedOpenPosition")[0].leverage, 3_957_503_051_612_472_750_786n, "leverage");
  assertEq(protocol.getBalances().balanceLong, 5_999_999_999_999_999_999n, "position value joins the long side");
  assertEq(protocol.getBalances().balanceVault, 10_000_000_000_000_000_001n, "rounding dust goes to the vault");
  assertConserved(d, "after initiateOpenPosition");

  expectError(
    () =>
      protocol.initiateClosePosition(bob, {
        posId,
        amountToClose: WAD,
        priceData: priceAt(d, P2000),
        value: SECURITY_DEPOSIT,
      }),
    "PositionNotValidated",
    "closing before validation",
  );

  ledger.skip(30n);
  assert(protocol.validateOpenPosition(bob, { priceData: priceAt(d, P2000) }), "open validated");
  assert(protocol.getPosition(posId).position.validated, "validated flag");
  assertEq(protocol.getPosition(posId).position.totalExpo, 3_957_503_051_612_472_750n, "exposure unchanged at the same price");

  ledger.skip(30n);
  const closeArgs = { posId, priceData: priceAt(d, P2100), value: SECURITY_DEPOSIT };
  expectError(
    () => protocol.initiateClosePosition(alice, { ...closeArgs, amountToClose: WAD }),
    "Unauthorized",
    "closing someone else's position",
  );
  expectError(
    () => protocol.initiateClosePosition(bob, { ...closeArgs, amountToClose: 2n * WAD }),
    "AmountToCloseTooHigh",
    "closing more than the position",
  );
  expectError(
    () => protocol.initiateClosePosition(bob, { ...closeArgs, amountToClose: 95n * 10n ** 16n }),
    "LongPositionTooSmall",
    "leaving dust behind",
  );

  assert(protocol.initiateClosePosition(bob, { ...closeArgs, amountToClose: WAD / 2n }), "close initiated");
  assertEq(protocol.getPosition(posId).position.amount, WAD / 2n, "half left");
  assertEq(protocol.getPosition(posId).position.totalExpo, 1_978_751_525_806_236_375n, "half the exposure left");
  assertEq(protocol.getBalances().escrowedAssets, 570_416_739_324_106_493n, "value at 2100 in escrow");
  assertEq(protocol.getBalances().balanceLong, 5_804_701_037_881_425_019n, "long side after PnL and the close");
  assertEq(protocol.getBalances().balanceVault, 9_624_882_222_794_468_488n, "vault paid the PnL");
  assertConserved(d, "after initiateClosePosition");

  ledger.skip(30n);
  assert(protocol.validateClosePosition(bob, { priceData: priceAt(d, P2100) }), "close validated");
  assertEq(ledger.asset.balanceOf(b), 4n * WAD + 570_416_739_324_106_493n, "paid out");
  const closed = ledger.events.ofType("ValidatedClosePosition")[0];
  assertEq(closed.profit, 570_416_739_324_106_493n - WAD / 2n, "profit on the closed half");
  assertEq(protocol.getBalances().escrowedAssets, 0n, "escrow released");
  assertEq(protocol.totalExpo(), INIT_TOTAL_EXPO + 1_978_751_525_806_236_375n, "ladder exposure");
  assertEq(ledger.native.balanceOf(b), WAD, "security deposits returned");
  assertConserved(d, "after validateClosePosition");

  console.log("✓ open, validate and partial close");
}

// Open preconditions
{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const bob = fundedUser(d);
  const b = bob.toBase58();
  ledger.skip(60n);
  const open = (desiredLiqPrice: bigint, amount = WAD) => () =>
    protocol.initiateOpenPosition(bob, { amount, desiredLiqPrice, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });

  expectError(open(1500n * WAD, 0n), "ZeroAmount", "zero collateral");
  expectError(open(1500n * WAD, WAD / 20n), "LongPositionTooSmall", "below minLongPosition");
  expectError(open(1950n * WAD), "LiquidationPriceSafetyMargin", "liquidation price too close");
  expectError(open(1900n * WAD), "LeverageTooHigh", "above max leverage");
  expectError(
    () => protocol.initiateOpenPosition(bob, { amount: WAD, desiredLiqPrice: 1500n * WAD, priceData: priceAt(d, P2000) }),
    "SecurityDepositTooLow",
    "no security deposit",
  );
  expectError(
    () =>
      protocol.initiateOpenPosition(bob, {
        amount: WAD,
        desiredLiqPrice: 1500n * WAD,
        priceData: priceAt(d, P2000),
        value: SECURITY_DEPOSIT,
        to: PublicKey.default,
      }),
    "ZeroAddress",
    "zero recipient",
  );

  assertEq(ledger.asset.balanceOf(b), 5n * WAD, "asset untouched by failed calls");
  assertEq(ledger.native.balanceOf(b), WAD, "native untouched by failed calls");
  assertEq(protocol.totalLongPositions(), 1, "only the first long");

  console.log("✓ open preconditions");
}

// 3x at 2000, validated after the price rose to 2100
{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const bob = fundedUser(d);
  ledger.skip(60n);

  const desiredLiqPrice = liquidationPriceForLeverage(P2000, 3n * LEVERAGE_FACTOR);
  const before = protocol.totalExpo();
  protocol.initiateOpenPosition(bob, { amount: WAD, desiredLiqPrice, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });
  const initiated = ledger.events.ofType("InitiatedOpenPosition")[0];
  assertEq(protocol.totalExpo() - before, initiated.totalExpo, "ladder exposure grew by the position's");
  const approx = (initiated.leverage * WAD) / LEVERAGE_FACTOR;
  assert(approx - initiated.totalExpo <= 1n && initiated.totalExpo - approx <= 1n, "exposure is leverage times amount");
  assert(initiated.leverage <= 3n * LEVERAGE_FACTOR, "tick rounding never raises leverage");

  ledger.skip(30n);
  protocol.validateOpenPosition(bob, { priceData: priceAt(d, P2100) });
  const validated = ledger.events.ofType("ValidatedOpenPosition")[0];
  assert(validated.leverage < initiated.leverage, "leverage drops when the price rises before validation");
  assertEq(validated.posId.tick, initiated.posId.tick, "position stays in its bucket");
  assertConserved(d, "after validation at a higher price");

  console.log("✓ open validated at a higher price");
}

// Someone else's actionable action is validated first, and its deposit paid to them
{
  const { d } = initialized();
  const { protocol, ledger, usdn } = d;
  const alice = fundedUser(d);
  const bob = fundedUser(d);

  ledger.skip(60n);
  protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });

  ledger.skip(d.config.lowLatencyValidatorDeadline);
  assertEq(protocol.getActionablePendingActions(bob).length, 0, "exclusive until the deadline has passed");

  ledger.skip(1n);
  assertEq(protocol.getActionablePendingActions(bob).length, 1, "actionable after the deadline");
  assertEq(protocol.getActionablePendingActions(alice).length, 0, "never actionable for its own validator");

  expectError(
    () => protocol.initiateDeposit(bob, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT }),
    "InvalidPendingActionData",
    "missing price data for the actionable action",
  );

  assert(
    protocol.initiateDeposit(bob, {
      amount: WAD,
      priceData: priceAt(d, P2000),
      previousActionsData: previousActions(d, bob, P2000),
      value: SECURITY_DEPOSIT,
    }),
    "bob's deposit initiated",
  );
  assertEq(usdn.balanceOf(alice.toBase58()), 2000n * WAD, "alice's deposit validated by bob");
  assertEq(protocol.getUserPendingAction(alice), undefined, "alice dequeued");
  assertEq(ledger.native.balanceOf(bob.toBase58()), WAD, "bob paid one deposit and received alice's");
  assertEq(ledger.native.balanceOf(alice.toBase58()), WAD / 2n, "alice's deposit went to bob");
  assertEq(protocol.getUserPendingAction(bob)?.rawIndex, 1, "bob queued after alice");
  assertConserved(d, "after third-party validation");

  console.log("✓ actionable actions of other users");
}

// Once the low-latency window is over, a third party validates at its closing price
{
  const { d } = initialized();
  const { protocol, ledger, usdn } = d;
  const alice = fundedUser(d);
  const bob = fundedUser(d);

  ledger.skip(60n);
  protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });
  const initiatedAt = ledger.timestamp();
  const windowEnd = initiatedAt + d.config.lowLatencyDelay;

  ledger.skip(d.config.onChainValidatorDeadline + 1n);
  assertEq(protocol.getActionablePendingActions(bob)[0]?.rawIndex, 0, "alice's deposit is actionable");
  assertEq(d.oracle.validationTimestamp(initiatedAt), windowEnd, "closing price of the window");

  const deposit = (priceData: Uint8Array) =>
    protocol.initiateDeposit(bob, {
      amount: WAD,
      priceData: priceAt(d, P2000),
      previousActionsData: { priceData: [priceData], rawIndices: [0] },
      value: SECURITY_DEPOSIT,
    });
  expectError(() => deposit(priceAt(d, P2000)), "PriceTooRecent", "current price for an old action");
  expectError(() => deposit(encodePriceData(P2000, windowEnd - 1n)), "PriceTooOld", "a price inside the window");
  assertEq(ledger.native.balanceOf(bob.toBase58()), WAD, "rejected calls cost nothing");

  assert(deposit(encodePriceData(P2000, windowEnd)), "validated at the window's closing price");
  assertEq(usdn.balanceOf(alice.toBase58()), 2000n * WAD, "alice's deposit validated by bob");
  assertEq(protocol.getUserPendingAction(alice), undefined, "alice dequeued");
  assertConserved(d, "after a late third-party validation");

  console.log("✓ late validations use the window's closing price");
}

{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const alice = fundedUser(d);
  const bob = fundedUser(d);
  const carol = fundedUser(d);

  ledger.skip(60n);
  protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });
  protocol.initiateDeposit(bob, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });

  ledger.skip(d.config.lowLatencyValidatorDeadline + 1n);
  const none = protocol.validateActionablePendingActions(carol, {
    previousActionsData: { priceData: [], rawIndices: [] },
    maxValidations: 5,
  });
  assertEq(none, 0, "nothing validated without price data");

  const count = protocol.validateActionablePendingActions(carol, {
    previousActionsData: previousActions(d, carol, P2000),
    maxValidations: 5,
  });
  assertEq(count, 2, "both validated");
  assertEq(ledger.native.balanceOf(carol.toBase58()), WAD + 2n * SECURITY_DEPOSIT, "carol collected both deposits");
  assertEq(protocol.getBalances().balanceVault, 12n * WAD, "both deposits in the vault");

  console.log("✓ validateActionablePendingActions");
}

// Expired actions: removal by a third party forfeits the deposit
{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const carol = fundedUser(d);
  const dave = fundedUser(d);
  const c = carol.toBase58();

  ledger.skip(60n);
  protocol.initiateDeposit(carol, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });
  expectError(() => protocol.removeExpiredPendingAction(dave, 0), "PendingActionNotExpired", "too early");
  expectError(() => protocol.refundSecurityDeposit(carol), "PendingActionAlreadyExists", "refund while pending");

  ledger.skip(d.config.pendingActionExpiry + 1n);
  assertEq(protocol.getActionablePendingActions(dave).length, 0, "expired actions are not actionable");
  protocol.removeExpiredPendingAction(dave, 0);

  assertEq(ledger.asset.balanceOf(c), 5n * WAD, "escrowed deposit returned");
  assertEq(ledger.native.balanceOf(c), WAD / 2n, "security deposit lost");
  assertEq(ledger.native.balanceOf(protocol.feeCollector()), SECURITY_DEPOSIT, "forfeited to the fee collector");
  assertEq(ledger.events.ofType("ExpiredPendingActionRemoved")[0].forfeited, true, "event marks the forfeit");
  assertEq(protocol.getBalances().pendingBalanceVault, 0n, "pending cleared");
  assertEq(protocol.getBalances().escrowedAssets, 0n, "escrow cleared");
  expectError(() => protocol.removeExpiredPendingAction(dave, 0), "NoPendingAction", "already removed");
  assertConserved(d, "after expiry");

  console.log("✓ removeExpiredPendingAction by a third party");
}

// Expired actions removed by their validator credit a refund
{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const carol = fundedUser(d);

  ledger.skip(60n);
  protocol.initiateDeposit(carol, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });
  ledger.skip(d.config.pendingActionExpiry + 1n);
  protocol.removeExpiredPendingAction(carol, 0);

  assertEq(protocol.refundOf(carol), SECURITY_DEPOSIT, "refund credited");
  assertEq(protocol.refundSecurityDeposit(carol), SECURITY_DEPOSIT, "refund paid");
  assertEq(ledger.native.balanceOf(carol.toBase58()), WAD, "native restored");
  assertEq(protocol.refundOf(carol), 0n, "refund cleared");
  expectError(() => protocol.refundSecurityDeposit(carol), "NothingToRefund", "second refund");

  console.log("✓ refundSecurityDeposit");
}

{
  const { d, initPosId } = initialized();
  const { protocol, ledger } = d;
  const alice = fundedUser(d);

  protocol.transferPositionOwnership(d.owner, initPosId, alice);
  assertEq(protocol.getPosition(initPosId).position.user, alice.toBase58(), "new owner");
  const event = ledger.events.ofType("PositionOwnershipTransferred")[0];
  assertEq(event.oldOwner, d.owner.toBase58(), "event old owner");

  expectError(() => protocol.transferPositionOwnership(d.owner, initPosId, alice), "Unauthorized", "former owner");
  expectError(
    () => protocol.transferPositionOwnership(alice, initPosId, PublicKey.default),
    "ZeroAddress",
    "transfer to the zero address",
  );

  console.log("✓ transferPositionOwnership");
}

{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const alice = fundedUser(d);

  expectError(() => protocol.updateConfig(alice, { positionFeeBps: 10 }), "Unauthorized", "stranger");
  expectThrow(() => protocol.updateConfig(d.owner, { tickSpacing: 10 }), "tickSpacing: cannot be changed", "immutable");
  expectThrow(
    () => protocol.updateConfig(d.owner, { liquidationPenalty: 150 }),
    "liquidationPenalty: must be a multiple of tickSpacing",
    "invalid result",
  );
  assertEq(protocol.getConfig().liquidationPenalty, 200, "unchanged after a failed update");

  protocol.updateConfig(d.owner, { minLeverage: 2n * LEVERAGE_FACTOR });
  assertEq(protocol.getConfig().minLeverage, 2n * LEVERAGE_FACTOR, "applied");
  assertEq(ledger.events.ofType("ConfigUpdated")[0].keys.join(","), "minLeverage", "changed keys reported");

  ledger.skip(60n);
  expectError(
    () =>
      protocol.initiateOpenPosition(alice, {
        amount: WAD,
        desiredLiqPrice: 500n * WAD,
        priceData: priceAt(d, P2000),
        value: SECURITY_DEPOSIT,
      }),
    "LeverageTooLow",
    "below the new minimum",
  );

  console.log("✓ updateConfig");
}

// Vault fee split and protocol fee distribution
{
  const { d } = initialized({ vaultFeeBps: 100, feeThreshold: 1n });
  const { protocol, ledger, usdn } = d;
  const alice = fundedUser(d);

  ledger.skip(60n);
  protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });
  ledger.skip(30n);
  protocol.validateDeposit(alice, { priceData: priceAt(d, P2000) });

  assertEq(usdn.sharesOf(alice.toBase58()), 198n * 10n ** 37n, "shares for the amount net of the fee");
  assertEq(protocol.getBalances().balanceVault, 10_999_200_000_000_000_000n, "vault keeps its share of the fee");
  assertEq(protocol.getBalances().totalFeesSkimmed, 800_000_000_000_000n, "8% of the fee");
  assertEq(protocol.getBalances().pendingProtocolFee, 0n, "flushed");
  assertEq(ledger.asset.balanceOf(protocol.feeCollector()), 800_000_000_000_000n, "fee collector paid");
  assertEq(ledger.events.ofType("ProtocolFeeDistributed").length, 1, "one distribution");
  assertConserved(d, "after fee distribution");

  console.log("✓ fees");
}

// Oracle fees come out of the value sent; the rest is returned
{
  const { d } = initialized({}, { oracleFee: 1_000n });
  const { protocol, ledger } = d;
  const alice = fundedUser(d);
  const a = alice.toBase58();

  assertEq(ledger.native.balanceOf(d.oracle.address), 1_000n, "initialization paid the oracle");

  ledger.skip(60n);
  expectError(
    () => protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT }),
    "InsufficientFee",
    "nothing left for the oracle",
  );
  protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT + 5_000n });
  assertEq(ledger.native.balanceOf(d.oracle.address), 2_000n, "oracle paid once more");
  assertEq(ledger.native.balanceOf(a), WAD - SECURITY_DEPOSIT - 1_000n, "excess returned");

  console.log("✓ oracle fees");
}

// A transfer callback cannot re-enter the protocol
{
  const { d } = initialized();
  const { protocol, ledger } = d;
  const alice = fundedUser(d);
  const bob = fundedUser(d);
  ledger.skip(60n);

  ledger.asset.setTransferHook((_from, to) => {
    if (to === protocol.custody) {
      protocol.initiateDeposit(alice, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT });
    }
  });
  expectError(
    () => protocol.initiateDeposit(bob, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT }),
    "ReentrantCall",
    "nested call from a transfer hook",
  );
  ledger.asset.setTransferHook(undefined);

  assertEq(ledger.asset.balanceOf(bob.toBase58()), 5n * WAD, "outer call rolled back");
  assertEq(protocol.getUserPendingAction(bob), undefined, "nothing queued");
  assertEq(protocol.getBalances().escrowedAssets, 0n, "nothing escrowed");
  assert(
    protocol.initiateDeposit(bob, { amount: WAD, priceData: priceAt(d, P2000), value: SECURITY_DEPOSIT }),
    "protocol usable after the rejected call",
  );

  console.log("✓ reentrancy guard");
}

// Random flows keep custody equal to the accounting and both sides solvent
{
  const { d } = initialized({ fundingSF: 120, positionFeeBps: 10, vaultFeeBps: 10 });
  const { protocol, ledger, usdn } = d;
  const users = [0, 1, 2, 3].map(() => fundedUser(d, 100n * WAD, 100n * WAD));
  const positions = new Map<string, PositionId[]>();
  const rand = lcg(7);
  const rejected = new Set<string>([
    "ZeroAmount",
    "StaleReference",
    "PendingActionAlreadyExists",
    "NoPendingAction",
    "InvalidPendingActionData",
    "PositionNotValidated",
    "AmountToCloseTooHigh",
  ]);
  let price = P2000;
  let succeeded = 0;

  const validationPrice = (actionTimestamp: bigint) =>
    encodePriceData(price, d.oracle.validationTimestamp(actionTimestamp));
  const previous = (caller: PublicKey): PreviousActionsData => {
    const actionable = protocol.getActionablePendingActions(caller);
    return {
      priceData: actionable.map((a) => validationPrice(a.action.timestamp)),
      rawIndices: actionable.map((a) => a.rawIndex),
    };
  };

  for (let step = 0; step < 150; step++) {
    ledger.skip(BigInt(1 + Math.floor(rand() * 300)));
    price += (price * (BigInt(Math.floor(rand() * 601)) - 300n)) / 10_000n;
    if (price < 1200n * WAD) price = 1200n * WAD;
    if (price > 3000n * WAD) price = 3000n * WAD;

    const user = users[Math.floor(rand() * users.length)];
    const key = user.toBase58();
    const op = Math.floor(rand() * 5);
    const common = { priceData: priceAt(d, price), previousActionsData: previous(user), value: SECURITY_DEPOSIT };
    try {
      const pending = protocol.getUserPendingAction(user);
      if (pending !== undefined) {
        const args = { ...common, priceData: validationPrice(pending.action.timestamp) };
        switch (pending.action.action) {
          case ProtocolAction.ValidateDeposit:
            protocol.validateDeposit(user, args);
            break;
          case ProtocolAction.ValidateWithdrawal:
            protocol.validateWithdrawal(user, args);
            break;
          case ProtocolAction.ValidateOpenPosition:
            protocol.validateOpenPosition(user, args);
            break;
          case ProtocolAction.ValidateClosePosition:
            protocol.validateClosePosition(user, args);
            break;
        }
      } else if (op === 0) {
        protocol.initiateDeposit(user, { ...common, amount: randomBigInt(rand, WAD / 10n, 2n * WAD) });
      } else if (op === 1) {
        protocol.initiateWithdrawal(user, { ...common, shares: usdn.sharesOf(key) / 2n });
      } else if (op === 2) {
        const { posId } = protocol.initiateOpenPosition(user, {
          ...common,
          amount: randomBigInt(rand, WAD / 5n, (3n * WAD) / 2n),
          desiredLiqPrice: (price * randomBigInt(rand, 50n, 80n)) / 100n,
        });
        if (posId !== undefined) positions.set(key, [...(positions.get(key) ?? []), posId]);
      } else if (op === 3) {
        const posId = positions.get(key)?.shift();
        if (posId !== undefined) {
          const amountToClose = protocol.getPosition(posId).position.amount;
          protocol.initiateClosePosition(user, { ...common, posId, amountToClose });
        }
      } else {
        protocol.liquidate(user, { priceData: priceAt(d, price) });
      }
      succeeded++;
    } catch (e) {
      const expected =
        e instanceof PolicyError || e instanceof OracleError || (e instanceof PreconditionError && rejected.has(e.code));
      if (!expected) throw e;
    }

    const { balanceLong, balanceVault } = protocol.getBalances();
    assert(balanceLong >= 0n && balanceVault >= 0n, `balances non-negative at step ${step}`);
    assertConserved(d, `step ${step}`);
  }
  assert(succeeded > 0, "calls went through");

  console.log("✓ custody conserved over 150 random steps");
}

console.log("\n✅ All protocol tests passed!");
