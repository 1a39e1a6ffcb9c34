import { PublicKey } from "@solana/web3.js";
import { PENDING_ACTION_RECORD_SIZE, WAD } from "../src/constants.js";
import { decodePendingAction, encodePendingAction, HEADER_SIZE, PAYLOAD_SIZE } from "../src/abi/pendingActions.js";
import { decodePriceData, encodePriceData, PRICE_DATA_SIZE } from "../src/abi/priceData.js";
import { readU128LE, readU64LE } from "../src/abi/decode.js";
import {
  ProtocolAction,
  type ClosePendingAction,
  type DepositPendingAction,
  type OpenPendingAction,
  type PendingAction,
} from "../src/engine/types.js";
import { assert, assertEq, expectError } from "./helpers.js";

console.log("Testing pending action and price data layouts...\n");

const ALICE = new PublicKey(Buffer.alloc(32, 1)).toBase58();
const BOB = new PublicKey(Buffer.alloc(32, 2)).toBase58();

const deposit: DepositPendingAction = {
  action: ProtocolAction.ValidateDeposit,
  timestamp: 1_700_000_000n,
  to: ALICE,
  validator: BOB,
  securityDepositValue: WAD / 2n,
  amount: 3n * WAD,
  assetPrice: 2000n * WAD,
  totalExpo: 10n * WAD,
  balanceVault: 9n * WAD,
  balanceLong: 5n * WAD,
  usdnTotalShares: 18_000n * WAD * 10n ** 18n,
};

{
  assertEq(HEADER_SIZE + PAYLOAD_SIZE, PENDING_ACTION_RECORD_SIZE, "header + payload");
  const bytes = encodePendingAction(deposit);
  assertEq(bytes.length, 217, "record size");
  assertEq(bytes[0], ProtocolAction.ValidateDeposit, "tag byte");
  assertEq(readU64LE(bytes, 1), 1_700_000_000n, "timestamp offset");
  assertEq(readU128LE(bytes, 73), WAD / 2n, "security deposit offset");
  assertEq(readU128LE(bytes, 89), 3n * WAD, "amount starts the payload");
  assertEq(bytes[216], 0, "payload is zero padded");

  const back = decodePendingAction(bytes);
  assertEq(back.action, ProtocolAction.ValidateDeposit, "action");
  assertEq(back.to, ALICE, "to");
  assertEq(back.validator, BOB, "validator");
  if (back.action !== ProtocolAction.ValidateDeposit) throw new Error("FAIL: variant");
  assertEq(back.usdnTotalShares, deposit.usdnTotalShares, "widest field survives");
  assertEq(back.balanceLong, 5n * WAD, "balanceLong");

  console.log("✓ deposit record");
}

// Share counts are token amounts scaled by the divisor and outgrow 128 bits
{
  const shares = 20_000n * WAD * 10n ** 18n;
  assert(shares >= 1n << 128n, "test value needs more than 128 bits");
  const withdrawal: PendingAction = {
    action: ProtocolAction.ValidateWithdrawal,
    timestamp: 1n,
    to: BOB,
    validator: BOB,
    securityDepositValue: 0n,
    sharesAmount: shares,
    assetPrice: 2000n * WAD,
    totalExpo: 10n * WAD,
    balanceVault: 10n * WAD,
    balanceLong: 5n * WAD,
    usdnTotalShares: 2n * shares,
  };
  const back = decodePendingAction(encodePendingAction(withdrawal));
  if (back.action !== ProtocolAction.ValidateWithdrawal) throw new Error("FAIL: withdrawal variant");
  assertEq(back.sharesAmount, shares, "sharesAmount");
  assertEq(back.assetPrice, 2000n * WAD, "assetPrice after the wide field");
  assertEq(back.balanceLong, 5n * WAD, "balanceLong");
  assertEq(back.usdnTotalShares, 2n * shares, "usdnTotalShares");

  console.log("✓ withdrawal record with wide share counts");
}

{
  const open: OpenPendingAction = {
    action: ProtocolAction.ValidateOpenPosition,
    timestamp: 42n,
    to: ALICE,
    validator: ALICE,
    securityDepositValue: 0n,
    tick: -12_300,
    tickVersion: 7,
    index: 3,
    startPrice: 1999n * WAD,
  };
  const back = decodePendingAction(encodePendingAction(open));
  if (back.action !== ProtocolAction.ValidateOpenPosition) throw new Error("FAIL: open variant");
  assertEq(back.tick, -12_300, "negative tick");
  assertEq(back.tickVersion, 7, "tick version");
  assertEq(back.index, 3, "index");
  assertEq(back.startPrice, 1999n * WAD, "start price");

  const close: ClosePendingAction = {
    action: ProtocolAction.ValidateClosePosition,
    timestamp: 43n,
    to: BOB,
    validator: ALICE,
    securityDepositValue: 1n,
    tick: 76_000,
    tickVersion: 0,
    index: 0,
    closeAmount: WAD,
    closePosTotalExpo: 2n * WAD,
    closeLiqPriceWithoutPenalty: 990n * WAD,
    closeLiqPrice: 1010n * WAD,
    closeBoundedPositionValue: WAD + 1n,
  };
  const closed = decodePendingAction(encodePendingAction(close));
  if (closed.action !== ProtocolAction.ValidateClosePosition) throw new Error("FAIL: close variant");
  assertEq(closed.closeBoundedPositionValue, WAD + 1n, "last close field");
  assertEq(closed.closeLiqPriceWithoutPenalty, 990n * WAD, "price without penalty");
  assertEq(closed.to, BOB, "close recipient");

  console.log("✓ open and close records");
}

{
  const bytes = encodePendingAction(deposit);
  bytes[0] = 99;
  expectError(() => decodePendingAction(bytes), "InvalidPendingAction", "unknown tag");
  expectError(() => decodePendingAction(bytes.subarray(0, 200)), "InvalidPendingAction", "short record");

  assert(
    (() => {
      try {
        encodePendingAction({ ...deposit, amount: 1n << 128n });
        return false;
      } catch (e) {
        return e instanceof Error && e.message.includes("u128");
      }
    })(),
    "amounts wider than u128 are refused",
  );

  console.log("✓ malformed records");
}

{
  const data = encodePriceData(2000n * WAD, 1_700_000_123n);
  assertEq(data.length, PRICE_DATA_SIZE, "price data size");
  const { price, timestamp } = decodePriceData(data);
  assertEq(price, 2000n * WAD, "price");
  assertEq(timestamp, 1_700_000_123n, "timestamp");

  expectError(() => decodePriceData(new Uint8Array(39)), "InvalidPriceData", "short price data");
  expectError(() => decodePriceData(new Uint8Array(0)), "InvalidPriceData", "empty price data");

  console.log("✓ price data");
}

console.log("\n✅ All pending action layout tests passed!");
