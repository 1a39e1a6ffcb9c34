import { PreconditionError } from "../errors.js";
import { PENDING_ACTION_RECORD_SIZE } from "../constants.js";
import { ProtocolAction, type PendingAction } from "../engine/types.js";
import { encI32, encPubkey, encU128, encU256, encU32, encU64, encU8, padTo } from "./encode.js";
import { readI32LE, readPubkey, readU128LE, readU256LE, readU32LE, readU64LE, readU8 } from "./decode.js";

/**
 * Every pending action occupies one record of the same size.
 *
 * Header (89 bytes): tag(1) + timestamp(8) + to(32) + validator(32) +
 *                    securityDepositValue(16)
 * Payload (128 bytes), per tag:
 *   ValidateDeposit:       amount, assetPrice, totalExpo, balanceVault,
 *                          balanceLong (u128 each) + usdnTotalShares(u256)
 *   ValidateWithdrawal:    sharesAmount(u256) followed by the same five
 *                          snapshots
 *   ValidateOpenPosition:  tick(i32) + tickVersion(u32) + index(u32) +
 *                          startPrice(u128)
 *   ValidateClosePosition: tick(i32) + tickVersion(u32) + index(u32) +
 *                          closeAmount, closePosTotalExpo,
 *                          closeLiqPriceWithoutPenalty, closeLiqPrice,
 *                          closeBoundedPositionValue (u128 each)
 */
export const HEADER_SIZE = 89;
export const PAYLOAD_SIZE = PENDING_ACTION_RECORD_SIZE - HEADER_SIZE;

const OFF = {
  tag: 0,
  timestamp: 1,
  to: 9,
  validator: 41,
  securityDepositValue: 73,
  payload: HEADER_SIZE,
} as const;

function encodePayload(action: PendingAction): Buffer {
  switch (action.action) {
    case ProtocolAction.ValidateDeposit:
      return Buffer.concat([
        encU128(action.amount),
        encU128(action.assetPrice),
        encU128(action.totalExpo),
        encU128(action.balanceVault),
        encU128(action.balanceLong),
        encU256(action.usdnTotalShares),
      ]);
    case ProtocolAction.ValidateWithdrawal:
      return Buffer.concat([
        encU256(action.sharesAmount),
        encU128(action.assetPrice),
        encU128(action.totalExpo),
        encU128(action.balanceVault),
        encU128(action.balanceLong),
        encU256(action.usdnTotalShares),
      ]);
    case ProtocolAction.ValidateOpenPosition:
      return Buffer.concat([
        encI32(action.tick),
        encU32(action.tickVersion),
        encU32(action.index),
        encU128(action.startPrice),
      ]);
    case ProtocolAction.ValidateClosePosition:
      return Buffer.concat([
        encI32(action.tick),
        encU32(action.tickVersion),
        encU32(action.index),
        encU128(action.closeAmount),
        encU128(action.closePosTotalExpo),
        encU128(action.closeLiqPriceWithoutPenalty),
        encU128(action.closeLiqPrice),
        encU128(action.closeBoundedPositionValue),
      ]);
  }
}

export function encodePendingAction(action: PendingAction): Uint8Array {
  const header = Buffer.concat([
    encU8(action.action),
    encU64(action.timestamp),
    encPubkey(action.to),
    encPubkey(action.validator),
    encU128(action.securityDepositValue),
  ]);
  return Buffer.concat([header, padTo(encodePayload(action), PAYLOAD_SIZE)]);
}

export function decodePendingAction(record: Uint8Array): PendingAction {
  if (record.length !== PENDING_ACTION_RECORD_SIZE) {
    throw new PreconditionError(
      "InvalidPendingAction",
      `record is ${record.length} bytes, expected ${PENDING_ACTION_RECORD_SIZE}`,
    );
  }
  const header = {
    timestamp: readU64LE(record, OFF.timestamp),
    to: readPubkey(record, OFF.to).toBase58(),
    validator: readPubkey(record, OFF.validator).toBase58(),
    securityDepositValue: readU128LE(record, OFF.securityDepositValue),
  };
  const p = OFF.payload;
  const tag = readU8(record, OFF.tag);

  switch (tag) {
    case ProtocolAction.ValidateDeposit:
      return {
        action: ProtocolAction.ValidateDeposit,
        ...header,
        amount: readU128LE(record, p),
        assetPrice: readU128LE(record, p + 16),
        totalExpo: readU128LE(record, p + 32),
        balanceVault: readU128LE(record, p + 48),
        balanceLong: readU128LE(record, p + 64),
        usdnTotalShares: readU256LE(record, p + 80),
      };
    case ProtocolAction.ValidateWithdrawal:
      return {
        action: ProtocolAction.ValidateWithdrawal,
        ...header,
        sharesAmount: readU256LE(record, p),
        assetPrice: readU128LE(record, p + 32),
        totalExpo: readU128LE(record, p + 48),
        balanceVault: readU128LE(record, p + 64),
        balanceLong: readU128LE(record, p + 80),
        usdnTotalShares: readU256LE(record, p + 96),
      };
    case ProtocolAction.ValidateOpenPosition:
      return {
        action: ProtocolAction.ValidateOpenPosition,
        ...header,
        tick: readI32LE(record, p),
        tickVersion: readU32LE(record, p + 4),
        index: readU32LE(record, p + 8),
        startPrice: readU128LE(record, p + 12),
      };
    case ProtocolAction.ValidateClosePosition:
      return {
        action: ProtocolAction.ValidateClosePosition,
        ...header,
        tick: readI32LE(record, p),
        tickVersion: readU32LE(record, p + 4),
        index: readU32LE(record, p + 8),
        closeAmount: readU128LE(record, p + 12),
        closePosTotalExpo: readU128LE(record, p + 28),
        closeLiqPriceWithoutPenalty: readU128LE(record, p + 44),
        closeLiqPrice: readU128LE(record, p + 60),
        closeBoundedPositionValue: readU128LE(record, p + 76),
      };
    default:
      throw new PreconditionError("InvalidPendingAction", `unknown action tag ${tag}`);
  }
}
