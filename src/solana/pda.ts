import { PublicKey } from "@solana/web3.js";

/**
 * Derive the custody PDA that holds every asset the protocol owns.
 * Seeds: ["custody"]
 */
export function deriveCustody(programId: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([Buffer.from("custody")], programId);
}

/**
 * Derive the treasury PDA, the default fee collector.
 * Seeds: ["treasury"]
 */
export function deriveTreasury(programId: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([Buffer.from("treasury")], programId);
}

/**
 * Derive the rebalancer PDA.
 * Seeds: ["rebalancer"]
 */
export function deriveRebalancer(programId: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([Buffer.from("rebalancer")], programId);
}

/**
 * Derive the account that collects oracle validation fees.
 * Seeds: ["oracle"]
 */
export function deriveOracle(programId: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([Buffer.from("oracle")], programId);
}

/**
 * Holder of the minimum token supply minted at initialization, which can
 * never be moved.
 */
export const DEAD_ADDRESS = PublicKey.default;
