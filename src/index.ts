export * from "./constants.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./math/fixedPoint.js";
export * as HugeUint from "./math/hugeUint.js";
export * from "./math/tickMath.js";
export * from "./math/units.js";
export * from "./abi/priceData.js";
export * from "./abi/pendingActions.js";
export * from "./engine/types.js";
export * from "./engine/liquidationMultiplier.js";
export * from "./engine/longMath.js";
export * from "./engine/tickLadder.js";
export * from "./engine/funding.js";
export * from "./engine/pendingQueue.js";
export * from "./engine/imbalance.js";
export * from "./engine/rebase.js";
export * from "./engine/state.js";
export * from "./engine/protocol.js";
export * from "./collaborators/tokenLedger.js";
export * from "./collaborators/elasticToken.js";
export * from "./collaborators/oracle.js";
export * from "./collaborators/rebalancer.js";
export * from "./runtime/ledger.js";
export * from "./runtime/events.js";
export * from "./runtime/deploy.js";
export * from "./runtime/scenario.js";
export * from "./solana/pda.js";
