import { PublicKey } from "@solana/web3.js";
import { LEVERAGE_FACTOR } from "../constants.js";
import { parseConfig, type ProtocolConfig, type ProtocolConfigInput } from "../config.js";
import { ElasticToken } from "../collaborators/elasticToken.js";
import { PriceDataOracle } from "../collaborators/oracle.js";
import { InMemoryRebalancer } from "../collaborators/rebalancer.js";
import { TickVaultProtocol } from "../engine/protocol.js";
import { deriveOracle, deriveRebalancer } from "../solana/pda.js";
import { Ledger } from "./ledger.js";

export interface DeployOptions {
  /** raw or parsed config; parsed again either way */
  config?: ProtocolConfigInput;
  owner?: PublicKey;
  startTimestamp?: bigint;
  /** native fee charged per oracle validation */
  oracleFee?: bigint;
  maxPriceAge?: bigint;
  /** leverage of the rebalancer position, 21 decimals; omit to deploy without one */
  rebalancerLeverage?: bigint;
}

export interface Deployment {
  ledger: Ledger;
  protocol: TickVaultProtocol;
  usdn: ElasticToken;
  oracle: PriceDataOracle;
  rebalancer: InMemoryRebalancer | undefined;
  owner: PublicKey;
  config: ProtocolConfig;
}

const DEFAULT_MAX_PRICE_AGE = 3_600n;

/**
 * Wires a fresh ledger, token, oracle and rebalancer to a new protocol.
 * Nothing is initialized; the owner still has to call `initialize`.
 */
export function deploy(opts: DeployOptions = {}): Deployment {
  const config = parseConfig(opts.config ?? {});
  const programId = new PublicKey(config.programId);
  const ledger = new Ledger(opts.startTimestamp);

  const usdn = new ElasticToken();
  ledger.register(usdn);

  const oracle = new PriceDataOracle(
    {
      address: deriveOracle(programId)[0].toBase58(),
      fee: opts.oracleFee ?? 0n,
      maxPriceAge: opts.maxPriceAge ?? DEFAULT_MAX_PRICE_AGE,
      validationDelay: config.validationDelay,
      lowLatencyDelay: config.lowLatencyDelay,
    },
    () => ledger.timestamp(),
  );

  let rebalancer: InMemoryRebalancer | undefined;
  if (opts.rebalancerLeverage !== undefined) {
    if (opts.rebalancerLeverage <= LEVERAGE_FACTOR) {
      throw new Error(`rebalancer leverage must be above 1x, got ${opts.rebalancerLeverage}`);
    }
    rebalancer = new InMemoryRebalancer(deriveRebalancer(programId)[0].toBase58(), ledger.asset, opts.rebalancerLeverage);
    ledger.register(rebalancer);
  }

  const owner = opts.owner ?? PublicKey.unique();
  const protocol = new TickVaultProtocol({ ledger, oracle, usdn, owner, config, rebalancer });
  return { ledger, protocol, usdn, oracle, rebalancer, owner, config };
}
