import { z } from "zod";
import { PublicKey } from "@solana/web3.js";
import { LEVERAGE_DECIMALS, PRICE_DECIMALS } from "../constants.js";
import { parseConfig } from "../config.js";
import { ProtocolError } from "../errors.js";
import { encodePriceData } from "../abi/priceData.js";
import { parseUnits } from "../math/units.js";
import type { Balances } from "../engine/protocol.js";
import { ProtocolAction, type PositionId, type PreviousActionsData } from "../engine/types.js";
import { deploy, type Deployment } from "./deploy.js";
import type { LoggedEvent } from "./events.js";

const Decimal = z.string().regex(/^\d+(\.\d+)?$/, "expected a decimal string");
const Name = z.string().min(1);

const Base = z.object({
  /** error code the step must fail with */
  expectError: z.string().optional(),
});

export const StepSchema = z.discriminatedUnion("step", [
  Base.extend({ step: z.literal("skip"), seconds: z.number().int().positive() }),
  Base.extend({ step: z.literal("price"), price: Decimal }),
  Base.extend({ step: z.literal("initialize"), deposit: Decimal, long: Decimal, liqPrice: Decimal }),
  Base.extend({ step: z.literal("deposit"), user: Name, amount: Decimal }),
  Base.extend({ step: z.literal("withdraw"), user: Name, usdn: z.union([z.literal("all"), Decimal]) }),
  Base.extend({ step: z.literal("open"), user: Name, amount: Decimal, liqPrice: Decimal, as: Name.optional() }),
  Base.extend({ step: z.literal("close"), user: Name, position: Name, amount: Decimal.optional() }),
  Base.extend({ step: z.literal("validate"), user: Name }),
  Base.extend({ step: z.literal("validateActionable"), user: Name, max: z.number().int().positive().default(5) }),
  Base.extend({ step: z.literal("liquidate"), user: Name }),
  Base.extend({ step: z.literal("removeExpired"), user: Name, of: Name }),
  Base.extend({ step: z.literal("refund"), user: Name }),
  Base.extend({ step: z.literal("rebalancerDeposit"), user: Name, amount: Decimal }),
]);

export const ScenarioSchema = z.object({
  name: z.string().optional(),
  config: z.record(z.unknown()).default({}),
  startTimestamp: z.number().int().nonnegative().optional(),
  /** native currency per oracle validation */
  oracleFee: Decimal.default("0"),
  /** e.g. "3" for a 3x rebalancer; omit for none */
  rebalancerLeverage: Decimal.optional(),
  users: z
    .record(z.object({ asset: Decimal.default("0"), native: Decimal.default("0") }))
    .default({}),
  steps: z.array(StepSchema),
});

export type Step = z.infer<typeof StepSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioInput = z.input<typeof ScenarioSchema>;

export interface StepOutcome {
  index: number;
  step: Step["step"];
  ok: boolean;
  result?: unknown;
  error?: string;
}

export interface UserSummary {
  address: string;
  asset: bigint;
  native: bigint;
  usdn: bigint;
}

export interface ScenarioResult {
  name: string | undefined;
  outcomes: StepOutcome[];
  events: readonly LoggedEvent[];
  balances: Balances;
  users: Record<string, UserSummary>;
}

export const OWNER = "owner";

// oracle fees sent along with every call, on top of the security deposit
const FEE_ALLOWANCE = 8n;

export function parseScenario(raw: unknown): Scenario {
  const result = ScenarioSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid scenario:\n${issues.join("\n")}`);
  }
  return result.data;
}

/**
 * Replays a scenario against a fresh deployment. Every call uses a price
 * record at the current ledger time built from the last `price` step, and
 * supplies the same price for any actionable actions of other users.
 */
export class ScenarioRunner {
  readonly deployment: Deployment;
  private readonly users = new Map<string, PublicKey>();
  private readonly positions = new Map<string, PositionId>();
  private readonly oracleFee: bigint;
  private price: bigint | undefined;

  constructor(readonly scenario: Scenario) {
    this.oracleFee = parseUnits(scenario.oracleFee, 18);
    this.deployment = deploy({
      config: parseConfig(scenario.config),
      startTimestamp: scenario.startTimestamp === undefined ? undefined : BigInt(scenario.startTimestamp),
      oracleFee: this.oracleFee,
      rebalancerLeverage:
        scenario.rebalancerLeverage === undefined ? undefined : parseUnits(scenario.rebalancerLeverage, LEVERAGE_DECIMALS),
    });
    this.users.set(OWNER, this.deployment.owner);

    const { ledger } = this.deployment;
    for (const [name, funds] of Object.entries(scenario.users)) {
      const key = this.users.get(name) ?? PublicKey.unique();
      this.users.set(name, key);
      ledger.asset.mint(key.toBase58(), parseUnits(funds.asset, 18));
      ledger.native.mint(key.toBase58(), parseUnits(funds.native, 18));
    }
  }

  user(name: string): PublicKey {
    const key = this.users.get(name);
    if (!key) throw new Error(`Unknown user "${name}"`);
    return key;
  }

  position(label: string): PositionId {
    const posId = this.positions.get(label);
    if (!posId) throw new Error(`Unknown position "${label}"`);
    return posId;
  }

  private priceData(timestamp = this.deployment.ledger.timestamp()): Uint8Array {
    if (this.price === undefined) throw new Error("No price set; add a price step first");
    return encodePriceData(this.price, timestamp);
  }

  /**
   * The current price, stamped with a time the oracle accepts for validating
   * an action initiated at `actionTimestamp`.
   */
  private validationPriceData(actionTimestamp: bigint): Uint8Array {
    return this.priceData(this.deployment.oracle.validationTimestamp(actionTimestamp));
  }

  private previousActionsData(caller: PublicKey): PreviousActionsData {
    const actionable = this.deployment.protocol.getActionablePendingActions(caller);
    return {
      priceData: actionable.map((a) => this.validationPriceData(a.action.timestamp)),
      rawIndices: actionable.map((a) => a.rawIndex),
    };
  }

  private value(): bigint {
    return this.deployment.config.securityDepositValue + this.oracleFee * FEE_ALLOWANCE;
  }

  private callOptions(caller: PublicKey) {
    return {
      priceData: this.priceData(),
      previousActionsData: this.previousActionsData(caller),
      value: this.value(),
    };
  }

  /**
   * Runs one step and returns what the protocol returned.
   */
  execute(step: Step): unknown {
    const { protocol, ledger, usdn, rebalancer } = this.deployment;
    switch (step.step) {
      case "skip":
        ledger.skip(BigInt(step.seconds));
        return ledger.timestamp();
      case "price":
        this.price = parseUnits(step.price, PRICE_DECIMALS);
        return this.price;
      case "initialize":
        return protocol.initialize(this.user(OWNER), {
          depositAmount: parseUnits(step.deposit, 18),
          longAmount: parseUnits(step.long, 18),
          desiredLiqPrice: parseUnits(step.liqPrice, PRICE_DECIMALS),
          priceData: this.priceData(),
          value: this.value(),
        });
      case "deposit": {
        const caller = this.user(step.user);
        return protocol.initiateDeposit(caller, { ...this.callOptions(caller), amount: parseUnits(step.amount, 18) });
      }
      case "withdraw": {
        const caller = this.user(step.user);
        const shares =
          step.usdn === "all" ? usdn.sharesOf(caller.toBase58()) : usdn.convertToShares(parseUnits(step.usdn, 18));
        return protocol.initiateWithdrawal(caller, { ...this.callOptions(caller), shares });
      }
      case "open": {
        const caller = this.user(step.user);
        const result = protocol.initiateOpenPosition(caller, {
          ...this.callOptions(caller),
          amount: parseUnits(step.amount, 18),
          desiredLiqPrice: parseUnits(step.liqPrice, PRICE_DECIMALS),
        });
        if (step.as !== undefined && result.posId !== undefined) this.positions.set(step.as, result.posId);
        return result;
      }
      case "close": {
        const caller = this.user(step.user);
        const posId = this.position(step.position);
        const amountToClose =
          step.amount === undefined ? protocol.getPosition(posId).position.amount : parseUnits(step.amount, 18);
        return protocol.initiateClosePosition(caller, { ...this.callOptions(caller), posId, amountToClose });
      }
      case "validate":
        return this.validate(this.user(step.user));
      case "validateActionable": {
        const caller = this.user(step.user);
        return protocol.validateActionablePendingActions(caller, {
          previousActionsData: this.previousActionsData(caller),
          maxValidations: step.max,
          value: this.oracleFee * BigInt(step.max),
        });
      }
      case "liquidate":
        return protocol.liquidate(this.user(step.user), { priceData: this.priceData(), value: this.oracleFee });
      case "removeExpired": {
        const pending = protocol.getUserPendingAction(this.user(step.of));
        if (!pending) throw new Error(`"${step.of}" has no pending action`);
        protocol.removeExpiredPendingAction(this.user(step.user), pending.rawIndex);
        return pending.rawIndex;
      }
      case "refund":
        return protocol.refundSecurityDeposit(this.user(step.user));
      case "rebalancerDeposit": {
        if (!rebalancer) throw new Error("Scenario has no rebalancer; set rebalancerLeverage");
        const user = this.user(step.user).toBase58();
        const amount = parseUnits(step.amount, 18);
        ledger.execute(() => rebalancer.deposit(user, amount));
        return amount;
      }
    }
  }

  private validate(caller: PublicKey): boolean {
    const { protocol } = this.deployment;
    const pending = protocol.getUserPendingAction(caller);
    const priceData = pending ? this.validationPriceData(pending.action.timestamp) : this.priceData();
    const options = { ...this.callOptions(caller), priceData };
    switch (pending?.action.action) {
      case ProtocolAction.ValidateWithdrawal:
        return protocol.validateWithdrawal(caller, options);
      case ProtocolAction.ValidateOpenPosition:
        return protocol.validateOpenPosition(caller, options);
      case ProtocolAction.ValidateClosePosition:
        return protocol.validateClosePosition(caller, options);
      default:
        // also reports NoPendingAction when there is nothing to validate
        return protocol.validateDeposit(caller, options);
    }
  }

  run(): ScenarioResult {
    const outcomes = this.scenario.steps.map((step, index) => this.runStep(step, index));
    const { protocol, ledger, usdn } = this.deployment;
    const users: Record<string, UserSummary> = {};
    for (const [name, key] of this.users) {
      const address = key.toBase58();
      users[name] = {
        address,
        asset: ledger.asset.balanceOf(address),
        native: ledger.native.balanceOf(address),
        usdn: usdn.balanceOf(address),
      };
    }
    return {
      name: this.scenario.name,
      outcomes,
      events: ledger.events.all(),
      balances: protocol.getBalances(),
      users,
    };
  }

  private runStep(step: Step, index: number): StepOutcome {
    let result: unknown;
    try {
      result = this.execute(step);
    } catch (e) {
      const code = e instanceof ProtocolError ? e.code : undefined;
      if (step.expectError !== undefined && code === step.expectError) {
        return { index, step: step.step, ok: false, error: code };
      }
      const message = e instanceof Error ? e.message : String(e);
      throw new Error(`Step ${index} (${step.step}) failed: ${message}`, { cause: e });
    }
    if (step.expectError !== undefined) {
      throw new Error(`Step ${index} (${step.step}) succeeded, expected ${step.expectError}`);
    }
    return { index, step: step.step, ok: true, result };
  }
}

export function runScenario(raw: unknown): ScenarioResult {
  return new ScenarioRunner(parseScenario(raw)).run();
}

