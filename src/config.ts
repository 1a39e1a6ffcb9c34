import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { PublicKey } from "@solana/web3.js";
import { LEVERAGE_FACTOR, WAD } from "./constants.js";

const DEFAULT_PROGRAM_ID = "7RCZZ1J4xT8VvFjNRs85Um6emHo5wD144ESXRiCBFckL";
const DAY = 86_400n;

function isPublicKey(value: string): boolean {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}

const AddressSchema = z.string().refine(isPublicKey, { message: "not a valid base58 public key" });

/**
 * Unsigned integer accepted as bigint, safe integer or decimal string, so the
 * same schema reads JSON files, env vars and in-process overrides.
 */
function uint(min: bigint, max: bigint) {
  return z
    .union([z.bigint(), z.number().int().nonnegative(), z.string().regex(/^\d+$/, "expected an unsigned integer")])
    .transform((v) => BigInt(v))
    .pipe(z.bigint().min(min).max(max));
}

function int(min: number, max: number) {
  return z.coerce.number().int().min(min).max(max);
}

const ProtocolConfigShape = z.object({
  programId: AddressSchema.default(DEFAULT_PROGRAM_ID),
  /** defaults to the treasury address derived from programId */
  feeCollector: AddressSchema.optional(),

  // ladder
  tickSpacing: int(1, 10_000).default(100),
  liquidationPenalty: int(0, 1_500).default(200),
  liquidationIteration: int(1, 10).default(5),
  safetyMarginBps: int(0, 2_000).default(200),

  // leverage, 21 decimals
  minLeverage: uint(LEVERAGE_FACTOR + 1n, 100n * LEVERAGE_FACTOR).default(1_000_000_001n * 10n ** 12n),
  maxLeverage: uint(LEVERAGE_FACTOR + 1n, 100n * LEVERAGE_FACTOR).default(10n * LEVERAGE_FACTOR),
  minLongPosition: uint(0n, 10n * WAD).default(WAD / 10n),

  // funding; fundingSF has 3 decimals
  fundingSF: int(0, 1_000).default(120),
  emaPeriod: uint(1n, 90n * DAY).default(5n * DAY),

  // oracle and validation windows, seconds
  validationDelay: uint(0n, 10n * 60n).default(24n),
  lowLatencyDelay: uint(60n, DAY).default(20n * 60n),
  lowLatencyValidatorDeadline: uint(60n, DAY).default(15n * 60n),
  onChainValidatorDeadline: uint(60n, DAY).default(65n * 60n),
  pendingActionExpiry: uint(60n, 30n * DAY).default(DAY),
  securityDepositValue: uint(0n, 5n * WAD).default(WAD / 2n),

  // fees, basis points
  positionFeeBps: int(0, 2_000).default(4),
  vaultFeeBps: int(0, 2_000).default(4),
  protocolFeeBps: int(0, 10_000).default(800),
  liquidationRewardsBps: int(0, 5_000).default(500),
  feeThreshold: uint(0n, 10n ** 30n).default(WAD),

  // imbalance limits, basis points; 0 disables a check
  openExpoImbalanceLimitBps: int(0, 10_000).default(500),
  depositExpoImbalanceLimitBps: int(0, 10_000).default(500),
  withdrawalExpoImbalanceLimitBps: int(0, 10_000).default(600),
  closeExpoImbalanceLimitBps: int(0, 10_000).default(600),
  rebalancerCloseExpoImbalanceLimitBps: int(0, 10_000).default(350),

  // rebase, 18 decimals
  targetUsdnPrice: uint(WAD, 2n * WAD).default(10087n * 10n ** 14n),
  usdnRebaseThreshold: uint(WAD, 2n * WAD).default(1009n * 10n ** 15n),
  usdnRebaseInterval: uint(0n, 30n * DAY).default(12n * 60n * 60n),
});

export const ProtocolConfigSchema = ProtocolConfigShape.superRefine((c, ctx) => {
  if (c.minLeverage >= c.maxLeverage) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["minLeverage"], message: "must be below maxLeverage" });
  }
  if (c.liquidationPenalty % c.tickSpacing !== 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["liquidationPenalty"],
      message: "must be a multiple of tickSpacing",
    });
  }
  if (c.validationDelay >= c.lowLatencyValidatorDeadline) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["validationDelay"],
      message: "must be below lowLatencyValidatorDeadline",
    });
  }
  if (c.lowLatencyValidatorDeadline >= c.lowLatencyDelay) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["lowLatencyValidatorDeadline"],
      message: "must be below lowLatencyDelay",
    });
  }
  if (c.lowLatencyDelay >= c.onChainValidatorDeadline) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["onChainValidatorDeadline"],
      message: "must be above lowLatencyDelay",
    });
  }
  if (c.onChainValidatorDeadline >= c.pendingActionExpiry) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["pendingActionExpiry"],
      message: "must be above onChainValidatorDeadline",
    });
  }
  if (c.targetUsdnPrice > c.usdnRebaseThreshold) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["targetUsdnPrice"],
      message: "must not exceed usdnRebaseThreshold",
    });
  }
});

export type ProtocolConfig = z.output<typeof ProtocolConfigSchema>;
export type ProtocolConfigInput = z.input<typeof ProtocolConfigSchema>;
export type ProtocolConfigKey = keyof ProtocolConfig;

export const CONFIG_KEYS: readonly ProtocolConfigKey[] = ProtocolConfigShape.keyof().options;

export interface GlobalFlags {
  config?: string;
  program?: string;
  json?: boolean;
}

const DEFAULT_CONFIG_NAME = "tickvault.json";
const ENV_PREFIX = "TICKVAULT_";

/**
 * Validate a raw config object. Every failing field is reported.
 */
export function parseConfig(raw: unknown): ProtocolConfig {
  const result = ProtocolConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid config:\n${issues.join("\n")}`);
  }
  return result.data;
}

/**
 * Load and validate config. CLI flags override the config file, which
 * overrides TICKVAULT_* environment variables, which override defaults.
 */
export function loadConfig(flags: GlobalFlags, env: NodeJS.ProcessEnv = process.env): ProtocolConfig {
  const configPath = flags.config ?? findConfig();

  let fileConfig: Record<string, unknown> = {};
  if (configPath && existsSync(configPath)) {
    try {
      const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
      if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new Error("expected a JSON object");
      }
      fileConfig = { ...raw };
    } catch (e) {
      throw new Error(`Failed to parse config file ${configPath}: ${e}`);
    }
  } else if (flags.config) {
    throw new Error(`Config file not found: ${flags.config}`);
  }

  const merged: Record<string, unknown> = { ...envConfig(env), ...fileConfig };
  if (flags.program) merged.programId = flags.program;

  return parseConfig(merged);
}

/**
 * TICKVAULT_MAX_LEVERAGE -> maxLeverage, and so on for every key.
 */
export function envConfig(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_PREFIX + toEnvName(key)];
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

export function toEnvName(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();
}

/**
 * Find config file in cwd.
 */
function findConfig(): string | undefined {
  const path = resolve(process.cwd(), DEFAULT_CONFIG_NAME);
  return existsSync(path) ? path : undefined;
}

/**
 * Expand ~ to home directory.
 */
export function expandPath(p: string): string {
  if (p.startsWith("~/")) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? "";
    return resolve(home, p.slice(2));
  }
  return resolve(p);
}
