#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { CONFIG_KEYS, expandPath, loadConfig, type GlobalFlags, type ProtocolConfig } from "./config.js";
import { formatUnits } from "./math/units.js";
import { bigintReplacer, type LoggedEvent } from "./runtime/events.js";
import { parseScenario, ScenarioRunner, type ScenarioResult } from "./runtime/scenario.js";

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, bigintReplacer, 2));
}

function formatValue(value: unknown): string {
  if (typeof value === "object" && value !== null) return JSON.stringify(value, bigintReplacer);
  return String(value);
}

function printConfig(config: ProtocolConfig): void {
  const width = Math.max(...CONFIG_KEYS.map((k) => k.length));
  for (const key of CONFIG_KEYS) {
    console.log(`${key.padEnd(width)}  ${formatValue(config[key] ?? "(derived)")}`);
  }
}

function printEvent({ timestamp, event }: LoggedEvent): void {
  const { type, ...fields } = event;
  const details = Object.entries(fields)
    .map(([k, v]) => `${k}=${formatValue(v)}`)
    .join(" ");
  console.log(`[${timestamp}] ${type} ${details}`);
}

function printResult(result: ScenarioResult): void {
  if (result.name) console.log(`Scenario: ${result.name}\n`);

  console.log("Events:");
  for (const entry of result.events) printEvent(entry);

  const failed = result.outcomes.filter((o) => !o.ok);
  if (failed.length > 0) {
    console.log("\nExpected failures:");
    for (const o of failed) console.log(`  step ${o.index} (${o.step}): ${o.error}`);
  }

  console.log("\nBalances:");
  for (const [key, value] of Object.entries(result.balances)) {
    console.log(`  ${key.padEnd(20)} ${formatUnits(value, 18)}`);
  }

  console.log("\nUsers:");
  for (const [name, u] of Object.entries(result.users)) {
    console.log(
      `  ${name.padEnd(12)} asset=${formatUnits(u.asset, 18)} native=${formatUnits(u.native, 18)} usdn=${formatUnits(u.usdn, 18)}`,
    );
  }
}

const program = new Command();

program
  .name("tickvault")
  .description("Tick-ladder leverage engine with an elastic-supply vault, on an in-memory ledger")
  .version("0.1.0")
  .option("-c, --config <path>", "config file (default: ./tickvault.json)")
  .option("-p, --program <pubkey>", "program id used to derive protocol accounts")
  .option("--json", "print JSON");

program
  .command("config")
  .description("Print the resolved protocol config")
  .action((_opts: unknown, cmd: Command) => {
    const flags: GlobalFlags = cmd.optsWithGlobals();
    const config = loadConfig(flags);
    if (flags.json) printJson(config);
    else printConfig(config);
  });

program
  .command("simulate")
  .description("Replay a JSON scenario against a fresh deployment")
  .argument("<file>", "scenario file")
  .action((file: string, _opts: unknown, cmd: Command) => {
    const flags: GlobalFlags = cmd.optsWithGlobals();
    const base = loadConfig(flags);
    const raw: unknown = JSON.parse(readFileSync(expandPath(file), "utf-8"));
    const scenario = parseScenario(raw);
    scenario.config = { ...base, ...scenario.config };

    const result = new ScenarioRunner(scenario).run();
    if (flags.json) printJson(result);
    else printResult(result);
  });

try {
  program.parse();
} catch (e) {
  console.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}
