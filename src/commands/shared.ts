import { type Command, InvalidArgumentError as CommanderArgumentError } from "commander";
import process from "node:process";
import { stringify as toYaml } from "yaml";
import { EauClient } from "../lib/api";
import { cfg } from "../lib/config";
import { log } from "../lib/log";
import { Input, Secret } from "../lib/prompt";

export type OutputFormat = "json" | "yaml";

export type ClientOpts = {
  username?: string;
  password?: string;
  format?: OutputFormat;
};

export function parseIntArg(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || String(n) !== value.trim()) {
    throw new CommanderArgumentError("Not an integer.");
  }
  return n;
}

export function parseFormat(value: string): OutputFormat {
  if (value !== "json" && value !== "yaml") {
    throw new CommanderArgumentError("Expected json or yaml.");
  }
  return value;
}

export function withClientOptions(cmd: Command): Command {
  return cmd
    .option("--username <username>", `Account email (default: $${cfg.appName.toUpperCase()}_USERNAME)`)
    .option("--password <password>", `Account password (default: $${cfg.appName.toUpperCase()}_PASSWORD)`)
    .option("--format <format>", "Output format: json or yaml", parseFormat, "json");
}

export function formatOutput(data: unknown, format: OutputFormat = "json"): string {
  return format === "yaml" ? toYaml(data) : JSON.stringify(data, null, 2);
}

async function resolveCredentials(opts: ClientOpts) {
  let username = (opts.username ?? cfg.username).trim();
  let password = opts.password ?? cfg.password;

  if (!username && process.stdin.isTTY) {
    username = (await Input.prompt({
      message: "Account email:",
      validate: (v: string) => /\S+@\S+\.\S+/.test(v.trim()) || "Enter a valid email address",
    })).trim();
  }
  if (!password && process.stdin.isTTY) {
    password = await Secret.prompt({ message: "Password:" });
  }
  return { username, password };
}

/**
 * Opens a client for the duration of `fn`, logging failures and setting a
 * non-zero exit code instead of throwing.
 */
export async function withClient(opts: ClientOpts, fn: (client: EauClient) => Promise<void>) {
  const client = new EauClient(await resolveCredentials(opts));
  try {
    await fn(client);
  } catch (e) {
    log.error(e);
    process.exitCode = 1;
  } finally {
    client.close();
  }
}
