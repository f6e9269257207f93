import process from "node:process";
import { cfg, type LogLevel } from "./config";

function isStdoutTTY(): boolean {
  try {
    return !!process.stdout.isTTY;
  } catch {
    return false;
  }
}

const NO_COLOR = !!process.env["NO_COLOR"];
const COLOR_ENABLED = !NO_COLOR && isStdoutTTY();

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function color(s: string, code: number) {
  return COLOR_ENABLED ? `\x1b[${code}m${s}\x1b[0m` : s;
}

function enabled(level: LogLevel) {
  return LEVELS[level] >= LEVELS[cfg.logLevel];
}

function joinArgs(args: unknown[]) {
  return args.map((a) => {
    try {
      if (typeof a === "string") return a;

      if (a instanceof Error) return formatError(a);

      // Use custom toString when defined (and not the base Object implementation)
      if (a != null && typeof a === "object") {
        const ts: unknown = Reflect.get(a, "toString");
        if (typeof ts === "function" && ts !== Object.prototype.toString) {
          const str: unknown = ts.call(a);
          if (typeof str === "string" && str.length) return str;
        }
      }

      if (typeof a === "number" || typeof a === "boolean" || typeof a === "bigint" || typeof a === "symbol") {
        return String(a);
      }

      const json = JSON.stringify(a);
      return json !== undefined ? json : String(a);
    } catch {
      try {
        return String(a);
      } catch {
        return "[Unprintable]";
      }
    }
  }).join(" ");
}

// Format unknown errors (Error, string, or anything) into a readable string for logging.
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.toString();
  try {
    return typeof err === "string" ? err : JSON.stringify(err);
  } catch {
    return String(err);
  }
}

const SECRET_KEYS = new Set(["password", "code_verifier", "access_token"]);

// Copy of request params safe to print: secrets replaced by asterisks.
export function redactParams(params: Record<string, unknown> | undefined): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(params ?? {})) {
    out[k] = SECRET_KEYS.has(k) && v ? "******" : v;
  }
  return out;
}

export const log = {
  // command results; printed whatever the level
  out: (...args: unknown[]) => {
    console.log(joinArgs(args));
  },
  debug: (...args: unknown[]) => {
    if (enabled("debug")) console.log(color(`·· ${joinArgs(args)}`, 90)); // dim
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) console.log(joinArgs(args));
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) console.warn(color(`⚠ ${joinArgs(args)}`, 33)); // yellow
  },
  error: (...args: unknown[]) => {
    if (enabled("error")) console.error(color(`✖ ${joinArgs(args)}`, 31)); // red
  },
};
