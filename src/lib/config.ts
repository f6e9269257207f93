import dotenv from "dotenv";
import process from "node:process";
dotenv.config();

const APP_NAME = "eauctl";
const APP_VERSION = "0.1.0";

const ENV_PREFIX = APP_NAME.toUpperCase();

export type LogLevel = "debug" | "info" | "warn" | "error";

function envInt(name: string, fallback: number): number {
  const raw = process.env[`${ENV_PREFIX}_${name}`];
  const n = raw ? Number.parseInt(raw, 10) : NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function envLogLevel(): LogLevel {
  const raw = (process.env[`${ENV_PREFIX}_LOG_LEVEL`] ?? "").toLowerCase();
  return raw === "debug" || raw === "warn" || raw === "error" ? raw : "info";
}

export const cfg = {
  appName: APP_NAME,
  version: APP_VERSION,
  username: process.env[`${ENV_PREFIX}_USERNAME`] ?? "",
  password: process.env[`${ENV_PREFIX}_PASSWORD`] ?? "",
  // identity provider (authorize, login pages, token endpoint)
  loginBase: process.env[`${ENV_PREFIX}_LOGIN_URL`] ?? "https://login.eau.veolia.fr",
  // web application receiving the OAuth callback
  appBase: process.env[`${ENV_PREFIX}_APP_URL`] ?? "https://www.eau.veolia.fr",
  // data API, also the token audience
  backendBase: process.env[`${ENV_PREFIX}_BACKEND_URL`] ?? "https://prd-ael-sirius-backend.istefr.fr",
  clientId: process.env[`${ENV_PREFIX}_CLIENT_ID`] ?? "tHBtoPOLiI2NSbCzqYz6pydZ1Xil0Bw0",
  requestTimeoutMs: envInt("TIMEOUT_MS", 15_000),
  logLevel: envLogLevel(),
};
