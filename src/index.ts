export {
  buildAlertsPayload,
  DAILY_THRESHOLD_MIN,
  EauClient,
  type EauClientOptions,
  MONTHLY_THRESHOLD_MIN,
  parseAlertSettings,
  validateAlertSettings,
} from "./lib/api";
export { base64UrlDecode, base64UrlEncode, pkceChallenge, urlSafeRandomToken } from "./lib/crypto";
export { FlowEngine } from "./lib/engine";
export { type Endpoints, resolveEndpoints } from "./lib/endpoints";
export * from "./lib/errors";
export { buildStepParams, FLOW_STEPS, type FlowContext, type FlowEndpoint, type FlowStep } from "./lib/flow";
export { type FetchLike, type FetchResponse, HttpSession } from "./lib/http";
export { TokenManager } from "./lib/tokens";
export type { AlertSettings, ConsumptionType, SessionData } from "./lib/types";
