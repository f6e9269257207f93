import { Buffer } from "node:buffer";
import { base64UrlEncode, pkceChallenge, urlSafeRandomToken } from "./crypto";
import {
  AUTHORIZE_ENDPOINT,
  AUTHORIZE_RESUME_ENDPOINT,
  CALLBACK_ENDPOINT,
  type Endpoints,
  LOGIN_IDENTIFIER_ENDPOINT,
  LOGIN_PASSWORD_ENDPOINT,
  redirectUri,
} from "./endpoints";
import type { HttpMethod } from "./http";
import type { SessionData } from "./types";

export const SCOPES = "openid profile email offline_access";
export const CODE_CHALLENGE_METHOD = "S256";

// Client metadata tag the web front end sends on /authorize.
export const CLIENT_METADATA = base64UrlEncode(
  Buffer.from('{"name": "auth0-react", "version": "1.11.0"}', "utf8"),
);

export type StepKind = "authorize" | "resume" | "identifier" | "password" | "callback";

export type FlowStep = {
  readonly kind: StepKind;
  readonly method: HttpMethod;
  readonly successStatus: number;
};

/** Login sequence, keyed by the path each step is reached at. */
export const FLOW_STEPS = {
  [AUTHORIZE_ENDPOINT]: { kind: "authorize", method: "GET", successStatus: 302 },
  [LOGIN_IDENTIFIER_ENDPOINT]: { kind: "identifier", method: "POST", successStatus: 302 },
  [LOGIN_PASSWORD_ENDPOINT]: { kind: "password", method: "POST", successStatus: 302 },
  [AUTHORIZE_RESUME_ENDPOINT]: { kind: "resume", method: "GET", successStatus: 302 },
  [CALLBACK_ENDPOINT]: { kind: "callback", method: "GET", successStatus: 200 },
} as const satisfies Record<string, FlowStep>;

export type FlowEndpoint = keyof typeof FLOW_STEPS;

export function isFlowEndpoint(path: string): path is FlowEndpoint {
  return Object.prototype.hasOwnProperty.call(FLOW_STEPS, path);
}

export type FlowContext = {
  username: string;
  password: string;
  endpoints: Endpoints;
  session: SessionData;
};

export type StepParams = Record<string, string>;

function authorizeParams(ctx: FlowContext): StepParams {
  const state = urlSafeRandomToken();
  const nonce = urlSafeRandomToken();
  const verifier = urlSafeRandomToken();
  ctx.session.pkceVerifier = verifier;

  return {
    audience: ctx.endpoints.backendBase,
    redirect_uri: redirectUri(ctx.endpoints),
    client_id: ctx.endpoints.clientId,
    scope: SCOPES,
    response_type: "code",
    state,
    nonce,
    response_mode: "query",
    code_challenge: pkceChallenge(verifier),
    code_challenge_method: CODE_CHALLENGE_METHOD,
    auth0Client: CLIENT_METADATA,
  };
}

/**
 * Parameters for one step. The authorize step ignores `state` and mints a new
 * one (along with nonce and PKCE verifier) on every call.
 */
export function buildStepParams(step: FlowStep, ctx: FlowContext, state: string | undefined): StepParams {
  const current = state ?? "";
  switch (step.kind) {
    case "authorize":
      return authorizeParams(ctx);
    case "identifier":
      return {
        state: current,
        username: ctx.username,
        "js-available": "true",
        "webauthn-available": "true",
        "is-brave": "false",
        "webauthn-platform-available": "false",
        action: "default",
      };
    case "password":
      return {
        state: current,
        username: ctx.username,
        password: ctx.password,
        action: "default",
      };
    case "callback":
      return {
        state: current,
        code: ctx.session.authorizationCode ?? "",
      };
    case "resume":
      return {};
    default: {
      const unreachable: never = step.kind;
      throw new Error(`Unknown flow step: ${String(unreachable)}`);
    }
  }
}

// Every step but the callback lives on the identity provider.
export function stepUrl(path: FlowEndpoint, endpoints: Endpoints): string {
  return path === CALLBACK_ENDPOINT ? `${endpoints.appBase}${path}` : `${endpoints.loginBase}${path}`;
}
