import { cfg } from "./config";

// Identity provider paths
export const AUTHORIZE_ENDPOINT = "/authorize";
export const AUTHORIZE_RESUME_ENDPOINT = "/authorize/resume";
export const LOGIN_IDENTIFIER_ENDPOINT = "/u/login/identifier";
export const LOGIN_PASSWORD_ENDPOINT = "/u/login/password";
export const OAUTH_TOKEN_ENDPOINT = "/oauth/token";

// Web application path
export const CALLBACK_ENDPOINT = "/callback";

export const TYPE_FRONT = "WEB_ORDINATEUR";

export type Endpoints = {
  loginBase: string;
  appBase: string;
  backendBase: string;
  clientId: string;
};

function trimSlash(url: string) {
  return url.replace(/\/+$/, "");
}

export function resolveEndpoints(overrides: Partial<Endpoints> = {}): Endpoints {
  return {
    loginBase: trimSlash(overrides.loginBase ?? cfg.loginBase),
    appBase: trimSlash(overrides.appBase ?? cfg.appBase),
    backendBase: trimSlash(overrides.backendBase ?? cfg.backendBase),
    clientId: overrides.clientId ?? cfg.clientId,
  };
}

export function redirectUri(e: Endpoints) {
  return `${e.appBase}${CALLBACK_ENDPOINT}`;
}
