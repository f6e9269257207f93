import { FlowEngine } from "./engine";
import { OAUTH_TOKEN_ENDPOINT, redirectUri, TYPE_FRONT } from "./endpoints";
import { FlowStepError, MissingCredentialsError, MissingFieldError, RequestError } from "./errors";
import type { FlowContext } from "./flow";
import type { HttpSession } from "./http";
import { log } from "./log";
import {
  type AccountResponse,
  type BillingResponse,
  isSessionComplete,
  type TokenResponse,
} from "./types";

export function nowSeconds() {
  return Math.floor(Date.now() / 1000);
}

// Upstream ids come back as strings or numbers depending on the record.
function asId(v: unknown): string | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  if (typeof v === "string" && v.length) return v;
  return undefined;
}

function required(value: string | undefined, field: string): string {
  if (!value) throw new MissingFieldError(field);
  return value;
}

/**
 * Owns the access token of one client: obtains it through the login flow,
 * tracks its expiry and logs in again when it is missing or expired.
 */
export class TokenManager {
  private readonly http: HttpSession;
  private readonly ctx: FlowContext;
  private pendingLogin: Promise<boolean> | null = null;

  constructor(http: HttpSession, ctx: FlowContext) {
    this.http = http;
    this.ctx = ctx;
  }

  hasValidToken(): boolean {
    const s = this.ctx.session;
    return !!s.accessToken && nowSeconds() < s.tokenExpiration;
  }

  /**
   * Resolves once the session holds an unexpired token and every account
   * identifier. Joins a login already in progress instead of reading a
   * half-filled session.
   */
  async ensureValidToken(): Promise<void> {
    if (!this.pendingLogin && this.hasValidToken() && isSessionComplete(this.ctx.session)) return;

    if (!this.pendingLogin) {
      log.debug(this.ctx.session.accessToken ? "Session expired or incomplete, logging in again" : "No access token, logging in");
    }
    const ok = await this.login();
    if (!ok) {
      throw new MissingFieldError("account", "Login did not resolve every account identifier");
    }
  }

  /**
   * Runs the whole login: flow, token exchange, account identifiers. Resolves
   * false when an identifier is still missing afterwards; flow failures throw.
   * Concurrent calls share the login already in progress.
   */
  login(): Promise<boolean> {
    if (!this.pendingLogin) {
      this.pendingLogin = this.runLogin()
        .catch((e: unknown) => {
          // the next call logs in again
          this.ctx.session.accessToken = undefined;
          this.ctx.session.tokenExpiration = 0;
          throw e;
        })
        .finally(() => {
          this.pendingLogin = null;
        });
    }
    return this.pendingLogin;
  }

  private async runLogin(): Promise<boolean> {
    if (!this.ctx.username || !this.ctx.password) {
      throw new MissingCredentialsError();
    }

    log.info("Starting login process...");
    await new FlowEngine(this.http, this.ctx).execute();
    await this.exchangeCodeForToken();
    await this.resolveAccountIdentifiers();

    if (isSessionComplete(this.ctx.session)) {
      log.info("Login successful");
      return true;
    }
    log.warn("Login finished without every account identifier");
    return false;
  }

  async exchangeCodeForToken(): Promise<void> {
    const s = this.ctx.session;
    const url = `${this.ctx.endpoints.loginBase}${OAUTH_TOKEN_ENDPOINT}`;

    log.debug("Requesting access token...");
    const res = await this.http.requestJson(url, {
      method: "POST",
      body: {
        client_id: this.ctx.endpoints.clientId,
        grant_type: "authorization_code",
        code_verifier: s.pkceVerifier,
        code: s.authorizationCode,
        redirect_uri: redirectUri(this.ctx.endpoints),
      },
    });

    if (res.status !== 200) {
      throw new FlowStepError("Token API call error", res.status, url);
    }

    const data = (await res.json()) as TokenResponse | null;
    const token = data?.access_token;
    if (!token) {
      throw new MissingFieldError("access_token", "Access token not found in the token response");
    }

    const expiresIn = typeof data?.expires_in === "number" ? data.expires_in : 0;
    s.accessToken = token;
    s.tokenExpiration = nowSeconds() + expiresIn;
    // single use
    s.authorizationCode = undefined;
    log.debug(`Access token received, expires in ${expiresIn}s`);
  }

  /** Reads the subscription identifiers every data call is scoped to. */
  async resolveAccountIdentifiers(): Promise<void> {
    const s = this.ctx.session;
    const base = this.ctx.endpoints.backendBase;
    const bearer = s.accessToken;

    const accountUrl = `${base}/espace-client`;
    const accountRes = await this.http.requestJson(accountUrl, { query: { "type-front": TYPE_FRONT }, bearer });
    if (accountRes.status !== 200) {
      throw new RequestError("Espace-client call error", accountRes.status, accountUrl);
    }

    const account = (await accountRes.json()) as AccountResponse | null;
    const contact = account?.contacts?.[0];
    const tiers = contact?.tiers?.[0];
    const subscription = tiers?.abonnements?.[0];

    const subscriptionId = required(asId(subscription?.id_abonnement), "id_abonnement");
    s.subscriptionId = subscriptionId;
    s.customerId = required(asId(tiers?.id), "tiers.id");
    s.contactId = required(asId(contact?.id_contact), "id_contact");
    s.meterNumber = required(asId(subscription?.numero_compteur), "numero_compteur");

    const billingUrl = `${base}/abonnements/${encodeURIComponent(subscriptionId)}/facturation`;
    const billingRes = await this.http.requestJson(billingUrl, { bearer });
    if (billingRes.status !== 200) {
      throw new RequestError("Facturation call error", billingRes.status, billingUrl);
    }

    const billing = (await billingRes.json()) as BillingResponse | null;
    s.meteringPointId = required(asId(billing?.numero_pds), "numero_pds");
    s.subscriptionStartDate = required(asId(billing?.date_debut_abonnement), "date_debut_abonnement");
  }
}
