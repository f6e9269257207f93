import { cfg } from "./config";
import { type Endpoints, resolveEndpoints, TYPE_FRONT } from "./endpoints";
import { InvalidArgumentError, RequestError } from "./errors";
import type { FlowContext } from "./flow";
import { type FetchLike, HttpSession } from "./http";
import { log } from "./log";
import { TokenManager } from "./tokens";
import {
  type AlertSettings,
  type AlertsPayload,
  type AlertsResponse,
  type ConsumptionType,
  createSessionData,
  type SessionData,
} from "./types";

export const DAILY_THRESHOLD_MIN = 100; // liters
export const MONTHLY_THRESHOLD_MIN = 1; // m3

export type EauClientOptions = {
  username?: string;
  password?: string;
  endpoints?: Partial<Endpoints>;
  fetch?: FetchLike;
  timeoutMs?: number;
};

export function parseAlertSettings(data: AlertsResponse | null): AlertSettings {
  const daily = data?.seuils?.journalier ?? null;
  const monthly = data?.seuils?.mensuel ?? null;

  return {
    dailyEnabled: !!daily,
    dailyThreshold: daily ? daily.valeur : null,
    dailyNotifEmail: daily ? daily.moyen_contact.souscrit_par_email : null,
    dailyNotifSms: daily ? daily.moyen_contact.souscrit_par_mobile : null,
    monthlyEnabled: !!monthly,
    monthlyThreshold: monthly ? monthly.valeur : null,
    monthlyNotifEmail: monthly ? monthly.moyen_contact.souscrit_par_email : null,
    monthlyNotifSms: monthly ? monthly.moyen_contact.souscrit_par_mobile : null,
  };
}

function belowMin(threshold: number | null, min: number) {
  return threshold == null || !Number.isFinite(threshold) || threshold < min;
}

export function validateAlertSettings(settings: AlertSettings): void {
  if (settings.dailyEnabled && belowMin(settings.dailyThreshold, DAILY_THRESHOLD_MIN)) {
    throw new InvalidArgumentError(`Daily threshold must be at least ${DAILY_THRESHOLD_MIN} liters`);
  }
  if (settings.monthlyEnabled && belowMin(settings.monthlyThreshold, MONTHLY_THRESHOLD_MIN)) {
    throw new InvalidArgumentError(`Monthly threshold must be at least ${MONTHLY_THRESHOLD_MIN} m3`);
  }
}

/**
 * Body of the alerts POST. A period is sent only when enabled; omitting it
 * unsubscribes that alert.
 */
export function buildAlertsPayload(settings: AlertSettings, session: SessionData): AlertsPayload {
  const payload: AlertsPayload = {
    contact_id: session.contactId,
    numero_compteur: session.meterNumber,
    tiers_id: session.customerId,
    abo_id: String(session.subscriptionId ?? ""),
    type_front: TYPE_FRONT,
  };

  if (settings.dailyEnabled && settings.dailyThreshold != null) {
    payload.alerte_journaliere = {
      seuil: settings.dailyThreshold,
      unite: "L",
      souscrite: true,
      contact_channel: {
        subscribed_by_email: settings.dailyNotifEmail,
        subscribed_by_mobile: settings.dailyNotifSms,
      },
    };
  }

  if (settings.monthlyEnabled && settings.monthlyThreshold != null) {
    payload.alerte_mensuelle = {
      seuil: settings.monthlyThreshold,
      unite: "M3",
      souscrite: true,
      contact_channel: {
        subscribed_by_email: settings.monthlyNotifEmail,
        subscribed_by_mobile: settings.monthlyNotifSms,
      },
    };
  }

  return payload;
}

/**
 * Client for one residential account. Every data call makes sure a valid
 * token is held first, logging in again when it is missing or expired.
 */
export class EauClient {
  private readonly http: HttpSession;
  private readonly tokens: TokenManager;
  private readonly ctx: FlowContext;

  constructor(opts: EauClientOptions = {}) {
    this.http = new HttpSession({ fetch: opts.fetch, timeoutMs: opts.timeoutMs });
    this.ctx = {
      username: opts.username ?? cfg.username,
      password: opts.password ?? cfg.password,
      endpoints: resolveEndpoints(opts.endpoints),
      session: createSessionData(),
    };
    this.tokens = new TokenManager(this.http, this.ctx);
  }

  get session(): SessionData {
    return this.ctx.session;
  }

  login(): Promise<boolean> {
    return this.tokens.login();
  }

  ensureValidToken(): Promise<void> {
    return this.tokens.ensureValidToken();
  }

  async getConsumptionData(type: ConsumptionType, year: number, month?: number): Promise<unknown> {
    let endpoint: string;
    if (type === "monthly" && month !== undefined) {
      if (!Number.isInteger(month) || month < 1 || month > 12) {
        throw new InvalidArgumentError(`Invalid month: ${month}`);
      }
      endpoint = "journalieres";
    } else if (type === "yearly") {
      endpoint = "mensuelles";
    } else {
      throw new InvalidArgumentError("Invalid data type or missing month for monthly data");
    }

    await this.tokens.ensureValidToken();
    const s = this.ctx.session;
    const url = `${this.ctx.endpoints.backendBase}/consommations/${encodeURIComponent(s.subscriptionId ?? "")}/${endpoint}`;

    const res = await this.http.requestJson(url, {
      bearer: s.accessToken,
      query: {
        annee: year,
        "numero-pds": s.meteringPointId,
        "date-debut-abonnement": s.subscriptionStartDate,
        mois: endpoint === "journalieres" ? month : undefined,
      },
    });

    log.debug(`Consumption (${type}) response status ${res.status}`);
    if (res.status !== 200) {
      throw new RequestError("Get data call error", res.status, url, await res.text().catch(() => ""));
    }
    return await res.json();
  }

  async getAlerts(): Promise<AlertSettings> {
    await this.tokens.ensureValidToken();
    const s = this.ctx.session;
    const url = `${this.ctx.endpoints.backendBase}/alertes/${encodeURIComponent(s.meteringPointId ?? "")}`;

    const res = await this.http.requestJson(url, {
      bearer: s.accessToken,
      query: { abo_id: s.subscriptionId },
    });
    if (res.status !== 200) {
      throw new RequestError(`Get alerts call error status code ${res.status}`, res.status, url);
    }

    return parseAlertSettings((await res.json()) as AlertsResponse | null);
  }

  async setAlerts(settings: AlertSettings): Promise<void> {
    validateAlertSettings(settings);

    await this.tokens.ensureValidToken();
    const s = this.ctx.session;
    const url = `${this.ctx.endpoints.backendBase}/alertes/${encodeURIComponent(s.meteringPointId ?? "")}`;

    const res = await this.http.requestJson(url, {
      method: "POST",
      bearer: s.accessToken,
      body: buildAlertsPayload(settings, s),
    });
    if (res.status !== 204) {
      throw new RequestError(`Set alerts call error status code ${res.status}`, res.status, url);
    }
    log.debug("Alert settings updated");
  }

  /** Yearly and monthly consumption plus alert settings, kept on {@link session}. */
  async fetchAllData(year: number, month: number): Promise<SessionData> {
    const s = this.ctx.session;
    s.monthlyConsumption = await this.getConsumptionData("yearly", year);
    s.dailyConsumption = await this.getConsumptionData("monthly", year, month);
    s.alertSettings = await this.getAlerts();
    return s;
  }

  close() {
    this.http.close();
    this.ctx.session = createSessionData();
  }
}
