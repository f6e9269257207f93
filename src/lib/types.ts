export type AlertSettings = {
  dailyEnabled: boolean;
  dailyThreshold: number | null; // liters, minimum 100
  dailyNotifEmail: boolean | null; // always true upstream, cannot be disabled
  dailyNotifSms: boolean | null;
  monthlyEnabled: boolean;
  monthlyThreshold: number | null; // m3, minimum 1
  monthlyNotifEmail: boolean | null;
  monthlyNotifSms: boolean | null;
};

export type SessionData = {
  accessToken?: string;
  tokenExpiration: number; // epoch seconds, 0 = expired
  authorizationCode?: string;
  pkceVerifier?: string;
  subscriptionId?: string;
  meteringPointId?: string;
  contactId?: string;
  customerId?: string;
  meterNumber?: string;
  subscriptionStartDate?: string;
  monthlyConsumption?: unknown;
  dailyConsumption?: unknown;
  alertSettings?: AlertSettings;
};

export function createSessionData(): SessionData {
  return { tokenExpiration: 0 };
}

// Every field a data call needs, all set once login succeeded.
export function isSessionComplete(s: SessionData): boolean {
  return !!(
    s.accessToken &&
    s.subscriptionId &&
    s.meteringPointId &&
    s.contactId &&
    s.customerId &&
    s.meterNumber &&
    s.subscriptionStartDate
  );
}

export type ConsumptionType = "monthly" | "yearly";

// Wire shapes

export type TokenResponse = {
  access_token?: string;
  expires_in?: number; // seconds
  token_type?: string;
  scope?: string;
};

export type AccountResponse = {
  contacts?: Array<{
    id_contact?: string | number;
    tiers?: Array<{
      id?: string | number;
      abonnements?: Array<{
        id_abonnement?: string | number;
        numero_compteur?: string | number;
      }>;
    }>;
  }>;
};

export type BillingResponse = {
  numero_pds?: string;
  date_debut_abonnement?: string;
};

type AlertThreshold = {
  valeur: number;
  unite?: string;
  moyen_contact: {
    souscrit_par_email: boolean;
    souscrit_par_mobile: boolean;
  };
};

export type AlertsResponse = {
  seuils?: {
    journalier?: AlertThreshold | null;
    mensuel?: AlertThreshold | null;
  };
};

type AlertPayloadEntry = {
  seuil: number;
  unite: "L" | "M3";
  souscrite: true;
  contact_channel: {
    subscribed_by_email: boolean | null;
    subscribed_by_mobile: boolean | null;
  };
};

export type AlertsPayload = {
  alerte_journaliere?: AlertPayloadEntry;
  alerte_mensuelle?: AlertPayloadEntry;
  contact_id?: string;
  numero_compteur?: string;
  tiers_id?: string;
  abo_id: string;
  type_front: string;
};
