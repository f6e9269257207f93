import type { Endpoints } from "../src/lib/endpoints";
import type { FlowContext } from "../src/lib/flow";
import { createSessionData } from "../src/lib/types";
import type { FetchMock } from "./fetch-mock";

export const NOW_MS = 1_700_000_000_000;
export const NOW_S = 1_700_000_000;

export const endpoints: Endpoints = {
  loginBase: "https://login.test",
  appBase: "https://app.test",
  backendBase: "https://api.test",
  clientId: "test-client",
};

export function makeContext(overrides: Partial<FlowContext> = {}): FlowContext {
  return {
    username: "user@example.com",
    password: "test-password",
    endpoints,
    session: createSessionData(),
    ...overrides,
  };
}

export const accountBody = {
  contacts: [
    {
      id_contact: "CONTACT1",
      tiers: [{ id: 4242, abonnements: [{ id_abonnement: "SUB1", numero_compteur: "METER1" }] }],
    },
  ],
};

export const billingBody = { numero_pds: "PDS1", date_debut_abonnement: "2020-01-01" };

// authorize -> identifier -> password -> callback, as the identity provider answers them.
export function queueFlow(mock: FetchMock, code = "C") {
  mock
    .mockResponseOnce(302, { headers: { Location: "https://login.test/u/login/identifier?state=S1" } })
    .mockResponseOnce(302, { headers: { Location: "/u/login/password?state=S2" } })
    .mockResponseOnce(302, { headers: { Location: `https://app.test/callback?code=${code}` } })
    .mockResponseOnce(200, { body: "<html></html>" });
}

export function queueLogin(mock: FetchMock, token = "T", expiresIn = 3600) {
  queueFlow(mock);
  mock
    .mockResponseOnce(200, { body: { access_token: token, expires_in: expiresIn } })
    .mockResponseOnce(200, { body: accountBody })
    .mockResponseOnce(200, { body: billingBody });
}

export const LOGIN_REQUESTS = 7;

export const completeSession = {
  subscriptionId: "SUB1",
  meteringPointId: "PDS1",
  contactId: "CONTACT1",
  customerId: "4242",
  meterNumber: "METER1",
  subscriptionStartDate: "2020-01-01",
};

// Lets pending promise callbacks and mocked fetches run.
export async function waitForRequests(mock: FetchMock, count: number) {
  for (let i = 0; i < 50 && mock.requests.length < count; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}
