import { AUTHORIZE_ENDPOINT, CALLBACK_ENDPOINT, LOGIN_PASSWORD_ENDPOINT } from "./endpoints";
import { FlowStepError, InvalidCredentialsError, MissingFieldError } from "./errors";
import {
  buildStepParams,
  FLOW_STEPS,
  type FlowContext,
  type FlowEndpoint,
  isFlowEndpoint,
  stepUrl,
} from "./flow";
import type { FetchResponse, HttpSession } from "./http";
import { log } from "./log";

export type Transition = {
  // null once the callback answered 200
  next: FlowEndpoint | null;
  state: string | undefined;
};

/**
 * Walks the login pages of the identity provider, one request per step,
 * following each 302 by hand. The `state` received on a redirect is sent back
 * on the following request; the authorization code is read from the redirect
 * that targets the callback.
 */
export class FlowEngine {
  private readonly http: HttpSession;
  private readonly ctx: FlowContext;

  constructor(http: HttpSession, ctx: FlowContext) {
    this.http = http;
    this.ctx = ctx;
  }

  async execute(): Promise<void> {
    let next: FlowEndpoint | null = AUTHORIZE_ENDPOINT;
    let state: string | undefined;

    while (next) {
      const step = FLOW_STEPS[next];
      const params = buildStepParams(step, this.ctx, state);

      let url = stepUrl(next, this.ctx.endpoints);
      if (state) {
        url = `${url}?state=${encodeURIComponent(state)}`;
      }

      const res = await this.http.sendFormRequest(url, step.method, params);
      // only status and headers matter on login pages; release the connection
      await res.body?.cancel();
      ({ next, state } = this.handleResponse(res, next, state, url));
    }
  }

  handleResponse(res: FetchResponse, current: FlowEndpoint, state: string | undefined, url: string): Transition {
    if (res.status === 400 && current === LOGIN_PASSWORD_ENDPOINT) {
      throw new InvalidCredentialsError();
    }
    if (res.status !== FLOW_STEPS[current].successStatus) {
      throw new FlowStepError(`API call to ${url} failed with status ${res.status}`, res.status, url);
    }

    if (res.status === 302) {
      const location = res.headers.get("location");
      if (!location) {
        throw new FlowStepError(`Redirect from ${url} has no Location header`, res.status, url);
      }

      const redirect = new URL(location, url);
      const path = redirect.pathname;
      if (!isFlowEndpoint(path)) {
        throw new FlowStepError(`Unexpected redirect from ${url} to ${path}`, res.status, url);
      }

      const newState = redirect.searchParams.get("state");
      if (newState) state = newState;

      if (path === CALLBACK_ENDPOINT) {
        const code = redirect.searchParams.get("code");
        if (!code) {
          throw new MissingFieldError("code", "Authorization code not found");
        }
        this.ctx.session.authorizationCode = code;
        log.debug("Authorization code received");
      }

      return { next: path, state };
    }

    if (res.status === 200 && current === CALLBACK_ENDPOINT) {
      return { next: null, state };
    }

    throw new FlowStepError(`Unexpected ${res.status} response from ${url}`, res.status, url);
  }
}
