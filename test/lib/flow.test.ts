import { pkceChallenge } from "../../src/lib/crypto";
import { buildStepParams, CLIENT_METADATA, FLOW_STEPS, isFlowEndpoint, stepUrl } from "../../src/lib/flow";
import { endpoints, makeContext } from "../helpers";

describe("flow descriptor", () => {
  it("declares the method and success status of each step", () => {
    expect(FLOW_STEPS["/authorize"]).toEqual({ kind: "authorize", method: "GET", successStatus: 302 });
    expect(FLOW_STEPS["/u/login/identifier"]).toEqual({ kind: "identifier", method: "POST", successStatus: 302 });
    expect(FLOW_STEPS["/u/login/password"]).toEqual({ kind: "password", method: "POST", successStatus: 302 });
    expect(FLOW_STEPS["/authorize/resume"]).toEqual({ kind: "resume", method: "GET", successStatus: 302 });
    expect(FLOW_STEPS["/callback"]).toEqual({ kind: "callback", method: "GET", successStatus: 200 });
  });

  it("recognizes only the paths of the table", () => {
    expect(isFlowEndpoint("/u/login/password")).toBe(true);
    expect(isFlowEndpoint("/u/login/mfa")).toBe(false);
    expect(isFlowEndpoint("toString")).toBe(false);
  });

  it("targets the web application for the callback only", () => {
    expect(stepUrl("/callback", endpoints)).toBe("https://app.test/callback");
    expect(stepUrl("/u/login/identifier", endpoints)).toBe("https://login.test/u/login/identifier");
  });

  it("encodes the client metadata tag", () => {
    expect(CLIENT_METADATA).toBe("eyJuYW1lIjogImF1dGgwLXJlYWN0IiwgInZlcnNpb24iOiAiMS4xMS4wIn0");
  });
});

describe("buildStepParams", () => {
  it("mints fresh state, nonce and verifier for authorize and ignores the given state", () => {
    const ctx = makeContext();
    const params = buildStepParams(FLOW_STEPS["/authorize"], ctx, "caller-state");

    expect(params).toEqual({
      audience: "https://api.test",
      redirect_uri: "https://app.test/callback",
      client_id: "test-client",
      scope: "openid profile email offline_access",
      response_type: "code",
      state: expect.stringMatching(/^[A-Za-z0-9_-]{43}$/),
      nonce: expect.stringMatching(/^[A-Za-z0-9_-]{43}$/),
      response_mode: "query",
      code_challenge: pkceChallenge(ctx.session.pkceVerifier ?? ""),
      code_challenge_method: "S256",
      auth0Client: CLIENT_METADATA,
    });
    expect(params["state"]).not.toBe("caller-state");
    expect(params["state"]).not.toBe(params["nonce"]);
    expect(ctx.session.pkceVerifier).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it("replaces the verifier on every authorize", () => {
    const ctx = makeContext();
    buildStepParams(FLOW_STEPS["/authorize"], ctx, undefined);
    const first = ctx.session.pkceVerifier;
    buildStepParams(FLOW_STEPS["/authorize"], ctx, undefined);

    expect(ctx.session.pkceVerifier).not.toBe(first);
  });

  it("sends the username with the identifier", () => {
    expect(buildStepParams(FLOW_STEPS["/u/login/identifier"], makeContext(), "S1")).toEqual({
      state: "S1",
      username: "user@example.com",
      "js-available": "true",
      "webauthn-available": "true",
      "is-brave": "false",
      "webauthn-platform-available": "false",
      action: "default",
    });
  });

  it("sends username and password with the password", () => {
    expect(buildStepParams(FLOW_STEPS["/u/login/password"], makeContext(), "S2")).toEqual({
      state: "S2",
      username: "user@example.com",
      password: "test-password",
      action: "default",
    });
  });

  it("sends the stored authorization code to the callback", () => {
    const ctx = makeContext();
    ctx.session.authorizationCode = "C";

    expect(buildStepParams(FLOW_STEPS["/callback"], ctx, "S3")).toEqual({ state: "S3", code: "C" });
  });

  it("sends nothing on resume", () => {
    expect(buildStepParams(FLOW_STEPS["/authorize/resume"], makeContext(), "S3")).toEqual({});
  });
});
