import { RequestError, UnsupportedMethodError } from "../../src/lib/errors";
import { type FetchResponse, HttpSession } from "../../src/lib/http";
import { redactParams } from "../../src/lib/log";
import { FetchMock } from "../fetch-mock";

describe("HttpSession", () => {
  let fetchMock: FetchMock;
  let http: HttpSession;

  beforeEach(() => {
    fetchMock = new FetchMock();
    http = new HttpSession({ fetch: fetchMock.fetch, timeoutMs: 1000 });
  });

  it("never follows redirects on form requests", async () => {
    fetchMock.mockResponseOnce(302, { headers: { Location: "/next" } });

    await http.sendFormRequest("https://login.test/step", "GET", { a: "1" });

    const init = fetchMock.fetch.mock.calls[0]?.[1];
    expect(init?.redirect).toBe("manual");
    expect(fetchMock.request(0).url.href).toBe("https://login.test/step?a=1");
  });

  it("form-encodes POST parameters", async () => {
    fetchMock.mockResponseOnce(302);

    await http.sendFormRequest("https://login.test/step", "POST", { username: "a b", password: "p&q" });

    expect(fetchMock.request(0).body).toBe("username=a+b&password=p%26q");
    expect(fetchMock.request(0).headers["Cache-Control"]).toBe("no-cache");
  });

  it("rejects other methods without sending anything", async () => {
    await expect(http.sendFormRequest("https://login.test/step", "PUT")).rejects.toBeInstanceOf(
      UnsupportedMethodError,
    );
    expect(fetchMock.fetch).not.toHaveBeenCalled();
  });

  it("wraps transport failures in a request error", async () => {
    fetchMock.mockErrorOnce(new Error("socket hang up"));

    const err = await http.requestJson("https://api.test/x?y=1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RequestError);
    expect(err).toMatchObject({
      message: "GET https://api.test/x failed: Error: socket hang up",
      url: "https://api.test/x?y=1",
    });
  });

  it("aborts a request that outlives the timeout", async () => {
    const hanging = jest.fn(
      (_url: string, init: RequestInit) =>
        new Promise<FetchResponse>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const slow = new HttpSession({ fetch: hanging, timeoutMs: 20 });

    const err = await slow.requestJson("https://api.test/x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RequestError);
    expect(err).toMatchObject({ message: "GET https://api.test/x failed: Error: aborted" });
  });

  it("skips undefined query values", async () => {
    fetchMock.mockResponseOnce(200);

    await http.requestJson("https://api.test/x", { query: { a: 1, b: undefined, c: "z" } });

    expect(fetchMock.request(0).url.search).toBe("?a=1&c=z");
  });

  it("drops cookies on close", async () => {
    fetchMock.mockResponseOnce(200, { setCookies: ["sid=1"] });
    await http.requestJson("https://api.test/x");
    expect(http.cookieHeader("api.test")).toBe("sid=1");

    http.close();

    expect(http.cookieHeader("api.test")).toBeUndefined();
  });
});

describe("redactParams", () => {
  it("masks the password", () => {
    expect(redactParams({ username: "user@example.com", password: "test-password", state: "S" })).toEqual({
      username: "user@example.com",
      password: "******",
      state: "S",
    });
  });
});
