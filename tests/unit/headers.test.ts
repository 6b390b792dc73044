import { buildApiHeaders, hasCallerCredentials } from "../../src/shared/http/headers";

describe("buildApiHeaders", () => {
  it("sends a bare token in the token header", () => {
    expect(buildApiHeaders({ contentType: "application/xml", token: "test-secret" })).toEqual({
      Accept: "application/xml",
      "Content-Type": "application/xml",
      token: "test-secret"
    });
  });

  it("sends a scheme-qualified token as Authorization", () => {
    const headers = buildApiHeaders({ contentType: "application/json", token: "Bearer test-secret" });
    expect(headers.Authorization).toBe("Bearer test-secret");
    expect(headers.token).toBeUndefined();
  });

  it("adds the proxy ticket and an explicit Accept", () => {
    expect(
      buildApiHeaders({ contentType: "application/json", accept: "application/xml", proxyTicket: "test-ticket" })
    ).toEqual({
      Accept: "application/xml",
      "Content-Type": "application/json",
      "proxy-ticket": "test-ticket"
    });
  });

  it("returns a fresh frozen object on each call", () => {
    const first = buildApiHeaders({ contentType: "application/xml" });
    const second = buildApiHeaders({ contentType: "application/json" });
    expect(Object.isFrozen(first)).toBe(true);
    expect(first).not.toBe(second);
    expect(first.Accept).toBe("application/xml");
  });

  it("ignores blank credentials", () => {
    const headers = buildApiHeaders({ contentType: "application/json", token: "  ", proxyTicket: "" });
    expect(hasCallerCredentials(headers)).toBe(false);
    expect(Object.keys(headers)).toEqual(["Accept", "Content-Type"]);
  });
});
