import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    const config = loadConfig({});
    expect(config.webappUrl).toBe("https://twitter.com");
    expect(config.graphqlUrl).toBe("https://twitter.com/i/api/graphql");
    expect(config.apiUrl).toBe("https://api.twitter.com/1.1");
    expect(config.timeoutMs).toBe(10_000);
    expect(config.reportClientEvent).toBe(true);
    expect(config.userAgent).toContain("Mozilla/5.0");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      ROOST_WEBAPP_URL: "https://x.com",
      ROOST_GRAPHQL_URL: "https://x.com/i/api/graphql",
      ROOST_TIMEOUT_MS: "2500",
      ROOST_CLIENT_EVENT: "false",
      ROOST_USER_AGENT: "roost-test",
    });
    expect(config.webappUrl).toBe("https://x.com");
    expect(config.graphqlUrl).toBe("https://x.com/i/api/graphql");
    expect(config.timeoutMs).toBe(2500);
    expect(config.reportClientEvent).toBe(false);
    expect(config.userAgent).toBe("roost-test");
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ ROOST_TIMEOUT_MS: "", ROOST_WEBAPP_URL: "" }).timeoutMs).toBe(10_000);
  });

  it("names every invalid variable", () => {
    try {
      loadConfig({ ROOST_WEBAPP_URL: "not a url", ROOST_TIMEOUT_MS: "-5" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.keys).toEqual(["ROOST_WEBAPP_URL", "ROOST_TIMEOUT_MS"]);
    }
  });
});
