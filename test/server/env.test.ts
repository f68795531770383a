import { loadConfig } from "@server/lib/env";
import { describe, expect, it } from "vitest";

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig({ SESSION_SECRET: "test-secret-for-sessions" });

    expect(config).toEqual({
      PORT: 3000,
      DATABASE_PATH: "data/reading-log.sqlite",
      CACHE_DIR: "cache",
      SESSION_SECRET: "test-secret-for-sessions",
      SESSION_COOKIE: "session",
    });
  });

  it("coerces the port", () => {
    const config = loadConfig({
      SESSION_SECRET: "test-secret-for-sessions",
      PORT: "8080",
    });

    expect(config.PORT).toBe(8080);
  });

  it("rejects a short session secret", () => {
    expect(() => loadConfig({ SESSION_SECRET: "short" })).toThrow(
      "Invalid configuration: SESSION_SECRET: SESSION_SECRET must be at least 16 characters",
    );
  });
});
