import { DungeonError } from "@cryptforge/contracts";
import { describe, expect, it } from "vitest";
import { corsOrigins, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: "0.0.0.0",
      corsOrigin: "*",
      nodeEnv: "development",
    });
  });

  it("reads the environment", () => {
    expect(
      loadConfig({
        PORT: "9000",
        HOST: "127.0.0.1",
        CORS_ORIGIN: "http://game.test",
        NODE_ENV: "production",
      }),
    ).toEqual({
      port: 9000,
      host: "127.0.0.1",
      corsOrigin: "http://game.test",
      nodeEnv: "production",
    });
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(DungeonError);
  });

  it("lists every rejected variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "70000", NODE_ENV: "staging" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DungeonError);
    if (!(caught instanceof DungeonError)) return;
    expect(caught.code).toBe("CONFIG_INVALID");
    expect(caught.details).toEqual({
      issues: [
        { path: "PORT", message: expect.any(String) },
        { path: "NODE_ENV", message: expect.any(String) },
      ],
    });
  });
});

describe("corsOrigins", () => {
  const config = loadConfig({});

  it("allows every origin for *", () => {
    expect(corsOrigins(config)).toBe(true);
  });

  it("splits a comma-separated list", () => {
    expect(
      corsOrigins({ ...config, corsOrigin: "http://a.test, http://b.test," }),
    ).toEqual(["http://a.test", "http://b.test"]);
  });
});
