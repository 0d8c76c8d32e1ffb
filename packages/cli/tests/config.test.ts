/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.LOG_LEVEL).toBe("error");
    expect(config.NODE_ENV).toBe("production");
    expect(config.LOG_PRETTY).toBe(false);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "development",
      LOG_PRETTY: "true",
    });
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("development");
    expect(config.LOG_PRETTY).toBe(true);
  });

  it("turns pretty logs on in development", () => {
    expect(loadConfig({ NODE_ENV: "development" }).LOG_PRETTY).toBe(true);
  });

  it("lets LOG_PRETTY override the development default", () => {
    expect(loadConfig({ NODE_ENV: "development", LOG_PRETTY: "false" }).LOG_PRETTY).toBe(false);
    expect(loadConfig({ NODE_ENV: "test", LOG_PRETTY: "true" }).LOG_PRETTY).toBe(true);
  });

  it("accepts the silent level", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe("silent");
  });

  it("treats anything but \"true\" as false for LOG_PRETTY", () => {
    expect(loadConfig({ LOG_PRETTY: "yes" }).LOG_PRETTY).toBe(false);
  });

  it("ignores unrelated variables", () => {
    expect(() => loadConfig({ PATH: "/usr/bin", HOME: "/root" })).not.toThrow();
  });

  it("throws on an invalid LOG_LEVEL", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("throws on an invalid NODE_ENV", () => {
    expect(() => loadConfig({ NODE_ENV: "staging" })).toThrow();
  });
});
