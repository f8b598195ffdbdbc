import { describe, expect, it } from "vitest";
import { parseConfig } from "../../src/infrastructure/config/config.js";

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    const result = parseConfig({});
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const config = result.value;
    expect(config.env).toBe("development");
    expect(config.port).toBe(7071);
    expect(config.host).toBe("0.0.0.0");
    expect(config.log).toEqual({ level: "info", format: "pretty" });
    expect(config.database.connectionString).toBeUndefined();
    expect(config.database.migrate).toBe(false);
    expect(config.slack.webhookUrl).toBeUndefined();
    expect(config.slack.timeoutMs).toBe(5000);
    expect(config.slack.maxRetries).toBe(0);
    expect(config.monitor).toEqual({ enabled: true, runOnStart: false, intervalMs: 60_000, windowMs: 60_000 });
    expect(config.thresholds.maxTemperature).toBe(8);
    expect(config.thresholds.maxHumidity).toBe(60);
    expect(config.thresholds.minTemperature).toBeUndefined();
  });

  it("treats blank variables as unset", () => {
    const result = parseConfig({ PORT: "", SLACK_WEBHOOK_URL: "  ", SQL_CONNECTION_STRING: "" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.port).toBe(7071);
    expect(result.value.slack.webhookUrl).toBeUndefined();
    expect(result.value.database.connectionString).toBeUndefined();
  });

  it("reads every variable", () => {
    const result = parseConfig({
      NODE_ENV: "production",
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "json",
      SQL_CONNECTION_STRING: "Server=localhost;Database=fridges;User Id=sa;Password=test-secret",
      DB_MIGRATE: "true",
      SLACK_WEBHOOK_URL: "https://hooks.example.test/services/T000/B000/placeholder",
      SLACK_TIMEOUT_MS: "2500",
      SLACK_MAX_RETRIES: "2",
      MONITOR_ENABLED: "false",
      MONITOR_RUN_ON_START: "true",
      MONITOR_INTERVAL_MS: "30000",
      MONITOR_WINDOW_MS: "120000",
      THRESHOLD_MAX_TEMPERATURE: "7.5",
      THRESHOLD_MAX_HUMIDITY: "70",
      THRESHOLD_MIN_TEMPERATURE: "1",
      THRESHOLD_MIN_HUMIDITY: "20",
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const config = result.value;
    expect(config.env).toBe("production");
    expect(config.port).toBe(8080);
    expect(config.log).toEqual({ level: "debug", format: "json" });
    expect(config.database.migrate).toBe(true);
    expect(config.slack).toEqual({
      webhookUrl: "https://hooks.example.test/services/T000/B000/placeholder",
      timeoutMs: 2500,
      maxRetries: 2,
    });
    expect(config.monitor).toEqual({ enabled: false, runOnStart: true, intervalMs: 30_000, windowMs: 120_000 });
    expect(config.thresholds).toEqual({
      maxTemperature: 7.5,
      maxHumidity: 70,
      minTemperature: 1,
      minHumidity: 20,
    });
  });

  it("reports malformed values by field path", () => {
    const result = parseConfig({
      PORT: "not-a-port",
      SLACK_WEBHOOK_URL: "not a url",
      MONITOR_ENABLED: "yes",
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(Object.keys(result.error).sort()).toEqual(["monitor.enabled", "port", "slack.webhookUrl"]);
  });

  it("rejects a minimum threshold at or above its maximum", () => {
    const result = parseConfig({ THRESHOLD_MIN_TEMPERATURE: "8" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error["thresholds.minTemperature"]).toEqual(["must be below the maximum temperature"]);
  });
});
