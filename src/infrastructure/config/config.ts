import { z } from "zod";
import { type Result, err, ok } from "../../core/types/result.js";
import { printConfigError } from "../../shared/cli.js";

/** Unset and empty env vars both mean "use the default" */
const blank = (v: unknown): unknown => (typeof v === "string" && v.trim() === "" ? undefined : v);
const fromEnv = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blank, schema);

const flag = (fallback: "true" | "false") =>
  fromEnv(
    z
      .enum(["true", "false"])
      .transform((v) => v === "true")
      .default(fallback),
  );

/**
 * Application config: validated at boot via Zod.
 * Malformed env vars are reported per field and stop the process.
 */
const configSchema = z.object({
  env: fromEnv(z.enum(["development", "production", "test"]).default("development")),
  port: fromEnv(z.coerce.number().int().min(0).max(65535).default(7071)),
  host: fromEnv(z.string().min(1).default("0.0.0.0")),

  log: z.object({
    level: fromEnv(z.enum(["debug", "info", "warn", "error", "fatal"]).default("info")),
    format: fromEnv(z.enum(["pretty", "json"]).default("pretty")),
  }),

  database: z.object({
    /** SQL Server connection string; absent means the in-memory store */
    connectionString: fromEnv(z.string().min(1).optional()),
    migrate: flag("false"),
  }),

  slack: z.object({
    webhookUrl: fromEnv(z.string().url().optional()),
    timeoutMs: fromEnv(z.coerce.number().int().positive().default(5_000)),
    maxRetries: fromEnv(z.coerce.number().int().min(0).max(5).default(0)),
  }),

  monitor: z.object({
    enabled: flag("true"),
    runOnStart: flag("false"),
    intervalMs: fromEnv(z.coerce.number().int().positive().default(60_000)),
    windowMs: fromEnv(z.coerce.number().int().positive().max(2_147_483_647).default(60_000)),
  }),

  thresholds: z
    .object({
      maxTemperature: fromEnv(z.coerce.number().finite().default(8)),
      maxHumidity: fromEnv(z.coerce.number().finite().default(60)),
      minTemperature: fromEnv(z.coerce.number().finite().optional()),
      minHumidity: fromEnv(z.coerce.number().finite().optional()),
    })
    .superRefine((t, ctx) => {
      if (t.minTemperature !== undefined && t.minTemperature >= t.maxTemperature) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["minTemperature"],
          message: "must be below the maximum temperature",
        });
      }
      if (t.minHumidity !== undefined && t.minHumidity >= t.maxHumidity) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["minHumidity"],
          message: "must be below the maximum humidity",
        });
      }
    }),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Field path → messages, e.g. `{ "slack.webhookUrl": ["Invalid url"] }` */
export type ConfigErrors = Record<string, string[]>;

export const parseConfig = (env: NodeJS.ProcessEnv): Result<AppConfig, ConfigErrors> => {
  const result = configSchema.safeParse({
    env: env["NODE_ENV"],
    port: env["PORT"],
    host: env["HOST"],
    log: {
      level: env["LOG_LEVEL"],
      format: env["LOG_FORMAT"],
    },
    database: {
      connectionString: env["SQL_CONNECTION_STRING"],
      migrate: env["DB_MIGRATE"],
    },
    slack: {
      webhookUrl: env["SLACK_WEBHOOK_URL"],
      timeoutMs: env["SLACK_TIMEOUT_MS"],
      maxRetries: env["SLACK_MAX_RETRIES"],
    },
    monitor: {
      enabled: env["MONITOR_ENABLED"],
      runOnStart: env["MONITOR_RUN_ON_START"],
      intervalMs: env["MONITOR_INTERVAL_MS"],
      windowMs: env["MONITOR_WINDOW_MS"],
    },
    thresholds: {
      maxTemperature: env["THRESHOLD_MAX_TEMPERATURE"],
      maxHumidity: env["THRESHOLD_MAX_HUMIDITY"],
      minTemperature: env["THRESHOLD_MIN_TEMPERATURE"],
      minHumidity: env["THRESHOLD_MIN_HUMIDITY"],
    },
  });

  if (!result.success) {
    const errors: ConfigErrors = {};
    for (const issue of result.error.issues) {
      const key = issue.path.join(".") || "config";
      (errors[key] ??= []).push(issue.message);
    }
    return err(errors);
  }

  return ok(result.data);
};

export const loadConfig = (): AppConfig => {
  const result = parseConfig(process.env);

  if (!result.ok) {
    printConfigError(result.error);
    process.exit(1);
  }

  return result.value;
};
