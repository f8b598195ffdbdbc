import { z } from "zod";
import { type Result, err, ok } from "../core/types/result.js";
import { DEFAULT_SIMULATION, type SimulationOptions } from "./runner.js";

const secondsToMs = (s: number): number => Math.round(s * 1000);

const argsSchema = z.object({
  url: z.string({ required_error: "set AZURE_FUNCTION_URL or pass --url" }).url(),
  fridges: z.coerce.number().int().min(0).max(100).default(DEFAULT_SIMULATION.fridgeCount),
  interval: z.coerce.number().positive().optional(),
  runtime: z.coerce.number().positive().optional(),
  faultyFridge: z.coerce.number().int().min(0).optional(),
  faulty: z.boolean().default(true),
});

type ArgKey = keyof z.input<typeof argsSchema>;

const VALUE_FLAGS: ReadonlyMap<string, ArgKey> = new Map<string, ArgKey>([
  ["--url", "url"],
  ["--fridges", "fridges"],
  ["--interval", "interval"],
  ["--runtime", "runtime"],
  ["--faulty-fridge", "faultyFridge"],
]);

/**
 * Parse `simulate` arguments. Intervals and runtime are given in seconds.
 *
 *   --url URL  --fridges N  --interval S  --runtime S  --faulty-fridge N  --no-faulty
 */
export const parseSimulationArgs = (
  args: readonly string[],
  env: NodeJS.ProcessEnv,
): Result<SimulationOptions, string> => {
  const raw: Record<string, unknown> = { url: env["AZURE_FUNCTION_URL"] || undefined };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--no-faulty") {
      raw["faulty"] = false;
      continue;
    }
    const key = VALUE_FLAGS.get(arg);
    if (key === undefined) return err(`Unknown option: ${arg}`);
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) return err(`Missing value for ${arg}`);
    raw[key] = value;
    i++;
  }

  const parsed = argsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(issue ? `${issue.path.join(".") || "arguments"}: ${issue.message}` : "Invalid arguments");
  }

  const a = parsed.data;
  const defaultFaulty = DEFAULT_SIMULATION.faulty;
  return ok({
    url: a.url,
    fridgeCount: a.fridges,
    intervalMs: a.interval !== undefined ? secondsToMs(a.interval) : DEFAULT_SIMULATION.intervalMs,
    runtimeMs: a.runtime !== undefined ? secondsToMs(a.runtime) : DEFAULT_SIMULATION.runtimeMs,
    faulty:
      a.faulty && defaultFaulty
        ? { ...defaultFaulty, fridgeNo: a.faultyFridge ?? defaultFaulty.fridgeNo }
        : null,
  });
};
