import type { LogLevel } from "@nestjs/common";
import { z } from "zod";

import { UsageError } from "./errors.js";

export const LOG_LEVELS = ["error", "warn", "log", "debug", "verbose"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export const settingsSchema = z.object({
  keyFile: z.string().min(1).optional(),
  apiEndpoint: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  logLevel: z.enum(LOG_LEVELS).default("error"),
});

export type Settings = z.infer<typeof settingsSchema>;

const envNames = new Map<string, string>([
  ["keyFile", "DLP_KEY_FILE"],
  ["apiEndpoint", "DLP_API_ENDPOINT"],
  ["timeoutMs", "DLP_TIMEOUT_MS"],
  ["logLevel", "LOG_LEVEL"],
]);

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse({
    keyFile: blankToUndefined(env.DLP_KEY_FILE) ?? blankToUndefined(env.GOOGLE_APPLICATION_CREDENTIALS),
    apiEndpoint: blankToUndefined(env.DLP_API_ENDPOINT),
    timeoutMs: blankToUndefined(env.DLP_TIMEOUT_MS),
    logLevel: blankToUndefined(env.LOG_LEVEL)?.toLowerCase(),
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => {
      const key = String(issue.path[0]);
      return `${envNames.get(key) ?? key}: ${issue.message}`;
    });
    throw new UsageError(`Invalid configuration (${details.join("; ")})`);
  }
  return parsed.data;
}

/** Levels enabled at `level`, most severe first. */
export function enabledLogLevels(level: LogLevelName): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
