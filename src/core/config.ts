import { z, type ZodIssue } from "zod";

import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

// =============================================================================
// SCHEMA
// =============================================================================

const TRUE_VALUES = ["true", "1", "yes", "y", "on"];
const FALSE_VALUES = ["false", "0", "no", "n", "off"];

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
};

const BooleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: "Expected true or false",
  })
  .transform((value) => TRUE_VALUES.includes(value));

const LogLevelSetting = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => value in LOG_LEVELS, {
    message: "Expected one of DEBUG, INFO, WARN, WARNING, ERROR",
  })
  .transform((value) => LOG_LEVELS[value] ?? "info");

export const MonitorEnvSchema = z.object({
  REPORTING_TOPIC_ARN: z.string().trim().min(1, "Required"),
  LOG_LEVEL: LogLevelSetting.default("INFO"),
  DRY_RUN: BooleanFlag.default("false"),
  AWS_REGION: z.string().trim().min(1).optional(),
  DISPLAY_NAME_FROM_TAGS: BooleanFlag.default("false"),
  DISPLAY_NAME_TAG: z.string().trim().min(1).default("DISPLAY_NAME"),
});

export type MonitorConfig = {
  topicArn: string;
  logLevel: LogLevel;
  dryRun: boolean;
  region?: string;
  displayNameFromTags: boolean;
  displayNameTag: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = MonitorEnvSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid environment configuration:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const cfg = parsed.data;
  return {
    topicArn: cfg.REPORTING_TOPIC_ARN,
    logLevel: cfg.LOG_LEVEL,
    dryRun: cfg.DRY_RUN,
    region: cfg.AWS_REGION,
    displayNameFromTags: cfg.DISPLAY_NAME_FROM_TAGS,
    displayNameTag: cfg.DISPLAY_NAME_TAG,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

// Unset and blank variables are both treated as "not provided" so defaults apply.
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      out[key] = value;
    }
  }
  return out;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type" && issue.received === "undefined") {
        return `${location}: Required`;
      }
      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}
