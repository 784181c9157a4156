import fse from "fs-extra";
import { z } from "zod";

import { PayloadError } from "../core/errors.js";
import { buildNotification } from "../core/notification.js";
import { analyzeRunEvents } from "../core/run-analyzer.js";
import type { LogEvent, Notification, RunContext } from "../core/types.js";

const LogEventFileSchema = z.array(
  z.object({
    timestamp: z.number().int(),
    message: z.string(),
  }),
);

export type RenderCommandOptions = {
  functionName: string;
  displayName?: string;
  requestId: string;
};

/** Analyze a local JSON array of log events and print the report that would be sent. */
export async function renderCommand(eventsPath: string, opts: RenderCommandOptions): Promise<Notification> {
  const events = await readEventsFile(eventsPath);
  const context: RunContext = {
    functionName: opts.functionName,
    displayName: opts.displayName ?? opts.functionName,
    dryRun: true,
    location: { logGroupName: `/aws/lambda/${opts.functionName}`, logStreamName: "local" },
  };

  const notification = buildNotification(analyzeRunEvents(opts.requestId, events), context);
  console.log(`Subject: ${notification.subject}`);
  console.log(`Status: ${notification.attributes.status}`);
  console.log("");
  console.log(notification.body);
  return notification;
}

export async function readEventsFile(filePath: string): Promise<LogEvent[]> {
  let doc: unknown;
  try {
    doc = await fse.readJson(filePath);
  } catch (err) {
    throw new PayloadError(`Failed to read log events at ${filePath}`, err);
  }

  const parsed = LogEventFileSchema.safeParse(doc);
  if (!parsed.success) {
    throw new PayloadError(
      `Log events at ${filePath} must be an array of { timestamp, message } objects.`,
      parsed.error,
    );
  }
  return parsed.data;
}
