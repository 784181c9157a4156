import {
  LambdaTagDisplayNameSource,
  StaticDisplayNameSource,
  type DisplayNameSource,
} from "../aws/function-tags.js";
import { CloudWatchRunEventSource } from "../aws/log-events.js";
import { SnsNotificationPublisher } from "../aws/notifications.js";
import type { MonitorConfig } from "../core/config.js";
import { createStdoutLogger, type Logger } from "../core/logger.js";
import type { RunMonitorDependencies } from "./services/run-monitor-service.js";

// =============================================================================
// WIRING
// =============================================================================

/** Builds the AWS-backed collaborators for a validated config. */
export function createRuntimeDependencies(
  config: MonitorConfig,
  logger: Logger = createStdoutLogger({ level: config.logLevel }),
): RunMonitorDependencies {
  return {
    logger,
    events: new CloudWatchRunEventSource({ region: config.region, logger }),
    publisher: new SnsNotificationPublisher({
      topicArn: config.topicArn,
      region: config.region,
      logger,
    }),
    displayNames: createDisplayNameSource(config),
  };
}

function createDisplayNameSource(config: MonitorConfig): DisplayNameSource {
  if (!config.displayNameFromTags) {
    return new StaticDisplayNameSource();
  }
  return new LambdaTagDisplayNameSource({
    tagName: config.displayNameTag,
    region: config.region,
  });
}
