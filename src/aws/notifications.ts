import {
  PublishCommand,
  SNSClient,
  type MessageAttributeValue,
  type PublishCommandInput,
  type PublishCommandOutput,
} from "@aws-sdk/client-sns";

import { AdapterError } from "../core/errors.js";
import type { JsonObject, Logger } from "../core/logger.js";
import type {
  Notification,
  NotificationAttributes,
  PublishReceipt,
  RunContext,
} from "../core/types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface NotificationPublisher {
  publish(notification: Notification, context: RunContext): Promise<PublishReceipt>;
}

export type SnsTransport = {
  publish: (input: PublishCommandInput) => Promise<Pick<PublishCommandOutput, "MessageId">>;
};

type SnsNotificationPublisherOptions = {
  topicArn: string;
  logger: Logger;
  region?: string;
  client?: SNSClient;
  transport?: SnsTransport;
};

export const DRY_RUN_MESSAGE_ID = "12345";

// =============================================================================
// SNS
// =============================================================================

export class SnsNotificationPublisher implements NotificationPublisher {
  private readonly topicArn: string;
  private readonly logger: Logger;
  private readonly options: SnsNotificationPublisherOptions;
  private transport?: SnsTransport;

  constructor(options: SnsNotificationPublisherOptions) {
    this.topicArn = options.topicArn;
    this.logger = options.logger;
    this.options = options;
    this.transport = options.transport;
  }

  async publish(notification: Notification, context: RunContext): Promise<PublishReceipt> {
    const attributes = encodeMessageAttributes(notification.attributes);
    this.logComposedMessage(notification, attributes, context.dryRun);

    const receipt: PublishReceipt = context.dryRun
      ? { messageId: DRY_RUN_MESSAGE_ID, dryRun: true }
      : { messageId: await this.send(notification, attributes), dryRun: false };

    this.logger.info({
      type: "notification.published",
      payload: { message_id: receipt.messageId, topic: this.topicArn, dry_run: receipt.dryRun },
    });
    return receipt;
  }

  private async send(
    notification: Notification,
    attributes: Record<string, MessageAttributeValue>,
  ): Promise<string> {
    const response = await this.resolveTransport().publish({
      TopicArn: this.topicArn,
      Subject: notification.subject,
      Message: notification.body,
      MessageAttributes: attributes,
    });

    if (!response.MessageId) {
      throw new AdapterError(`SNS publish to ${this.topicArn} returned no MessageId.`);
    }
    return response.MessageId;
  }

  // The SNS client is only built once a real publish happens, so dry runs never touch it.
  private resolveTransport(): SnsTransport {
    if (!this.transport) {
      this.transport = createTransport(
        this.options.client ?? new SNSClient({ region: this.options.region }),
      );
    }
    return this.transport;
  }

  private logComposedMessage(
    notification: Notification,
    attributes: Record<string, MessageAttributeValue>,
    dryRun: boolean,
  ): void {
    const level = dryRun ? "info" : "debug";
    const encoded: JsonObject = {};
    for (const [name, value] of Object.entries(attributes)) {
      encoded[name] = { DataType: value.DataType ?? "String", StringValue: value.StringValue ?? "" };
    }

    this.logger.log(level, {
      type: "notification.composed",
      payload: {
        subject: notification.subject,
        attributes: encoded,
        body: notification.body,
      },
    });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function encodeMessageAttributes(
  attributes: NotificationAttributes,
): Record<string, MessageAttributeValue> {
  return {
    function: stringAttribute(attributes.function),
    status: stringAttribute(attributes.status),
    errors: stringAttribute(String(attributes.errors)),
    warnings: stringAttribute(String(attributes.warnings)),
  };
}

function stringAttribute(value: string): MessageAttributeValue {
  return { DataType: "String", StringValue: value };
}

function createTransport(client: SNSClient): SnsTransport {
  return {
    publish: (input) => client.send(new PublishCommand(input)),
  };
}
