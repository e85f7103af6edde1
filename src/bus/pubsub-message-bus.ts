import { Logger, OnApplicationShutdown } from '@nestjs/common';
import { PubSub, v1 } from '@google-cloud/pubsub';
import type { BusConfig } from '../config/bus.config';
import type { MessageBus, PulledMessage } from './message-bus';

/**
 * MessageBus over Google Cloud Pub/Sub
 * Publishes through the topic client and consumes with synchronous pull
 * so a worker holds at most one message at a time.
 */
export class PubSubMessageBus implements MessageBus, OnApplicationShutdown {
  private readonly logger = new Logger(PubSubMessageBus.name);
  private readonly pubsub: PubSub;
  private readonly subscriber: v1.SubscriberClient;
  private readonly subscriptionPath: string;

  constructor(private readonly config: BusConfig) {
    this.pubsub = new PubSub({ projectId: config.projectId });
    this.subscriber = new v1.SubscriberClient({ projectId: config.projectId });
    this.subscriptionPath = this.subscriber.subscriptionPath(config.projectId, config.subscription);
  }

  async publish(body: string, attributes: Record<string, string>): Promise<string> {
    return this.pubsub.topic(this.config.topic).publishMessage({
      data: Buffer.from(body, 'utf8'),
      attributes,
    });
  }

  async pull(maxMessages: number): Promise<PulledMessage[]> {
    const [response] = await this.subscriber.pull({
      subscription: this.subscriptionPath,
      maxMessages,
    });

    const messages: PulledMessage[] = [];
    for (const received of response.receivedMessages ?? []) {
      if (!received.ackId) {
        continue;
      }
      const data = received.message?.data;
      messages.push({
        ackId: received.ackId,
        body: typeof data === 'string' ? data : data ? Buffer.from(data).toString('utf8') : '',
        attributes: { ...(received.message?.attributes ?? {}) },
      });
    }
    return messages;
  }

  async acknowledge(ackIds: string[]): Promise<void> {
    if (ackIds.length === 0) {
      return;
    }
    await this.subscriber.acknowledge({
      subscription: this.subscriptionPath,
      ackIds,
    });
  }

  /**
   * Create the topic and subscription when they do not exist yet
   */
  async ensureResources(): Promise<void> {
    const topic = this.pubsub.topic(this.config.topic);
    const [topicExists] = await topic.exists();
    if (!topicExists) {
      this.logger.log(`Creating topic ${this.config.topic}`);
      await topic.create();
    }

    const subscription = topic.subscription(this.config.subscription);
    const [subscriptionExists] = await subscription.exists();
    if (!subscriptionExists) {
      this.logger.log(`Creating subscription ${this.config.subscription}`);
      await subscription.create();
    }

    this.logger.log(`Connected to subscription '${this.config.topic}:${this.config.subscription}'`);
  }

  async onApplicationShutdown() {
    this.logger.log('Closing Pub/Sub clients');
    await this.subscriber.close();
    await this.pubsub.close();
  }
}
