/**
 * A message pulled from the bus, acknowledged by its ackId
 */
export interface PulledMessage {
  ackId: string;
  body: string;
  attributes: Record<string, string>;
}

/**
 * Fire-and-forget publish/subscribe transport
 * Redelivery of unacknowledged messages is left to the provider
 */
export interface MessageBus {
  publish(body: string, attributes: Record<string, string>): Promise<string>;
  /**
   * Wait up to the provider's own window for at most maxMessages messages
   */
  pull(maxMessages: number): Promise<PulledMessage[]>;
  acknowledge(ackIds: string[]): Promise<void>;
  /**
   * Create the topic and subscription if the provider needs them to exist
   */
  ensureResources?(): Promise<void>;
}

export const MESSAGE_BUS = Symbol('MESSAGE_BUS');
