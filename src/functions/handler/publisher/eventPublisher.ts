/**
 * EventBridge publisher for discovery and recommendation results.
 */

import {
  EventBridgeClient,
  PutEventsCommand,
  type PutEventsRequestEntry,
} from '@aws-sdk/client-eventbridge';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('asg-spot-advisor:publisher');

/**
 * PutEvents accepts at most 10 entries per request.
 */
export const MAX_ENTRIES_PER_PUT = 10;

export const EVENT_SOURCE = 'asg-spot-advisor';

/**
 * Raised when EventBridge rejects one or more entries.
 */
export class PublishError extends Error {
  readonly failedEntryCount: number;

  constructor(message: string, failedEntryCount: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PublishError';
    this.failedEntryCount = failedEntryCount;
  }
}

export interface EventPublisher {
  publish(details: readonly unknown[], detailType: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Publishes one event per detail object to a single event bus.
 */
export class AsgEventPublisher implements EventPublisher {
  constructor(
    private readonly client: EventBridgeClient,
    private readonly eventBusArn: string
  ) {}

  /**
   * Sends the details as events, 10 per request, in order.
   *
   * @param details - Event detail objects, serialized as JSON
   * @param detailType - EventBridge detail-type for every event
   * @param signal - Optional abort signal
   * @throws {PublishError} If any entry of a request is rejected
   */
  async publish(details: readonly unknown[], detailType: string, signal?: AbortSignal): Promise<void> {
    for (let i = 0; i < details.length; i += MAX_ENTRIES_PER_PUT) {
      const entries: PutEventsRequestEntry[] = details
        .slice(i, i + MAX_ENTRIES_PER_PUT)
        .map((detail) => ({
          EventBusName: this.eventBusArn,
          Source: EVENT_SOURCE,
          DetailType: detailType,
          Detail: JSON.stringify(detail),
        }));

      const response = await this.client.send(new PutEventsCommand({ Entries: entries }), {
        abortSignal: signal,
      });

      const failed = response.FailedEntryCount ?? 0;
      if (failed > 0) {
        const firstFailure = (response.Entries ?? []).find((entry) => entry.ErrorCode);
        throw new PublishError(
          `Failed to publish ${failed} of ${entries.length} events to ${this.eventBusArn}: ` +
            `${firstFailure?.ErrorCode ?? 'unknown'} ${firstFailure?.ErrorMessage ?? ''}`.trim(),
          failed
        );
      }

      logger.debug({ eventBusArn: this.eventBusArn, count: entries.length }, 'Published events');
    }

    logger.info(
      { eventBusArn: this.eventBusArn, detailType, count: details.length },
      'Events published'
    );
  }
}
