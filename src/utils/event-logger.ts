import StateCache from '../cache.js';
import logger from '../logger.js';
import { initializeKafkaProducer, sendKafkaEvent } from '../modules/kafka.js';
import settings from '../settings.js';
import type { LedgerEvent } from '../state.js';
import { convertBigIntsToStrings } from './bigint.js';

/**
 * Shape published to Kafka and served over HTTP
 */
export interface EventDocument {
    _id: string;
    seq: number;
    name: string;
    args: unknown;
    timestamp: number;
}

export type EventPublisher = (topic: string, document: EventDocument, key: string) => Promise<void>;

export function toEventDocument(event: LedgerEvent): EventDocument {
    return {
        _id: `${event.seq}`,
        seq: event.seq,
        name: event.name,
        args: convertBigIntsToStrings(event.args),
        timestamp: event.timestamp,
    };
}

async function publishEvent(publish: EventPublisher, topic: string, event: LedgerEvent): Promise<void> {
    const document = toEventDocument(event);
    try {
        await publish(topic, document, event.name);
        logger.debug(`[event-logger] Event #${event.seq} ${event.name} queued to Kafka topic '${topic}'.`);
    } catch (error) {
        // the event is already in the committed log; only the notification is lost
        logger.error(
            `[event-logger] Failed to send event #${event.seq} ${event.name} to Kafka topic '${topic}': ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

export interface EventLoggerOptions {
    useNotification?: boolean;
    topic?: string;
    publish?: EventPublisher;
}

/**
 * Logs every committed event and, when notifications are enabled, forwards it to Kafka
 * keyed by event name. Rolled back scopes never reach this point.
 */
export function attachEventLogger(store: StateCache, options: EventLoggerOptions = {}): void {
    const useNotification = options.useNotification ?? settings.useNotification;
    const topic = options.topic ?? settings.kafkaTopic;
    const publish = options.publish ?? sendKafkaEvent;

    if (useNotification && !options.publish) {
        initializeKafkaProducer().catch(err =>
            logger.error(
                `[event-logger] Kafka producer initialization failed: ${err instanceof Error ? err.message : String(err)}. Events are still logged locally.`
            )
        );
    }

    store.onCommit(events => {
        for (const event of events) {
            logger.info(`[event-logger] ${event.name} #${event.seq}: ${JSON.stringify(convertBigIntsToStrings(event.args))}`);
            if (useNotification) {
                void publishEvent(publish, topic, event);
            }
        }
    });
}
