import { Kafka, type Producer, logLevel } from 'kafkajs';

import logger from '../logger.js';
import settings from '../settings.js';

let kafka: Kafka | null = null;
let producer: Producer | null = null;
let connecting: Promise<void> | null = null;
let isConnected = false;

/**
 * Initializes the Kafka client and producer once; concurrent callers share the same attempt.
 * Connection failures are logged and leave the producer unset.
 */
export async function initializeKafkaProducer(): Promise<void> {
    if (isConnected) return;
    if (connecting) return connecting;

    connecting = (async () => {
        try {
            kafka = new Kafka({
                clientId: settings.kafkaClientId,
                brokers: settings.kafkaBrokers,
                logLevel: logLevel.WARN,
                retry: {
                    initialRetryTime: 300,
                    retries: 5,
                },
            });

            const newProducer = kafka.producer({
                allowAutoTopicCreation: true,
            });

            await newProducer.connect();
            producer = newProducer;
            isConnected = true;
            logger.info(`[kafka-producer] Connected to ${settings.kafkaBrokers.join(',')}`);

            producer.on('producer.disconnect', () => {
                logger.warn('[kafka-producer] Kafka producer disconnected.');
                isConnected = false;
            });
        } catch (error) {
            isConnected = false;
            producer = null;
            const errMsg = error instanceof Error ? `${error.message}${error.stack ? '\n' + error.stack : ''}` : String(error);
            logger.error(`[kafka-producer] Failed to initialize or connect Kafka producer: ${errMsg}`);
        } finally {
            connecting = null;
        }
    })();
    return connecting;
}

/**
 * Sends a JSON message to a Kafka topic.
 */
export async function sendKafkaEvent(topic: string, message: object, key?: string): Promise<void> {
    if (!producer || !isConnected) {
        logger.warn(`[kafka-producer] Kafka producer not connected. Attempting to initialize...`);
        await initializeKafkaProducer();
    }
    if (!producer || !isConnected) {
        throw new Error(`Kafka producer unavailable, dropping message for topic ${topic}`);
    }

    const stringMessage = JSON.stringify(message);
    logger.debug(`[kafka-producer] Sending event to Kafka topic '${topic}'. Key: '${key || 'none'}', Message: ${stringMessage}`);
    await producer.send({
        topic,
        messages: [{ key, value: stringMessage }],
    });
}

/**
 * Disconnects the Kafka producer on shutdown.
 */
export async function disconnectKafkaProducer(): Promise<void> {
    if (!producer || !isConnected) return;
    try {
        await producer.disconnect();
        logger.info('[kafka-producer] Kafka producer disconnected successfully.');
    } catch (error) {
        logger.error(`[kafka-producer] Error disconnecting Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
        producer = null;
        isConnected = false;
    }
}
