// Runtime settings sourced from environment variables

export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const logDir: string = process.env.LOG_DIR || '';
export const nodeName: string = process.env.NODE_NAME || 'stakeledger-node';

// Account granted every role when a fresh ledger is created
export const adminAccount: string = process.env.ADMIN_ACCOUNT || '';

export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'stakeledger';
// Write the state cache to MongoDB after every committed transaction
export const persistState: boolean = process.env.PERSIST_STATE === 'true';

export const useNotification: boolean = process.env.USE_NOTIFICATION === 'true';
export const kafkaBrokers: string[] = (process.env.KAFKA_BROKERS || process.env.KAFKA_BROKER || 'localhost:29092')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
export const kafkaClientId: string = process.env.KAFKA_CLIENT_ID || 'stakeledger-event-producer';
export const kafkaTopic: string = process.env.KAFKA_TOPIC || 'notifications';

export default {
    apiPort,
    logLevel,
    logDir,
    nodeName,
    adminAccount,
    mongoUrl,
    mongoDb,
    persistState,
    useNotification,
    kafkaBrokers,
    kafkaClientId,
    kafkaTopic,
};
