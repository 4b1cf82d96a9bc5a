import type { LeveledLogMethod } from 'winston';

// methods for the custom levels registered in logger.ts
declare module 'winston' {
    interface Logger {
        fatal: LeveledLogMethod;
        trace: LeveledLogMethod;
    }
}
