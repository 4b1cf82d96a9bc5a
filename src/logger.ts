import winston from 'winston';
import fs from 'fs';
import path from 'path';

import settings from './settings.js';

// lower is more severe; `cons` is for interactive console dumps
const customLevels = {
    levels: {
        fatal: 0,
        error: 1,
        perf: 2,
        warn: 3,
        info: 4,
        http: 5,
        verbose: 6,
        debug: 7,
        silly: 8,
        trace: 9,
        cons: 10
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        perf: 'magenta',
        warn: 'yellow',
        info: 'green',
        http: 'cyan',
        verbose: 'blue',
        debug: 'white',
        silly: 'grey',
        trace: 'grey',
        cons: 'inverse'
    }
};

function resolveLevel(requested: string): string {
    const level = requested.toLowerCase();
    if (level in customLevels.levels) return level;
    console.warn(`Invalid LOG_LEVEL "${requested}" specified. Using "info" instead.`);
    console.warn(`Valid levels are: ${Object.keys(customLevels.levels).join(', ')}`);
    return 'info';
}

const logLevel = resolveLevel(settings.logLevel);

// Console format with timestamp first
const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `[${timestamp}] ${level}: ${message} ${metaStr}`;
    })
);

winston.addColors(customLevels.colors);

const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

// JSON file output only when LOG_DIR is set
if (settings.logDir) {
    fs.mkdirSync(settings.logDir, { recursive: true });
    transports.push(
        new winston.transports.File({
            filename: path.join(settings.logDir, `output-${settings.nodeName}.log`),
            level: logLevel,
            format: winston.format.combine(winston.format.timestamp(), winston.format.json())
        })
    );
}

const logger = winston.createLogger({
    levels: customLevels.levels,
    level: logLevel,
    format: winston.format.errors({ stack: true }),
    transports
});

export default logger;
