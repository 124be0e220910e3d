import 'dotenv/config';
import pino from 'pino';

export const logger = pino({
    name: 'ecos',
    level: process.env.LOG_LEVEL || 'info',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
});
