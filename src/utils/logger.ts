import { Logger, type LoggerLevelType } from 'stack-trace-logger';
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ALIASES } from './consts';

export const getLoggingModeLevel = (level: string | undefined = process.env.LOG_LEVEL): LoggerLevelType => {
    if (!level) return DEFAULT_LOG_LEVEL;
    return LOG_LEVEL_ALIASES[level.trim().toUpperCase()] ?? DEFAULT_LOG_LEVEL;
};

export const logger = new Logger({
    serviceName: process.env.SERVICE_NAME || process.env.AWS_LAMBDA_FUNCTION_NAME || 'LAMBDA',
    loggingModeLevel: getLoggingModeLevel(),
    stackTraceLines: { error: 3, warn: 3, info: 1 },
    tags: ['reqId?'],
    runLocally: ['true', '1'].includes(process.env.RUN_LOCALLY ?? ''),
});
