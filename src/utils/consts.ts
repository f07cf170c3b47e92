import type { ObjectCannedACL } from '@aws-sdk/client-s3';
import type { LoggerLevelType } from 'stack-trace-logger';

export enum ServiceName {
    dynamodb = 'dynamodb',
    dynamodbResource = 'dynamodbResource',
    dynamodbTable = 'dynamodbTable',
    s3 = 's3',
    sns = 'sns',
    sqs = 'sqs',
    ssm = 'ssm',
}

export const ENDPOINT_ENV_VARS = {
    dynamodb: 'LOCALSTACK_DYNAMODB_URL',
    s3: 'LOCALSTACK_S3_URL',
    sns: 'LOCALSTACK_SNS_URL',
    sqs: 'LOCALSTACK_SQS_URL',
    ssm: 'LOCALSTACK_SSM_URL',
} as const;

export const DYNAMODB_TABLE_ENV_VAR = 'DYNAMODB_TABLE';
export const S3_BUCKET_ENV_VAR = 'S3_BUCKET';
export const S3_KEY_PREFIX_ENV_VAR = 'S3_KEY_PREFIX';
export const MESSAGE_BUS_ARN_ENV_VAR = 'MESSAGE_BUS_ARN';

export const S3_URI_SCHEME = 's3';

export const DEFAULT_ACL: ObjectCannedACL = 'private';

// LOG_LEVEL names mapped onto the logger levels
export const LOG_LEVEL_ALIASES: Record<string, LoggerLevelType> = {
    DEBUG: 'debug',
    INFO: 'info',
    WARNING: 'warn',
    WARN: 'warn',
    ERROR: 'error',
    CRITICAL: 'error',
};

export const DEFAULT_LOG_LEVEL: LoggerLevelType = 'info';
