export { AWSConfigSharingUtil, type AwsSharedConfig } from './aws/configuration';
export { ClientCache, type DynamoDBTableHandle, type ServiceHandles, type HandleFactory } from './aws/client-cache';
export { resolveEndpoint } from './aws/endpoint';

export { DynamoDBUtil, type DynamoDBUtilProps } from './aws/dynamodb/dynamodb-util';
export type { DynamoDBKey } from './aws/dynamodb/dynamodb-table';
export { S3Util, type S3UtilProps } from './aws/s3/s3-util';
export { parseS3Uri, toS3Uri, defaultS3Path, tagSetToRecord, recordToTagging } from './aws/s3/s3-path';
export { SnsUtil, type SnsUtilProps } from './aws/sns/sns-util';
export { SqsUtil, type SqsUtilProps } from './aws/sqs/sqs-util';
export { parseSqsEvent } from './aws/sqs/sqs-events';
export { SsmUtil, type SsmUtilProps } from './aws/ssm/ssm-util';

export { ConfigurationError, InvalidArgumentError } from './utils/errors';
export { ServiceName, ENDPOINT_ENV_VARS } from './utils/consts';
export { logger, getLoggingModeLevel } from './utils/logger';

export type * from './interfaces';
