import type { Logger } from 'stack-trace-logger';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { AWSConfigSharingUtil } from '../configuration';
import { ClientCache, type DynamoDBTableHandle } from '../client-cache';
import { DYNAMODB_TABLE_ENV_VAR, ENDPOINT_ENV_VARS, ServiceName } from '../../utils/consts';
import { ConfigurationError } from '../../utils/errors';
import { getClientOptions } from '../../utils/helpers';
import { logger as defaultLogger } from '../../utils/logger';

export interface DynamoDBBaseProps {
    cache: ClientCache;
    logger?: Logger;
    reqId?: string;
    tableName?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string;
    region?: string;
}

export class DynamoDBBase {
    protected readonly cache: ClientCache;

    protected readonly tableName?: string;

    protected readonly accessKeyId?: string;

    protected readonly secretAccessKey?: string;

    public readonly endpoint?: string;

    public readonly region?: string;

    public readonly logger?: Logger;

    public readonly reqId: string | null;

    constructor({
        cache,
        logger = defaultLogger,
        reqId,
        tableName,
        accessKeyId = AWSConfigSharingUtil.accessKeyId,
        secretAccessKey = AWSConfigSharingUtil.secretAccessKey,
        endpoint,
        region = AWSConfigSharingUtil.region,
    }: DynamoDBBaseProps) {
        this.cache = cache;
        this.tableName = tableName;
        this.accessKeyId = accessKeyId;
        this.secretAccessKey = secretAccessKey;
        this.endpoint = endpoint;
        this.region = region;
        this.logger = logger;
        this.reqId = reqId ?? null;
    }

    protected get dynamodb(): DynamoDBClient {
        return this.cache.getHandle(ServiceName.dynamodb, ENDPOINT_ENV_VARS.dynamodb, (envEndpoint) => {
            const options = getClientOptions({
                accessKeyId: this.accessKeyId,
                secretAccessKey: this.secretAccessKey,
                endpoint: this.endpoint ?? envEndpoint ?? AWSConfigSharingUtil.endpoint,
                region: this.region,
            });
            this.logger?.debug(this.reqId, 'creating DynamoDB client', { endpoint: options.endpoint, region: options.region });

            return new DynamoDBClient(options);
        });
    }

    protected get documentClient(): DynamoDBDocumentClient {
        return this.cache.getHandle(ServiceName.dynamodbResource, undefined, () =>
            DynamoDBDocumentClient.from(this.dynamodb, {
                marshallOptions: { removeUndefinedValues: true },
            })
        );
    }

    /**
     * Returns the cached table handle, creating it on first use.
     * The name comes from the argument, then the `tableName` prop, then the `DYNAMODB_TABLE` environment variable.
     * Once created, the same handle is returned whatever name is passed.
     */
    protected resolveTable(tableName?: string): DynamoDBTableHandle {
        return this.cache.getHandle(ServiceName.dynamodbTable, undefined, () => {
            const name = tableName || this.tableName || process.env[DYNAMODB_TABLE_ENV_VAR];
            if (!name) {
                throw new ConfigurationError(
                    DYNAMODB_TABLE_ENV_VAR,
                    `DynamoDB table name is required: pass it explicitly or set the environment variable "${DYNAMODB_TABLE_ENV_VAR}"`
                );
            }

            return { tableName: name, documentClient: this.documentClient };
        });
    }
}
