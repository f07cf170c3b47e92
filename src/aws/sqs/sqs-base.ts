import type { Logger } from 'stack-trace-logger';
import { SQSClient } from '@aws-sdk/client-sqs';
import { AWSConfigSharingUtil } from '../configuration';
import type { ClientCache } from '../client-cache';
import { ENDPOINT_ENV_VARS, ServiceName } from '../../utils/consts';
import { getClientOptions } from '../../utils/helpers';
import { logger as defaultLogger } from '../../utils/logger';

export interface SqsBaseProps {
    cache: ClientCache;
    logger?: Logger;
    reqId?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string;
    region?: string;
}

export class SqsBase {
    protected readonly cache: ClientCache;

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
        accessKeyId = AWSConfigSharingUtil.accessKeyId,
        secretAccessKey = AWSConfigSharingUtil.secretAccessKey,
        endpoint,
        region = AWSConfigSharingUtil.region,
    }: SqsBaseProps) {
        this.cache = cache;
        this.accessKeyId = accessKeyId;
        this.secretAccessKey = secretAccessKey;
        this.endpoint = endpoint;
        this.region = region;
        this.logger = logger;
        this.reqId = reqId ?? null;
    }

    protected get sqs(): SQSClient {
        return this.cache.getHandle(ServiceName.sqs, ENDPOINT_ENV_VARS.sqs, (envEndpoint) => {
            const options = getClientOptions({
                accessKeyId: this.accessKeyId,
                secretAccessKey: this.secretAccessKey,
                endpoint: this.endpoint ?? envEndpoint ?? AWSConfigSharingUtil.endpoint,
                region: this.region,
            });
            this.logger?.debug(this.reqId, 'creating SQS client', { endpoint: options.endpoint, region: options.region });

            return new SQSClient(options);
        });
    }
}
