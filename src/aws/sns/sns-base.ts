import type { Logger } from 'stack-trace-logger';
import { SNSClient } from '@aws-sdk/client-sns';
import { AWSConfigSharingUtil } from '../configuration';
import type { ClientCache } from '../client-cache';
import { ENDPOINT_ENV_VARS, ServiceName } from '../../utils/consts';
import { getClientOptions } from '../../utils/helpers';
import { logger as defaultLogger } from '../../utils/logger';

export interface SnsBaseProps {
    cache: ClientCache;
    logger?: Logger;
    reqId?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string;
    region?: string;
}

export class SnsBase {
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
    }: SnsBaseProps) {
        this.cache = cache;
        this.accessKeyId = accessKeyId;
        this.secretAccessKey = secretAccessKey;
        this.endpoint = endpoint;
        this.region = region;
        this.logger = logger;
        this.reqId = reqId ?? null;
    }

    protected get sns(): SNSClient {
        return this.cache.getHandle(ServiceName.sns, ENDPOINT_ENV_VARS.sns, (envEndpoint) => {
            const options = getClientOptions({
                accessKeyId: this.accessKeyId,
                secretAccessKey: this.secretAccessKey,
                endpoint: this.endpoint ?? envEndpoint ?? AWSConfigSharingUtil.endpoint,
                region: this.region,
            });
            this.logger?.debug(this.reqId, 'creating SNS client', { endpoint: options.endpoint, region: options.region });

            return new SNSClient(options);
        });
    }
}
