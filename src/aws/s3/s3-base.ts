import type { Logger } from 'stack-trace-logger';
import http from 'http';
import https from 'https';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { S3Client } from '@aws-sdk/client-s3';
import { AWSConfigSharingUtil } from '../configuration';
import type { ClientCache } from '../client-cache';
import { ENDPOINT_ENV_VARS, ServiceName } from '../../utils/consts';
import { getClientOptions } from '../../utils/helpers';
import { logger as defaultLogger } from '../../utils/logger';

export interface S3BaseProps {
    cache: ClientCache;
    logger?: Logger;
    reqId?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string;
    region?: string;
    s3ForcePathStyle?: boolean;
}

export class S3Base {
    protected readonly cache: ClientCache;

    protected readonly accessKeyId?: string;

    protected readonly secretAccessKey?: string;

    protected readonly s3ForcePathStyle: boolean;

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
        s3ForcePathStyle = true,
    }: S3BaseProps) {
        this.cache = cache;
        this.accessKeyId = accessKeyId;
        this.secretAccessKey = secretAccessKey;
        this.endpoint = endpoint;
        this.region = region;
        this.logger = logger;
        this.reqId = reqId ?? null;
        this.s3ForcePathStyle = s3ForcePathStyle;
    }

    protected get s3Client(): S3Client {
        return this.cache.getHandle(ServiceName.s3, ENDPOINT_ENV_VARS.s3, (envEndpoint) => {
            const options = getClientOptions({
                accessKeyId: this.accessKeyId,
                secretAccessKey: this.secretAccessKey,
                endpoint: this.endpoint ?? envEndpoint ?? AWSConfigSharingUtil.endpoint,
                region: this.region,
            });
            this.logger?.debug(this.reqId, 'creating S3 client', { endpoint: options.endpoint, region: options.region });

            return new S3Client({
                ...options,
                // localstack serves buckets on the path, not as subdomains
                ...(this.s3ForcePathStyle && options.endpoint && { forcePathStyle: true }),
                requestHandler: new NodeHttpHandler({
                    httpAgent: new http.Agent({ keepAlive: true, maxSockets: 50 }),
                    httpsAgent: new https.Agent({ keepAlive: true, maxSockets: 50 }),
                    connectionTimeout: 3000,
                    socketTimeout: 30000,
                }),
            });
        });
    }
}
