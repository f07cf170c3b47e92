import { SQSClient } from '@aws-sdk/client-sqs';
import { SSMClient } from '@aws-sdk/client-ssm';
import { ClientCache } from './client-cache';
import { DynamoDBUtil } from './dynamodb/dynamodb-util';
import { S3Util } from './s3/s3-util';
import { SnsUtil } from './sns/sns-util';
import { SqsUtil } from './sqs/sqs-util';
import { SsmUtil } from './ssm/ssm-util';
import { ENDPOINT_ENV_VARS, ServiceName } from '../utils/consts';

interface EndpointConfiguredClient {
    config: { endpoint?: () => Promise<{ hostname: string; port?: number }> };
}

interface EndpointCase {
    service: string;
    envVar: string;
    getClient: (cache: ClientCache) => EndpointConfiguredClient;
}

const endpointCases: EndpointCase[] = [
    {
        service: 'DynamoDB',
        envVar: ENDPOINT_ENV_VARS.dynamodb,
        getClient: (cache) => new DynamoDBUtil({ cache, region: 'us-east-1' }).client,
    },
    { service: 'S3', envVar: ENDPOINT_ENV_VARS.s3, getClient: (cache) => new S3Util({ cache, region: 'us-east-1' }).client },
    { service: 'SNS', envVar: ENDPOINT_ENV_VARS.sns, getClient: (cache) => new SnsUtil({ cache, region: 'us-east-1' }).client },
    { service: 'SQS', envVar: ENDPOINT_ENV_VARS.sqs, getClient: (cache) => new SqsUtil({ cache, region: 'us-east-1' }).client },
];

describe('ClientCache', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        for (const envVar of Object.values(ENDPOINT_ENV_VARS)) {
            delete process.env[envVar];
        }
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    describe('getHandle', () => {
        it('should create the handle once and return it on later calls', () => {
            const cache = new ClientCache();
            const create = jest.fn((endpoint: string | undefined) => new SSMClient({ endpoint, region: 'us-east-1' }));

            const first = cache.getHandle(ServiceName.ssm, ENDPOINT_ENV_VARS.ssm, create);
            const second = cache.getHandle(ServiceName.ssm, ENDPOINT_ENV_VARS.ssm, create);

            expect(second).toBe(first);
            expect(create).toHaveBeenCalledTimes(1);
            expect(cache.has(ServiceName.ssm)).toBe(true);
        });

        it('should pass undefined to the factory when no override is set', () => {
            const cache = new ClientCache();
            const create = jest.fn((endpoint: string | undefined) => new SSMClient({ endpoint, region: 'us-east-1' }));

            cache.getHandle(ServiceName.ssm, ENDPOINT_ENV_VARS.ssm, create);

            expect(create).toHaveBeenCalledWith(undefined);
        });

        it('should pass the override endpoint from the environment to the factory', () => {
            process.env[ENDPOINT_ENV_VARS.ssm] = 'http://localhost:4566';
            const cache = new ClientCache();
            const create = jest.fn((endpoint: string | undefined) => new SSMClient({ endpoint, region: 'us-east-1' }));

            cache.getHandle(ServiceName.ssm, ENDPOINT_ENV_VARS.ssm, create);

            expect(create).toHaveBeenCalledWith('http://localhost:4566');
        });

        it('should not share handles between cache instances', () => {
            const create = jest.fn((endpoint: string | undefined) => new SSMClient({ endpoint, region: 'us-east-1' }));

            const first = new ClientCache().getHandle(ServiceName.ssm, undefined, create);
            const second = new ClientCache().getHandle(ServiceName.ssm, undefined, create);

            expect(second).not.toBe(first);
            expect(create).toHaveBeenCalledTimes(2);
        });
    });

    describe('reset', () => {
        it('should empty a single slot', () => {
            const cache = new ClientCache();
            const first = cache.getHandle(ServiceName.ssm, undefined, () => new SSMClient({ region: 'us-east-1' }));
            cache.getHandle(ServiceName.sqs, undefined, () => new SQSClient({ region: 'us-east-1' }));

            cache.reset(ServiceName.ssm);

            expect(cache.has(ServiceName.ssm)).toBe(false);
            expect(cache.has(ServiceName.sqs)).toBe(true);
            const second = cache.getHandle(ServiceName.ssm, undefined, () => new SSMClient({ region: 'us-east-1' }));
            expect(second).not.toBe(first);
        });

        it('should empty every slot when called without a service', () => {
            const cache = new ClientCache();
            cache.getHandle(ServiceName.ssm, undefined, () => new SSMClient({ region: 'us-east-1' }));

            cache.reset();

            expect(cache.has(ServiceName.ssm)).toBe(false);
        });
    });

    describe('endpoint override', () => {
        it('should configure the client with the override and keep it after the environment changes', async () => {
            process.env[ENDPOINT_ENV_VARS.ssm] = 'http://localhost:4566';
            const cache = new ClientCache();

            const client = new SsmUtil({ cache, region: 'us-east-1' }).client;
            const endpoint = await client.config.endpoint?.();

            expect(endpoint?.hostname).toBe('localhost');
            expect(endpoint?.port).toBe(4566);

            process.env[ENDPOINT_ENV_VARS.ssm] = 'http://localhost:5000';
            const again = new SsmUtil({ cache, region: 'us-east-1' }).client;
            const endpointAgain = await again.config.endpoint?.();

            expect(again).toBe(client);
            expect(endpointAgain?.port).toBe(4566);
        });

        it.each(endpointCases)(
            'should configure the $service client from $envVar and keep the first value',
            async ({ envVar, getClient }) => {
                process.env[envVar] = 'http://localhost:4566';
                const cache = new ClientCache();

                const client = getClient(cache);
                const endpoint = await client.config.endpoint?.();

                expect(endpoint?.hostname).toBe('localhost');
                expect(endpoint?.port).toBe(4566);

                process.env[envVar] = 'http://localhost:5000';
                const again = getClient(cache);
                const endpointAgain = await again.config.endpoint?.();

                expect(again).toBe(client);
                expect(endpointAgain?.hostname).toBe('localhost');
                expect(endpointAgain?.port).toBe(4566);
            }
        );

        it('should prefer an endpoint passed to the constructor', async () => {
            process.env[ENDPOINT_ENV_VARS.ssm] = 'http://localhost:4566';
            const cache = new ClientCache();

            const client = new SsmUtil({ cache, region: 'us-east-1', endpoint: 'http://127.0.0.1:4600' }).client;
            const endpoint = await client.config.endpoint?.();

            expect(endpoint?.hostname).toBe('127.0.0.1');
            expect(endpoint?.port).toBe(4600);
        });
    });
});
