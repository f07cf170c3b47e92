import type { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { S3Client } from '@aws-sdk/client-s3';
import type { SNSClient } from '@aws-sdk/client-sns';
import type { SQSClient } from '@aws-sdk/client-sqs';
import type { SSMClient } from '@aws-sdk/client-ssm';
import { ServiceName } from '../utils/consts';
import { resolveEndpoint } from './endpoint';

export interface DynamoDBTableHandle {
    readonly tableName: string;
    readonly documentClient: DynamoDBDocumentClient;
}

export interface ServiceHandles {
    [ServiceName.dynamodb]: DynamoDBClient;
    [ServiceName.dynamodbResource]: DynamoDBDocumentClient;
    [ServiceName.dynamodbTable]: DynamoDBTableHandle;
    [ServiceName.s3]: S3Client;
    [ServiceName.sns]: SNSClient;
    [ServiceName.sqs]: SQSClient;
    [ServiceName.ssm]: SSMClient;
}

export type HandleFactory<K extends ServiceName> = (endpoint: string | undefined) => ServiceHandles[K];

/**
 * Holds at most one handle per service for the lifetime of the object.
 *
 * Create one instance at module scope of the Lambda handler file and pass it to every facade, so warm
 * invocations of the same container reuse the clients. Once a slot is filled, `getHandle` returns it as is:
 * later changes to the environment are not seen until the slot is `reset`.
 *
 * Handle factories are synchronous, so two callers can't interleave on a slot within one Node process.
 */
export class ClientCache {
    private readonly slots: Partial<ServiceHandles> = {};

    getHandle<K extends ServiceName>(service: K, endpointEnvVar: string | undefined, create: HandleFactory<K>): ServiceHandles[K] {
        const cached = this.slots[service];
        if (cached !== undefined) return cached;

        const handle = create(resolveEndpoint(endpointEnvVar));
        this.slots[service] = handle;

        return handle;
    }

    has(service: ServiceName): boolean {
        return this.slots[service] !== undefined;
    }

    reset(service?: ServiceName): void {
        if (service) {
            delete this.slots[service];
            return;
        }

        for (const key of Object.values(ServiceName)) {
            delete this.slots[key];
        }
    }
}
