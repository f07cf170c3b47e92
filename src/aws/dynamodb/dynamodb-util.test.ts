import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ClientCache } from '../client-cache';
import { DYNAMODB_TABLE_ENV_VAR, ServiceName } from '../../utils/consts';
import { ConfigurationError } from '../../utils/errors';
import { DynamoDBUtil } from './dynamodb-util';

describe('DynamoDBUtil', () => {
    const originalEnv = process.env;
    let cache: ClientCache;

    beforeEach(() => {
        process.env = { ...originalEnv };
        delete process.env[DYNAMODB_TABLE_ENV_VAR];
        cache = new ClientCache();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    describe('client and resource', () => {
        it('should cache the client and the document client', () => {
            const dynamodb = new DynamoDBUtil({ cache, region: 'us-east-1' });

            expect(dynamodb.client).toBeInstanceOf(DynamoDBClient);
            expect(dynamodb.resource).toBeInstanceOf(DynamoDBDocumentClient);
            expect(dynamodb.resource).toBe(new DynamoDBUtil({ cache }).resource);
            expect(cache.has(ServiceName.dynamodb)).toBe(true);
            expect(cache.has(ServiceName.dynamodbResource)).toBe(true);
        });
    });

    describe('table', () => {
        it('should throw a ConfigurationError without a table name and cache nothing', () => {
            const dynamodb = new DynamoDBUtil({ cache, region: 'us-east-1' });

            expect(() => dynamodb.table()).toThrow(ConfigurationError);
            expect(cache.has(ServiceName.dynamodbTable)).toBe(false);
        });

        it('should take the table name from the environment', () => {
            process.env[DYNAMODB_TABLE_ENV_VAR] = 'test-table';
            const dynamodb = new DynamoDBUtil({ cache, region: 'us-east-1' });

            const table = dynamodb.table();

            expect(table.tableName).toBe('test-table');
            expect(table.documentClient).toBe(dynamodb.resource);
        });

        it('should prefer the explicit table name', () => {
            process.env[DYNAMODB_TABLE_ENV_VAR] = 'test-table';
            const dynamodb = new DynamoDBUtil({ cache, region: 'us-east-1' });

            expect(dynamodb.table('my-table').tableName).toBe('my-table');
        });

        it('should keep the first table regardless of later names until reset', () => {
            const dynamodb = new DynamoDBUtil({ cache, region: 'us-east-1' });
            const table = dynamodb.table('my-table');

            expect(dynamodb.table('other-table')).toBe(table);

            cache.reset(ServiceName.dynamodbTable);

            expect(dynamodb.table('other-table').tableName).toBe('other-table');
        });
    });

    describe('exists', () => {
        let dynamodb: DynamoDBUtil;
        let send: jest.Mock;

        beforeEach(() => {
            dynamodb = new DynamoDBUtil({ cache, region: 'us-east-1', tableName: 'test-table' });
            send = jest.fn();
            Object.assign(dynamodb.resource, { send });
        });

        it('should return true when the item exists', async () => {
            send.mockResolvedValue({ Item: { Id: '12345' } });

            await expect(dynamodb.exists({ Id: '12345' })).resolves.toBe(true);
            expect(send.mock.calls[0][0].input).toEqual({
                TableName: 'test-table',
                Key: { Id: '12345' },
                ProjectionExpression: 'Id',
            });
        });

        it('should return false when the response has no item', async () => {
            send.mockResolvedValue({});

            await expect(dynamodb.exists({ Id: '12345' })).resolves.toBe(false);
        });

        it('should project every key attribute', async () => {
            send.mockResolvedValue({});

            await dynamodb.exists({ pk: 'tenant', sk: 'order#1' });

            expect(send.mock.calls[0][0].input.ProjectionExpression).toBe('pk,sk');
        });

        it('should propagate service errors', async () => {
            send.mockRejectedValue(new Error('ProvisionedThroughputExceededException'));

            await expect(dynamodb.exists({ Id: '12345' })).rejects.toThrow('ProvisionedThroughputExceededException');
        });
    });
});
