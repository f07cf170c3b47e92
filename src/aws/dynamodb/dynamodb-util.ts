import type { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBTableHandle } from '../client-cache';
import { DynamoDBTable, type DynamoDBTableProps } from './dynamodb-table';

export type DynamoDBUtilProps = DynamoDBTableProps;

export class DynamoDBUtil extends DynamoDBTable {
    constructor(props: DynamoDBUtilProps) {
        super(props);
    }

    get client(): DynamoDBClient {
        return this.dynamodb;
    }

    get resource(): DynamoDBDocumentClient {
        return this.documentClient;
    }

    table(tableName?: string): DynamoDBTableHandle {
        return this.resolveTable(tableName);
    }
}
