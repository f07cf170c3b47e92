import { GetCommand, type GetCommandInput } from '@aws-sdk/lib-dynamodb';
import { DynamoDBBase, type DynamoDBBaseProps } from './dynamodb-base';

export type DynamoDBTableProps = DynamoDBBaseProps;

export type DynamoDBKey = NonNullable<GetCommandInput['Key']>;

export class DynamoDBTable extends DynamoDBBase {
    constructor(props: DynamoDBTableProps) {
        super(props);
    }

    /**
     * Checks whether an item with the given primary key exists in the table.
     * Only the key attributes are projected, and service errors are not caught.
     */
    async exists(key: DynamoDBKey): Promise<boolean> {
        const { tableName, documentClient } = this.resolveTable();

        const response = await documentClient.send(
            new GetCommand({
                TableName: tableName,
                Key: key,
                ProjectionExpression: Object.keys(key).join(','),
            })
        );

        const found = response.Item !== undefined;
        this.logger?.debug(this.reqId, 'dynamodb item exists check', { tableName, key, found });

        return found;
    }
}
