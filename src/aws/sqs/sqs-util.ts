import type { SQSClient } from '@aws-sdk/client-sqs';
import type { SQSEvent } from 'aws-lambda';
import type { SqsMessageBody } from '../../interfaces';
import { SqsBase, type SqsBaseProps } from './sqs-base';
import { parseSqsEvent } from './sqs-events';

export type SqsUtilProps = SqsBaseProps;

export class SqsUtil extends SqsBase {
    constructor(props: SqsUtilProps) {
        super(props);
    }

    get client(): SQSClient {
        return this.sqs;
    }

    parseEvent(event: Pick<SQSEvent, 'Records'>): Generator<SqsMessageBody, void, undefined> {
        this.logger?.debug(this.reqId, 'parsing sqs event', { records: event.Records.length });

        return parseSqsEvent(event);
    }
}
