import type { SQSEvent } from 'aws-lambda';
import type { JsonValue, SqsMessageBody } from '../../interfaces';

/**
 * Yields the message bodies of an SQS event, in record order.
 *
 * Meant for queues subscribed to an SNS topic with raw message delivery. Bodies are decoded from JSON;
 * a body that isn't JSON (plain text) is yielded as the original string.
 */
export function* parseSqsEvent(event: Pick<SQSEvent, 'Records'>): Generator<SqsMessageBody, void, undefined> {
    for (const record of event.Records) {
        let item: JsonValue;
        try {
            item = JSON.parse(record.body);
        } catch (error) {
            if (!(error instanceof SyntaxError)) throw error;
            item = record.body;
        }

        yield item;
    }
}
