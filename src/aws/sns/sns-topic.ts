import { PublishCommand } from '@aws-sdk/client-sns';
import type { InvocationContext, SnsMessageAttributes } from '../../interfaces';
import { MESSAGE_BUS_ARN_ENV_VAR } from '../../utils/consts';
import { ConfigurationError } from '../../utils/errors';
import { type SnsBaseProps, SnsBase } from './sns-base';

export type SnsTopicProps = SnsBaseProps & {
    messageBusArn?: string;
};

export class SnsTopic<T = unknown> extends SnsBase {
    protected readonly messageBusArn?: string;

    constructor({ messageBusArn, ...props }: SnsTopicProps) {
        super(props);
        this.messageBusArn = messageBusArn;
    }

    /**
     * Publishes a JSON message to a topic.
     *
     * Messages carry `sender` and `sender_version` attributes holding the function name and version from the
     * invocation context; `extraAttributes` are added on top and win on the same name.
     *
     * @param subject - defaults to "Message from {functionName}"
     * @returns the message id assigned by SNS
     */
    async publish(
        topicArn: string,
        context: InvocationContext,
        payload: T,
        extraAttributes: SnsMessageAttributes = {},
        subject?: string
    ): Promise<string | undefined> {
        const attributes: SnsMessageAttributes = {
            sender: { DataType: 'String', StringValue: context.functionName },
            sender_version: { DataType: 'String', StringValue: context.functionVersion },
            ...extraAttributes,
        };
        this.logger?.debug(this.reqId, 'publishing message', { topicArn, payload });

        const response = await this.sns.send(
            new PublishCommand({
                TopicArn: topicArn,
                Subject: subject || `Message from ${context.functionName}`,
                Message: JSON.stringify(payload),
                MessageAttributes: attributes,
            })
        );
        this.logger?.debug(this.reqId, 'message published', { topicArn, messageId: response.MessageId });

        return response.MessageId;
    }

    /**
     * Publishes to the application message bus topic, taken from the `messageBusArn` prop or the
     * `MESSAGE_BUS_ARN` environment variable.
     */
    async publishToBus(
        context: InvocationContext,
        payload: T,
        extraAttributes: SnsMessageAttributes = {},
        subject?: string
    ): Promise<string | undefined> {
        const topicArn = this.messageBusArn || process.env[MESSAGE_BUS_ARN_ENV_VAR];
        if (!topicArn) {
            throw new ConfigurationError(MESSAGE_BUS_ARN_ENV_VAR);
        }

        return this.publish(topicArn, context, payload, extraAttributes, subject);
    }
}
