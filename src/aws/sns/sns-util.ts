import { SnsTopic, type SnsTopicProps } from './sns-topic';
import type { SNSClient } from '@aws-sdk/client-sns';

export type SnsUtilProps = SnsTopicProps;

export class SnsUtil<T = unknown> extends SnsTopic<T> {
    constructor(props: SnsUtilProps) {
        super(props);
    }

    get client(): SNSClient {
        return this.sns;
    }
}
