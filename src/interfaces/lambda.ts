import type { Context } from 'aws-lambda';
import type { MessageAttributeValue } from '@aws-sdk/client-sns';

export type InvocationContext = Pick<Context, 'functionName' | 'functionVersion'>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type SqsMessageBody = JsonValue;

export type SnsMessageAttributes = Record<string, MessageAttributeValue>;
