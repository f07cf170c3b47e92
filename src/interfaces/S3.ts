import type { Unit } from 'bytes';

export type BytesUnit = Unit;

export interface S3Path {
    bucket: string;
    key: string;
}

export type TagSet = Record<string, string>;

export interface PutBytesResult extends S3Path {
    length: number;
}
