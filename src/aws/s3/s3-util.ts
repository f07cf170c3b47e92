import type { S3Client } from '@aws-sdk/client-s3';
import type { S3Path } from '../../interfaces';
import { S3File, type S3FileProps } from './s3-file';
import { defaultS3Path, parseS3Uri, toS3Uri } from './s3-path';

export type S3UtilProps = S3FileProps;

export class S3Util extends S3File {
    constructor(props: S3UtilProps) {
        super(props);
    }

    get client(): S3Client {
        return this.s3Client;
    }

    parseUri(uri: string): S3Path {
        return parseS3Uri(uri);
    }

    toUri(bucket: string, key: string): string {
        return toS3Uri(bucket, key);
    }

    defaultPath(filename: string, bucket?: string, keyPrefix?: string): S3Path {
        return defaultS3Path(filename, bucket, keyPrefix);
    }
}
