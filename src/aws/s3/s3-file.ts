import bytes from 'bytes';
import {
    GetObjectCommand,
    GetObjectTaggingCommand,
    HeadObjectCommand,
    PutObjectCommand,
    S3ServiceException,
    type ObjectCannedACL,
} from '@aws-sdk/client-s3';
import type { BytesUnit, PutBytesResult, TagSet } from '../../interfaces';
import { DEFAULT_ACL } from '../../utils/consts';
import { getUnitBytes } from '../../utils/helpers';
import { S3Base, type S3BaseProps } from './s3-base';
import { recordToTagging, tagSetToRecord, toS3Uri } from './s3-path';

export type S3FileProps = S3BaseProps;

export class S3File extends S3Base {
    constructor(props: S3FileProps) {
        super(props);
    }

    /**
     * Checks whether an object exists. Only works for objects, not key prefixes.
     *
     * Any error returned by S3 counts as "missing", so a 403 for lack of permissions also yields false.
     * Errors that never reached S3 (network, credentials) are rethrown.
     */
    async exists(bucket: string, key: string): Promise<boolean> {
        try {
            await this.s3Client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));

            return true;
        } catch (error) {
            if (error instanceof S3ServiceException) {
                this.logger?.debug(this.reqId, 'object not accessible', {
                    uri: toS3Uri(bucket, key),
                    errName: error.name,
                    statusCode: error.$metadata?.httpStatusCode,
                });
                return false;
            }

            throw error;
        }
    }

    async getSize(bucket: string, key: string, unit: BytesUnit = 'b'): Promise<number> {
        const headObject = await this.s3Client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));

        if (headObject.ContentLength === undefined) {
            throw new Error(`Object has no content length: ${toS3Uri(bucket, key)}`);
        }

        return getUnitBytes(headObject.ContentLength, unit);
    }

    async getBytes(bucket: string, key: string): Promise<Buffer> {
        this.logger?.debug(this.reqId, 'reading object', { uri: toS3Uri(bucket, key) });

        const result = await this.s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        if (!result.Body) {
            throw new Error(`Object body is empty: ${toS3Uri(bucket, key)}`);
        }

        return Buffer.from(await result.Body.transformToByteArray());
    }

    async getTags(bucket: string, key: string): Promise<TagSet> {
        this.logger?.debug(this.reqId, 'reading object tags', { uri: toS3Uri(bucket, key) });

        const result = await this.s3Client.send(new GetObjectTaggingCommand({ Bucket: bucket, Key: key }));

        return tagSetToRecord(result.TagSet);
    }

    /**
     * Writes a buffer to S3 in a single request, no multipart.
     *
     * Tag keys and values may hold letters, whitespace, numbers and `+ - = . _ : /`; encode anything else first.
     * Returns the number of bytes written so the caller can compare it with what it meant to write.
     */
    async putBytes(
        buf: Uint8Array,
        bucket: string,
        key: string,
        tags: TagSet = {},
        acl: ObjectCannedACL = DEFAULT_ACL
    ): Promise<PutBytesResult> {
        const length = buf.byteLength;
        this.logger?.debug(this.reqId, 'writing object', { uri: toS3Uri(bucket, key), size: bytes.format(length) });

        await this.s3Client.send(
            new PutObjectCommand({
                Bucket: bucket,
                Key: key,
                Body: buf,
                Tagging: recordToTagging(tags),
                ACL: acl,
            })
        );

        return { bucket, key, length };
    }
}
