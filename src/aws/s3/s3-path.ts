import type { Tag } from '@aws-sdk/client-s3';
import type { S3Path, TagSet } from '../../interfaces';
import { S3_BUCKET_ENV_VAR, S3_KEY_PREFIX_ENV_VAR, S3_URI_SCHEME } from '../../utils/consts';
import { ConfigurationError, InvalidArgumentError } from '../../utils/errors';
import { stripLeadingSlashes, stripSurroundingSlashes } from '../../utils/helpers';

// scheme ":" ["//" authority] path, query and fragment dropped
const URI_PATTERN = /^([^:/?#]+):(?:\/\/([^/?#]*))?([^?#]*)/;

/**
 * Splits an `s3://bucket/key` URI into its bucket and key.
 * Leading slashes are stripped from the key.
 */
export const parseS3Uri = (uri: string): S3Path => {
    const match = URI_PATTERN.exec(uri);
    const scheme = match?.[1].toLowerCase();
    if (!match || scheme !== S3_URI_SCHEME) {
        throw new InvalidArgumentError('uri', `Not a S3 URI: ${uri}`);
    }

    const bucket = match[2] ?? '';
    if (!bucket) {
        throw new InvalidArgumentError('uri', `Missing bucket in S3 URI: ${uri}`);
    }

    return { bucket, key: stripLeadingSlashes(match[3]) };
};

export const toS3Uri = (bucket: string, key: string): string => `${S3_URI_SCHEME}://${bucket}/${key}`;

/**
 * Builds the S3 path of a file from the default bucket and key prefix.
 *
 * @param filename - used as the key, or as its suffix when there's a key prefix it doesn't already start with
 * @param bucket - overrides the `S3_BUCKET` environment variable; one of them is required
 * @param keyPrefix - overrides the `S3_KEY_PREFIX` environment variable; optional
 */
export const defaultS3Path = (filename: string, bucket?: string, keyPrefix?: string): S3Path => {
    const resolvedBucket = bucket || process.env[S3_BUCKET_ENV_VAR];
    if (!resolvedBucket) {
        throw new ConfigurationError(S3_BUCKET_ENV_VAR, 'Missing value for the S3 bucket name.');
    }

    const prefix = stripSurroundingSlashes(keyPrefix || process.env[S3_KEY_PREFIX_ENV_VAR] || '');
    const name = stripLeadingSlashes(filename);

    // a filename that already sits under the prefix is not prefixed twice
    if (!prefix || name === prefix || name.startsWith(`${prefix}/`)) {
        return { bucket: resolvedBucket, key: name };
    }

    return { bucket: resolvedBucket, key: `${prefix}/${name}` };
};

export const tagSetToRecord = (tagSet: Tag[] = []): TagSet => {
    const tags: TagSet = {};
    for (const { Key, Value } of tagSet) {
        if (Key === undefined) continue;
        tags[Key] = Value ?? '';
    }

    return tags;
};

// S3 expects object tags on upload as a url encoded query string
export const recordToTagging = (tags: TagSet = {}): string => new URLSearchParams(tags).toString();
