export interface AwsSharedConfig {
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string;
    region?: string;
}

/**
 * Process-wide defaults for every facade constructor.
 * Values passed to a constructor override these.
 */
export class AWSConfigSharingUtil {
    static accessKeyId: string | undefined;
    static secretAccessKey: string | undefined;
    static endpoint: string | undefined;
    static region: string | undefined;

    constructor() {}

    static setConfig({ accessKeyId, secretAccessKey, endpoint, region }: AwsSharedConfig) {
        AWSConfigSharingUtil.accessKeyId = accessKeyId;
        AWSConfigSharingUtil.secretAccessKey = secretAccessKey;
        AWSConfigSharingUtil.endpoint = endpoint;
        AWSConfigSharingUtil.region = region;
    }

    static getConfig(): AwsSharedConfig {
        return {
            accessKeyId: AWSConfigSharingUtil.accessKeyId,
            secretAccessKey: AWSConfigSharingUtil.secretAccessKey,
            region: AWSConfigSharingUtil.region,
            endpoint: AWSConfigSharingUtil.endpoint,
        };
    }
}
