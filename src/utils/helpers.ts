import type { BytesUnit } from '../interfaces';

export interface ClientOptions {
    credentials?: { accessKeyId: string; secretAccessKey: string };
    endpoint?: string;
    region?: string;
}

export const getClientOptions = ({
    accessKeyId,
    secretAccessKey,
    endpoint,
    region,
}: {
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string;
    region?: string;
}): ClientOptions => ({
    ...(accessKeyId && secretAccessKey && { credentials: { accessKeyId, secretAccessKey } }),
    ...(endpoint && { endpoint }),
    ...(region && { region }),
});

export const stripLeadingSlashes = (value: string): string => value.replace(/^\/+/, '');

export const stripSurroundingSlashes = (value: string): string => value.replace(/^\/+/, '').replace(/\/+$/, '');

export const getUnitBytes = (bytes: number, unit?: BytesUnit) => {
    switch (unit?.toUpperCase()) {
        case 'KB':
            return bytes / 1024;
        case 'MB':
            return bytes / 1024 ** 2;
        case 'GB':
            return bytes / 1024 ** 3;
        case 'TB':
            return bytes / 1024 ** 4;
        case 'PB':
            return bytes / 1024 ** 5;
        case 'B':
        default:
            return bytes;
    }
};
