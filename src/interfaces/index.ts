export * from './S3';
export * from './lambda';
