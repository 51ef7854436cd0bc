export * from './storage';
export { GoogleCloudStorage, type StorageConfig } from './google-cloud-storage';
