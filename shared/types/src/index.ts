export * from './drift';
export * from './config';
