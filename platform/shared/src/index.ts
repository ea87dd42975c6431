export * from './correlation';
export * from './config';
export * from './errors';
export * from './persistence';
export * from './auth';
export * from './rate-limit';
export * from './directory';
export * from './http';
