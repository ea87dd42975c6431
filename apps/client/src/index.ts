export * from './api';
export * from './cache';
export * from './outbox';
export * from './reconcile';
export * from './session';
export * from './sync';
export * from './types';
