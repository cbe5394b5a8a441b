export * from './notification';
export * from './adapter';
