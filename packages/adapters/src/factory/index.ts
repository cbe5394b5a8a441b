export * from './adapter-factory';
