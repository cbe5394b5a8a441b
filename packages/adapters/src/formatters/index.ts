export * from './checkmk-message';
