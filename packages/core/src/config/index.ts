export * from './resolver-config';
export * from './oracle-env';
