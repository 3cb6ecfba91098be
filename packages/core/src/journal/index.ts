export * from './scan-journal';
