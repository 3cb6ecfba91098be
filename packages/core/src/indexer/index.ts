export * from './directory-reader';
export * from './crawler';
export * from './project-detector';
export * from './taxonomy-snapshot';
