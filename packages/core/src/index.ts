// Shared constants & schemas
export * from './constants';
export * from './contracts';

// Configuration
export * from './config';

// Indexer
export * from './indexer';

// Resolver
export * from './resolver';

// Oracle
export * from './oracle';

// Suggestion cache
export * from './cache';

// Scan journal
export * from './journal';

// Planner
export * from './planner';
