export * from './move-planner';
