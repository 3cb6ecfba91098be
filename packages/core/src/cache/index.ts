export * from './mutex';
export * from './suggestion-store';
export * from './suggestion-cache';
