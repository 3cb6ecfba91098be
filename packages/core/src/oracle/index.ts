export * from './errors';
export * from './llm-client';
export * from './api-call-helper';
export * from './oracle';
export * from './prompts/path-suggestion-prompt';
