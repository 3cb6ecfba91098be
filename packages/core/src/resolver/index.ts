export * from './response-parser';
export * from './path-sanitizer';
export * from './naming-convention';
export * from './guardrail-policy';
export * from './taxonomy-snapper';
export * from './file-signature';
export * from './prompt-context';
export * from './worker-pool';
export * from './resolution-session';
export * from './resolution-orchestrator';
