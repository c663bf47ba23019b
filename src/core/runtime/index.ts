export * from './ContextualFailure';
export * from './ContextCapability';
