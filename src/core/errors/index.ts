export * from './ErrorContext';
export * from './GenerationError';
export * from './errors';
export * from './errorFactory';
