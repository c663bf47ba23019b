// Public entry point.

export { CONFIG } from './config/config';
export { Logger, LogLevel } from './core/logging/Logger';
export * from './core/errors';
export * from './core/result';
export * from './core/model';
export * from './core/validation';
export * from './core/classification';
export * from './core/synthesis';
export * from './core/capability';
export * from './core/output';
export * from './core/generator';
export * from './core/render';
export * from './core/runtime';
