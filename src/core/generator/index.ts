export * from './ContextErrGenerator';
