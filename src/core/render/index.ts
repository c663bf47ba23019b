export * from './TypeScriptRenderer';
