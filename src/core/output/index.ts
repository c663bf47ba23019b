export * from './OutputAssembler';
