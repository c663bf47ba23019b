export * from './CapabilityRegistry';
export * from './CapabilityEmitter';
