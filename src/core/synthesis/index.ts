export * from './AugmentationSynthesizer';
