export * from './identifier';
export * from './itemValidator';
