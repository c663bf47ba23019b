export * from './CaseClassifier';
