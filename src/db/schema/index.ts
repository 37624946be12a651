export * from './process-instances';
export * from './movement-events';
export * from './field-definitions';
