export * from './backend';
export * from './errors';
export * from './machine';
export * from './mask';
export * from './orchestrator';
export * from './policySchema';
export * from './policyStore';
export * from './restoreState';
export * from './selection';
export * from './session';
export * from './statusLog';
export * from './storageTiers';
export * from './types';
