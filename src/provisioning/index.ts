export * from './release';
export * from './packages';
export * from './plan';
export * from './provisioner';
