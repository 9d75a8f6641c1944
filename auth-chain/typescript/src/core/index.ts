export * from './jwt.js';
export * from './secret.js';
export * from './sleep.js';
export * from './transport.js';
