export * from './aws/assume-role.js';
export * from './factory.js';
