export * from './caller.js';
export * from './config.js';
export * from './construct.js';
export * from './context.js';
export * from './diagnostics.js';
export * from './errors.js';
export * from './globals.js';
export * from './language.js';
export * from './language-stubs.js';
export * from './lazy.js';
export * from './registry.js';
export * from './singleton.js';
export * from './stub-object.js';
export * from './types.js';
export * from './unstub-guard.js';
