// Domain types and schemas
export * from './types.js';

// Event records carried on the shared queue
export * from './events.js';

// Capability tables and device profiles
export * from './capability.js';

// Entity address derivation
export * from './address.js';

// Scene activity calculator
export * from './scene-activity.js';

// Gateway credential validation
export * from './config-validation.js';
