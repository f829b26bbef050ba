// Core entities
export * from './types/entities.js';
export * from './types/api.js';

// Utilities
export * from './utils/constants.js';
export * from './utils/phone.js';
export * from './utils/identity.js';
export * from './utils/validation.js';
