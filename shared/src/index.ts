// Core types and enums for the MRM profile engine
export * from './enums.js';
export * from './entities.js';
export * from './observations.js';
export * from './tasks.js';
export * from './collection.js';
export * from './api.js';
