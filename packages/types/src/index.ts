export * from './metadata.js';
export * from './balance.js';
export * from './book.js';
export * from './intents.js';
export * from './migration.js';
