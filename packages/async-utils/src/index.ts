export * from './ListenerCleaner.js';
export * from './ListenerRegistry.js';
