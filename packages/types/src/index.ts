export * from './callback/index.js';
export * from './connection/index.js';
export * from './event-bus/index.js';
export * from './logging/index.js';
export * from './module/index.js';
export * from './session/index.js';
export * from './state/index.js';
export * from './widget/index.js';
