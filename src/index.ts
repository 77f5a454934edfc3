export * from './core/types.js';
export * from './core/level/index.js';
export * from './core/record/index.js';
export * from './core/formatter/index.js';
export * from './core/backend/index.js';
export * from './core/multi-sink/index.js';
export * from './core/delivery/index.js';
export * from './core/sink-cache/index.js';
export * from './core/diagnostics/index.js';
export * from './core/runtime.js';
export * from './logger/index.js';
export * from './sinks/index.js';
export * from './config/index.js';
