export * from './candle.schema.js';
export * from './indicator.schema.js';
