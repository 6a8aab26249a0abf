/**
 * Trading module exports
 */

export { TradingPipeline } from './pipeline.js';
export { createTradingCore, type TradingCore, type TradingCoreOptions } from './core.js';
