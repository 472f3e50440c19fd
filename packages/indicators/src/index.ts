export * from './bollinger';
export * from './ema';
export * from './features';
export * from './macd';
export * from './momentum';
export * from './patterns';
export * from './rsi';
export * from './sma';
