export * from './decisionTree';
export * from './drift';
export * from './forecaster';
export * from './metrics';
export * from './modelInputs';
export * from './random';
export * from './randomForest';
export * from './trainForecaster';
