export * from './types';
export * from './load-controller';
export * from './intersection-observer';
export * from './fetch-loader';
export * from './element-loader';
export * from './paint';
