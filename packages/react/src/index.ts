export * from './runtime';
export * from './hooks/useImageController';
