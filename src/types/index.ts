export * from './conversation';
export * from './persona';
export * from './article';
export * from './providers';
export * from './api';
export * from './dispatch';
