export * from './agent';
export * from './article-manager';
export * from './exceptions';
export * from './lifecycle';
export * from './logger';
export * from './models';
export * from './pipeline';
export * from './roles';
export * from './search';
export * from './tracing';
export { DONT_LOG_MODEL_DATA } from './debug';
