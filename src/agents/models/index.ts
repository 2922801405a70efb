export * from './interface';
export * from './openai-chatcompletions';
export * from './openai-provider';
