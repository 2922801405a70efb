export * from './interface';
export * from './serper';
