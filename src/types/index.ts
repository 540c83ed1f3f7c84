export * from './calls';
export * from './grid';
