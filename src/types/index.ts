export * from './position';
export * from './trend';
export * from './decision';
