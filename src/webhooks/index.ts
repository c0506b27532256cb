export * from './names';
export * from './records';
export * from './notifications';
export * from './registry';
export * from './parse';
