export * from './message.types';
export * from './options.types';
