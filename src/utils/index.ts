export * from './constants';
export * from './date.utils';
export * from './encoding.utils';
export * from './errors';
export * from './file.utils';
export * from './stream.utils';
export * from './text.utils';
