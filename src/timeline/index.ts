export * from './types.js';
export * from './animatable.js';
export * from './easing.js';
export * from './equality.js';
export * from './hash.js';
export * from './values.js';
export * from './optimize.js';
export * from './trim.js';
export * from './evaluate.js';
