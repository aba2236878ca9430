export * from './base.js';
export * from './errors.js';
export * from './factory.js';
export * from './providers/ipapi.js';
export * from './providers/ipwhois.js';
export * from './providers/mock.js';
