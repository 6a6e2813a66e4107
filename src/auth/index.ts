export * from './cookies.js';
