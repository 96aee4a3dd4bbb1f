export * from './analyzer.interface.js';
