export * from './reporter.interface.js';
