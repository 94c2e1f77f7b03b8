export { withTimeout } from './timeout.js';
export { loadJsonConfig, writeJsonAtomic, formatZodIssues, type LoadJsonConfigOptions } from './config-loader.js';
export * from './errors.js';
