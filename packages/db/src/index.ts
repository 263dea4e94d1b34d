export { getDirectory, closeDirectory } from './client.js';
export * from './directory.js';
export * from './schemas.js';
export * from './store.js';
