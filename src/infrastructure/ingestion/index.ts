export { InMemoryInputSource } from './in-memory-input-source.js';
