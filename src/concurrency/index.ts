export { ReadWriteLock } from './read-write-lock.js';
export type { Release } from './read-write-lock.js';
