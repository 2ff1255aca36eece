/**
 * Utilities Module
 */

export { Mutex } from './mutex'
export { UniqueNames } from './names'
export { formatElapsed } from './elapsed'
