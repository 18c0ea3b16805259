/**
 * Routes Module
 * Re-exports all route plugins
 */

export { healthRoutes } from './health.js';
export { calculateRoutes } from './calculate.js';
export { historyRoutes } from './history.js';
