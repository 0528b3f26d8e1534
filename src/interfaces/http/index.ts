export { default as collectorRoutes } from './collector-routes.js';
export type { CollectorRouteOptions } from './collector-routes.js';
export { buildCollector } from './collector-app.js';
export type { CollectorOptions } from './collector-app.js';
