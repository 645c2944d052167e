export { default as inputRoutes } from './input-routes.js';
export { default as workflowRoutes } from './workflow-routes.js';
export { default as busRoutes } from './bus-routes.js';
