export { default as eventRoutes } from './event-routes.js';
