export { ticketRoutes } from './ticket.routes';
export { healthRoutes } from './health.routes';
export { metricsRoutes } from './metrics.routes';
