export { healthRoutes } from './healthRoutes';
export { bundleRoutes } from './bundleRoutes';
export { episodeRoutes } from './episodeRoutes';
export { cycleRoutes } from './cycleRoutes';
export { complianceRoutes } from './complianceRoutes';
export { metricsRoutes } from './metricsRoutes';
