/**
 * Gateway HTTP do motor de adesão.
 */

// Config
export {
  GatewayConfig,
  loadGatewayConfig,
  validateGatewayConfig,
  DEFAULT_GATEWAY_PORT,
  DEFAULT_GATEWAY_HOST,
  DEFAULT_CORS_ORIGINS
} from './GatewayConfig';

// App factory
export { buildApp, BuildAppOptions, statusForError } from './app';

// Plugins
export { authPlugin, AuthPluginOptions, extractBearerToken, secureCompare } from './plugins/authPlugin';
export { requestIdPlugin, RequestIdPluginOptions } from './plugins/requestIdPlugin';

// Telemetria
export { TelemetryRegistry } from './telemetry/TelemetryRegistry';
export { METRIC_NAMES } from './telemetry/TelemetryTypes';

// Routes
export * from './routes';
