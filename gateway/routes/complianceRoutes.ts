import { FastifyPluginAsync } from 'fastify';
import { DEFAULT_COMPLIANCE_DAYS } from '../../servicos/ComplianceAggregator';
import { parseIntParam } from './requestParsing';

interface ComplianceParams {
  bundleId: string;
}

interface ComplianceQuery {
  days?: string;
}

const MAX_COMPLIANCE_DAYS = 3650;

export const complianceRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /api/v1/compliance/:bundleId?days=30
   */
  app.get<{ Params: ComplianceParams; Querystring: ComplianceQuery }>(
    '/compliance/:bundleId',
    async (request) => {
      const days = parseIntParam(request.query.days, 'days', DEFAULT_COMPLIANCE_DAYS, 1, MAX_COMPLIANCE_DAYS);
      return app.engine.compliance.bundleCompliance(request.params.bundleId, days);
    }
  );
};
