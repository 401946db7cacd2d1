/**
 * Gateway HTTP: autenticação, rotas do motor e mapeamento de erros.
 */

import { FastifyInstance } from 'fastify';
import { buildApp, statusForError } from '../../gateway/app';
import { GatewayConfig, loadGatewayConfig } from '../../gateway/GatewayConfig';
import { extractBearerToken, secureCompare } from '../../gateway/plugins/authPlugin';
import { extractOrGenerateRequestId } from '../../gateway/plugins/requestIdPlugin';
import { createEngine } from '../../orquestrador/createEngine';
import { InMemoryEvidenceSource } from '../../evidencia/InMemoryEvidenceSource';
import { BundleNotFoundError, EpisodeIntegrityError, EvidenceSourceError } from '../../entidades/AdherenceErrors';
import { RecordShapeError } from '../../utilitarios/Revive';
import { TestDataDir, createTestDataDir } from '../helpers/testDataDir';
import { MutableClock, T0, at } from '../helpers/engineHarness';

// ════════════════════════════════════════════════════════════════════════════
// SETUP
// ════════════════════════════════════════════════════════════════════════════

const ADMIN_TOKEN = 'test-secret';
const AUTH = { authorization: `Bearer ${ADMIN_TOKEN}` };
const EPISODE_ID = 'p1_e1_ssti_peds_2024';

const TRIGGER = {
  bundle_id: 'ssti_peds_2024',
  patient_id: 'p1',
  encounter_id: 'e1',
  onset_time: T0.toISOString()
};

function gatewayConfig(dataDir: string, adminToken: string = ADMIN_TOKEN): GatewayConfig {
  return loadGatewayConfig({
    NODE_ENV: 'test',
    DATA_DIR: dataDir,
    GATEWAY_ADMIN_TOKEN: adminToken
  });
}

describe('Gateway', () => {
  let testDir: TestDataDir;
  let clock: MutableClock;
  let app: FastifyInstance;

  async function start(adminToken: string = ADMIN_TOKEN): Promise<FastifyInstance> {
    const config = gatewayConfig(testDir.dir, adminToken);
    const engine = await createEngine({
      config: config.monitor,
      evidence: new InMemoryEvidenceSource(),
      clock: clock.read
    });
    return buildApp({ config, engine });
  }

  beforeEach(async () => {
    testDir = await createTestDataDir('gateway');
    clock = new MutableClock();
    app = await start();
  });

  afterEach(async () => {
    await app.close();
    await testDir.cleanup();
  });

  // ══════════════════════════════════════════════════════════════════════════
  // AUTH
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 1: autenticação', () => {
    test('helpers de token', () => {
      expect(extractBearerToken('Bearer  abc ')).toBe('abc');
      expect(extractBearerToken('Basic abc')).toBeNull();
      expect(extractBearerToken('Bearer ')).toBeNull();
      expect(secureCompare('test-secret', 'test-secret')).toBe(true);
      expect(secureCompare('test-secret', 'test-secreT')).toBe(false);
      expect(secureCompare('short', 'longer-value')).toBe(false);
    });

    test('/health é pública', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('ok');
    });

    test('sem token: 401 MISSING_TOKEN', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/bundles' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: 'Unauthorized',
        code: 'MISSING_TOKEN',
        message: 'Missing Authorization header'
      });
    });

    test('token errado: 401 INVALID_TOKEN', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/bundles',
        headers: { authorization: 'Bearer wrong-token' }
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().code).toBe('INVALID_TOKEN');
    });

    test('sem token configurado fora de produção: acesso livre', async () => {
      await app.close();
      app = await start('');

      const response = await app.inject({ method: 'GET', url: '/api/v1/bundles' });
      expect(response.statusCode).toBe(200);
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // REQUEST ID
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 2: X-Request-Id', () => {
    test('header recebido é sanitizado e devolvido', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'abc<script>-12_3' }
      });

      expect(response.headers['x-request-id']).toBe('abcscript-12_3');
    });

    test('sem header: UUID gerado', () => {
      expect(extractOrGenerateRequestId(undefined)).toMatch(/^[0-9a-f-]{36}$/);
      expect(extractOrGenerateRequestId('<>')).toMatch(/^[0-9a-f-]{36}$/);
      expect(extractOrGenerateRequestId('x'.repeat(100))).toHaveLength(64);
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // CATÁLOGO E SAÚDE
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 3: catálogo e prontidão', () => {
    test('GET /api/v1/bundles lista o catálogo', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/bundles', headers: AUTH });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.total).toBe(4);
      expect(body.bundles[3]).toMatchObject({ bundle_id: 'ssti_peds_2024', element_count: 2 });
    });

    test('bundle inexistente: 404 BUNDLE_NOT_FOUND', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/bundles/ghost', headers: AUTH });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: 'BundleNotFoundError',
        code: 'BUNDLE_NOT_FOUND',
        message: 'Bundle ghost não encontrado no catálogo'
      });
    });

    test('/health/ready resume catálogo, episódios e event log', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'ok',
        catalog: { loaded: true, bundleCount: 4 },
        episodes: { loaded: true, count: 0 },
        eventLog: { enabled: true, degraded: false, errorCount: 0 },
        runner: { running: false, cyclesCompleted: 0 }
      });
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // EPISÓDIOS
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 4: episódios', () => {
    test('abertura é idempotente pela identidade', async () => {
      const first = await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });
      const second = await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });

      expect(first.statusCode).toBe(201);
      expect(first.json().created).toBe(true);
      expect(first.json().episode.id).toBe(EPISODE_ID);
      expect(first.json().episode.trigger_time).toBe(T0.toISOString());
      expect(second.statusCode).toBe(200);
      expect(second.json().created).toBe(false);
    });

    test('corpo inválido: 400 INVALID_REQUEST', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/episodes',
        headers: AUTH,
        payload: { bundle_id: 'ssti_peds_2024', encounter_id: 'e1', onset_time: T0.toISOString() }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        code: 'INVALID_REQUEST',
        message: "Campo 'patient_id' inválido: esperado string"
      });
    });

    test('avaliação emite o desvio e devolve a adesão', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });
      clock.set(at(13));

      const response = await app.inject({ method: 'POST', url: `/api/v1/episodes/${EPISODE_ID}/evaluate`, headers: AUTH });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.persisted).toBe(true);
      expect(body.episode.status).toBe('ACTIVE');
      expect(body.transitions.map((t: { element_id: string }) => t.element_id)).toEqual(['ssti_margins_marked']);
      expect(body.deviations).toHaveLength(1);
      expect(body.deviations[0]).toMatchObject({ element_id: 'ssti_margins_marked', outcome: 'emitted' });
      expect(body.episode.adherence).toMatchObject({
        met: 0,
        not_met: 1,
        pending: 1,
        adherence_percentage: 0,
        overall_adherence_percentage: 0,
        adherence_level: 'low'
      });
    });

    test('listagem filtra por status e valida parâmetros', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });

      const active = await app.inject({ method: 'GET', url: '/api/v1/episodes?status=ACTIVE', headers: AUTH });
      expect(active.json().episodes.map((e: { id: string }) => e.id)).toEqual([EPISODE_ID]);
      expect(active.json().next_cursor).toBeNull();

      const bogus = await app.inject({ method: 'GET', url: '/api/v1/episodes?status=bogus', headers: AUTH });
      expect(bogus.statusCode).toBe(400);

      const badLimit = await app.inject({ method: 'GET', url: '/api/v1/episodes?limit=0', headers: AUTH });
      expect(badLimit.statusCode).toBe(400);
      expect(badLimit.json().message).toBe("Campo 'limit' inválido: esperado inteiro entre 1 e 500");
    });

    test('episódio inexistente: 404', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/episodes/ghost', headers: AUTH });

      expect(response.statusCode).toBe(404);
      expect(response.json().code).toBe('EPISODE_NOT_FOUND');
    });

    test('encerramento é terminal', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });

      const closed = await app.inject({
        method: 'POST',
        url: `/api/v1/episodes/${EPISODE_ID}/close`,
        headers: AUTH,
        payload: { reason: 'discharged' }
      });
      expect(closed.statusCode).toBe(200);
      expect(closed.json().status).toBe('CLOSED');
      expect(closed.json().close_reason).toBe('discharged');

      const again = await app.inject({ method: 'POST', url: `/api/v1/episodes/${EPISODE_ID}/close`, headers: AUTH });
      expect(again.statusCode).toBe(409);
      expect(again.json().code).toBe('INVALID_TRANSITION');

      const evaluate = await app.inject({ method: 'POST', url: `/api/v1/episodes/${EPISODE_ID}/evaluate`, headers: AUTH });
      expect(evaluate.statusCode).toBe(409);
      expect(evaluate.json().code).toBe('EPISODE_CLOSED');
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // CICLOS, CONFORMIDADE E MÉTRICAS
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 5: ciclos, conformidade e métricas', () => {
    test('ciclo dry run não persiste', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });
      clock.set(at(13));

      const response = await app.inject({ method: 'POST', url: '/api/v1/cycles', headers: AUTH, payload: { dry_run: true } });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.dry_run).toBe(true);
      expect(body.episodes_evaluated).toBe(1);
      expect(body.episodes[0].deviations[0].outcome).toBe('dry_run');

      const stored = await app.inject({ method: 'GET', url: `/api/v1/episodes/${EPISODE_ID}`, headers: AUTH });
      expect(stored.json().element_results[0].status).toBe('PENDING');
    });

    test('ciclo completo pelo runner', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });
      clock.set(at(13));

      const response = await app.inject({ method: 'POST', url: '/api/v1/cycles', headers: AUTH });
      const body = response.json();

      expect(body.triggers_found).toBe(0);
      expect(body.deviations_emitted).toBe(1);
      expect(body.episodes[0].transitions).toEqual([{ element_id: 'ssti_margins_marked', status: 'NOT_MET' }]);
    });

    test('ciclo restrito a bundle inexistente: 404', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/cycles',
        headers: AUTH,
        payload: { bundle_ids: ['ghost'] }
      });
      expect(response.statusCode).toBe(404);
    });

    test('conformidade do bundle', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });
      clock.set(at(13));
      await app.inject({ method: 'POST', url: `/api/v1/episodes/${EPISODE_ID}/evaluate`, headers: AUTH });

      const response = await app.inject({ method: 'GET', url: '/api/v1/compliance/ssti_peds_2024?days=7', headers: AUTH });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.total_episodes).toBe(1);
      expect(body.by_status).toEqual({ ACTIVE: 1, COMPLETE: 0, CLOSED: 0 });
      expect(body.elements[0]).toMatchObject({ element_id: 'ssti_margins_marked', not_met: 1, compliance_rate: 0 });
      expect(body.elements[1].compliance_rate).toBeNull();

      const bad = await app.inject({ method: 'GET', url: '/api/v1/compliance/ssti_peds_2024?days=0', headers: AUTH });
      expect(bad.statusCode).toBe(400);
    });

    test('métricas Prometheus protegidas', async () => {
      await app.inject({ method: 'GET', url: '/api/v1/bundles' });
      await app.inject({ method: 'POST', url: '/api/v1/episodes', headers: AUTH, payload: TRIGGER });

      const denied = await app.inject({ method: 'GET', url: '/internal/metrics' });
      expect(denied.statusCode).toBe(401);

      const response = await app.inject({ method: 'GET', url: '/internal/metrics', headers: AUTH });
      const lines = response.body.split('\n');

      expect(response.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
      expect(lines).toContain('adherence_auth_failures_total{reason="MISSING_TOKEN"} 2');
      expect(lines).toContain('adherence_episodes{status="ACTIVE"} 1');
      expect(lines).toContain('adherence_event_log_degraded 0');
      expect(lines).toContain('adherence_http_requests_total{method="POST",route="/api/v1/episodes",status_code="201"} 1');
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // MAPEAMENTO DE ERROS
  // ══════════════════════════════════════════════════════════════════════════

  test('TESTE 6: status HTTP por tipo de erro', () => {
    expect(statusForError(new BundleNotFoundError('x'))).toBe(404);
    expect(statusForError(new EvidenceSourceError('down'))).toBe(502);
    expect(statusForError(new RecordShapeError('f', 'string'))).toBe(400);
    expect(statusForError(new EpisodeIntegrityError('p1_e1_b', 'invalid'))).toBe(422);
    expect(statusForError(new Error('boom'))).toBe(500);
  });
});
