import * as fs from 'fs/promises';
import { canonicalJson, computeEventHash, computePayloadHash, sha256 } from '../utilitarios/HashUtil';
import { JsonFileStore } from '../utilitarios/JsonFileStore';
import { EventLogRepositoryImpl } from '../event-log/EventLogRepositoryImpl';
import { EventLogRepository } from '../event-log/EventLogRepository';
import { ChainVerificationResult, EventLogEntry, TipoEntidade, TipoEvento } from '../event-log/EventLogEntry';
import { EventLogRecorder, MAX_ERROR_BUFFER } from '../orquestrador/EventLogRecorder';
import { TestDataDir, createTestDataDir } from './helpers/testDataDir';
import { MutableClock, T0, at } from './helpers/engineHarness';

/**
 * Log que falha em toda operação.
 */
class BrokenEventLog implements EventLogRepository {
  async init(): Promise<void> {}

  async append(): Promise<EventLogEntry> {
    throw new Error('disk full');
  }

  async getAll(): Promise<EventLogEntry[]> {
    return [];
  }

  async getByEntidade(): Promise<EventLogEntry[]> {
    return [];
  }

  async verifyChain(): Promise<ChainVerificationResult> {
    throw new Error('unreadable');
  }

  async count(): Promise<number> {
    return 0;
  }
}

describe('EventLog encadeado', () => {
  let testDir: TestDataDir;
  let clock: MutableClock;

  beforeEach(async () => {
    testDir = await createTestDataDir('eventlog');
    clock = new MutableClock();
  });

  afterEach(async () => {
    await testDir.cleanup();
  });

  // ══════════════════════════════════════════════════════════════════════════
  // HASH
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 1: HashUtil', () => {
    test('canonicalJson ordena chaves em todos os níveis', () => {
      expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: null } }))
        .toBe('{"a":{"c":null,"d":[2,{"y":0,"z":1}]},"b":1}');
      expect(canonicalJson(undefined)).toBe('null');
    });

    test('payload hash independe da ordem das chaves', () => {
      expect(computePayloadHash({ a: 1, b: 2 })).toBe(computePayloadHash({ b: 2, a: 1 }));
      expect(computePayloadHash({ a: 1 })).not.toBe(computePayloadHash({ a: 2 }));
    });

    test('hash do evento concatena os campos com |', () => {
      expect(computeEventHash(null, {
        timestamp: T0, actor: 'monitor', evento: 'E', entidade: 'X', entidade_id: 'id', payload_hash: 'ph'
      }))
        .toBe(sha256('|2026-03-01T10:00:00.000Z|monitor|E|X|id|ph'));
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // REPOSITÓRIO
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 2: EventLogRepository', () => {
    test('genesis sem previous_hash e encadeamento dos seguintes', async () => {
      const log = await EventLogRepositoryImpl.create(testDir.dir, clock.read);

      const first = await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, 'ep-1', { a: 1 });
      clock.set(at(1));
      const second = await log.append('gateway', TipoEvento.EPISODE_CLOSED, TipoEntidade.EPISODE, 'ep-1', { a: 2 });

      expect(first.previous_hash).toBeNull();
      expect(first.timestamp).toEqual(T0);
      expect(first.id).toMatch(/^evt-/);
      expect(second.previous_hash).toBe(first.current_hash);
      expect(second.current_hash).toBe(computeEventHash(first.current_hash, {
        timestamp: at(1),
        actor: 'gateway',
        evento: 'EPISODE_CLOSED',
        entidade: 'Episode',
        entidade_id: 'ep-1',
        payload_hash: computePayloadHash({ a: 2 })
      }));
      expect(await log.verifyChain()).toEqual({ valid: true, totalVerified: 2 });
    });

    test('getByEntidade filtra por entidade e id', async () => {
      const log = await EventLogRepositoryImpl.create(testDir.dir, clock.read);
      await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, 'ep-1', {});
      await log.append('monitor', TipoEvento.ELEMENT_RESOLVED, TipoEntidade.ELEMENT, 'ep-1/a', {});
      await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, 'ep-2', {});

      const events = await log.getByEntidade(TipoEntidade.EPISODE, 'ep-1');
      expect(events.map(e => e.evento)).toEqual(['EPISODE_OPENED']);
      expect(await log.count()).toBe(3);
    });

    test('adulteração no arquivo é detectada após reinício', async () => {
      const log = await EventLogRepositoryImpl.create(testDir.dir, clock.read);
      await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, 'ep-1', {});
      await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, 'ep-2', {});
      await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, 'ep-3', {});

      const file = testDir.file('event-log.json');
      const text = await fs.readFile(file, 'utf-8');
      await fs.writeFile(file, text.replace('"ep-2"', '"ep-9"'));

      const reopened = await EventLogRepositoryImpl.create(testDir.dir, clock.read);
      const all = await reopened.getAll();
      expect(await reopened.verifyChain()).toEqual({
        valid: false,
        firstInvalidIndex: 1,
        firstInvalidId: all[1].id,
        reason: 'current_hash não corresponde ao conteúdo',
        totalVerified: 1
      });
    });

    test('evento removido quebra o encadeamento', async () => {
      const log = await EventLogRepositoryImpl.create(testDir.dir, clock.read);
      for (const id of ['ep-1', 'ep-2', 'ep-3']) {
        await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, id, {});
      }
      const [first, , third] = await log.getAll();

      await new JsonFileStore(testDir.file('event-log.json')).writeAll([first, third]);
      const reopened = await EventLogRepositoryImpl.create(testDir.dir, clock.read);

      const result = await reopened.verifyChain();
      expect(result.valid).toBe(false);
      expect(result.firstInvalidIndex).toBe(1);
      expect(result.reason).toBe('previous_hash não corresponde ao evento anterior');
    });
  });

  // ══════════════════════════════════════════════════════════════════════════
  // RECORDER
  // ══════════════════════════════════════════════════════════════════════════

  describe('TESTE 3: EventLogRecorder', () => {
    test('sem log: habilitado = false e nada falha', async () => {
      const recorder = new EventLogRecorder();
      await recorder.init();
      await recorder.record('monitor', 'X', 'Episode', 'ep', {});

      expect(recorder.getStatus()).toEqual({ enabled: false, degraded: false, errorCount: 0, lastErrors: [] });
    });

    test('falhas de escrita marcam degraded sem propagar', async () => {
      const recorder = new EventLogRecorder(new BrokenEventLog());
      await recorder.record('monitor', TipoEvento.DEVIATION_EMITTED, 'Deviation', 'ep/a', {});

      const status = recorder.getStatus();
      expect(status.degraded).toBe(true);
      expect(status.errorCount).toBe(1);
      expect(status.lastErrorMsg).toBe('disk full');
      expect(status.lastErrors.map(e => e.evento)).toEqual(['DEVIATION_EMITTED']);
    });

    test('ring buffer guarda só os erros mais recentes', async () => {
      const recorder = new EventLogRecorder(new BrokenEventLog());
      for (let i = 0; i < MAX_ERROR_BUFFER + 5; i++) {
        await recorder.record('monitor', `E${i}`, 'Episode', 'ep', {});
      }

      const status = recorder.getStatus();
      expect(status.errorCount).toBe(25);
      expect(status.lastErrors).toHaveLength(20);
      expect(status.lastErrors[0].evento).toBe('E5');
    });

    test('verificação que lança vira resultado inválido', async () => {
      const recorder = new EventLogRecorder(new BrokenEventLog());
      expect(await recorder.verifyNow()).toEqual({ valid: false, totalVerified: 0, reason: 'unreadable' });
      expect(recorder.getStatus().lastErrors[0].evento).toBe('VERIFY_NOW');
    });

    test('corrupção detectada no init', async () => {
      const log = await EventLogRepositoryImpl.create(testDir.dir, clock.read);
      await log.append('monitor', TipoEvento.EPISODE_OPENED, TipoEntidade.EPISODE, 'ep-1', {});
      const file = testDir.file('event-log.json');
      await fs.writeFile(file, (await fs.readFile(file, 'utf-8')).replace('"monitor"', '"gateway"'));

      const recorder = new EventLogRecorder(await EventLogRepositoryImpl.create(testDir.dir));
      await recorder.init();

      expect(recorder.getStatus().lastErrorMsg).toBe('Chain corruption at index 0: current_hash não corresponde ao conteúdo');
    });
  });
});
