/**
 * Database Bootstrap Service Unit Tests
 *
 * Opening, migrating, health-checking and closing both card databases.
 *
 * @module tests/unit/services/database-bootstrap.service.spec
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

vi.mock('../../../src/main/utils/logger', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import {
  bootstrapDatabases,
  performHealthCheck,
  shutdownDatabases,
  type CardDatabases,
} from '../../../src/main/services/database-bootstrap.service';

describe('Database Bootstrap Service', () => {
  const tempDirs: string[] = [];
  const opened: CardDatabases[] = [];

  afterEach(() => {
    for (const databases of opened.splice(0)) {
      shutdownDatabases(databases);
    }
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function bootstrapInMemory() {
    const result = bootstrapDatabases({ primaryDbPath: ':memory:', offlineDbPath: ':memory:' });
    opened.push(result.databases);
    return result;
  }

  describe('bootstrapDatabases', () => {
    it('should open and migrate both databases', () => {
      const result = bootstrapInMemory();

      expect(result.migrations.primary.applied.map((m) => m.version)).toEqual([1, 2]);
      expect(result.migrations.offline.applied.map((m) => m.version)).toEqual([1, 2, 3]);
      expect(result.correlationId).toMatch(/^[0-9a-f-]{36}$/);
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should make the offline queue durable', () => {
      const { databases } = bootstrapInMemory();

      expect(databases.primary.pragma('synchronous', { simple: true })).toBe(1);
      expect(databases.offline.pragma('synchronous', { simple: true })).toBe(2);
    });

    it('should skip migrations already applied to file databases', () => {
      const root = fs.mkdtempSync(path.join(os.tmpdir(), 'lunchcard-bootstrap-'));
      tempDirs.push(root);
      const options = {
        primaryDbPath: path.join(root, 'cards.db'),
        offlineDbPath: path.join(root, 'offline_cards.db'),
      };

      shutdownDatabases(bootstrapDatabases(options).databases);
      const second = bootstrapDatabases(options);
      opened.push(second.databases);

      expect(second.migrations.primary.applied).toEqual([]);
      expect(second.migrations.primary.skipped).toEqual([1, 2]);
      expect(second.migrations.offline.skipped).toEqual([1, 2, 3]);
    });

    it('should fail when the offline database cannot open', () => {
      const root = fs.mkdtempSync(path.join(os.tmpdir(), 'lunchcard-bootstrap-'));
      tempDirs.push(root);
      const offlineDbPath = path.join(root, 'offline_cards.db');
      fs.writeFileSync(offlineDbPath, 'this is not sqlite'.repeat(20));

      expect(() =>
        bootstrapDatabases({ primaryDbPath: path.join(root, 'cards.db'), offlineDbPath })
      ).toThrow(/database offline/i);
    });
  });

  describe('performHealthCheck', () => {
    it('should report both databases healthy', () => {
      const { databases } = bootstrapInMemory();

      const health = performHealthCheck(databases);

      expect(health.healthy).toBe(true);
      expect(health.errors).toEqual([]);
      expect(health.primary).toMatchObject({ isOpen: true, schemaVersion: 2, integrityOk: true });
      expect(health.offline).toMatchObject({ isOpen: true, schemaVersion: 3, integrityOk: true });
    });

    it('should report a closed database without throwing', () => {
      const { databases } = bootstrapInMemory();
      databases.offline.close();

      const health = performHealthCheck(databases);

      expect(health.healthy).toBe(false);
      expect(health.primary).not.toBeNull();
      expect(health.offline).toBeNull();
      expect(health.errors).toHaveLength(1);
      expect(health.errors[0]).toMatch(/^offline: /);
    });
  });

  describe('shutdownDatabases', () => {
    it('should close both and tolerate a second call', () => {
      const { databases } = bootstrapInMemory();

      shutdownDatabases(databases);

      expect(databases.primary.open).toBe(false);
      expect(databases.offline.open).toBe(false);
      expect(() => shutdownDatabases(databases)).not.toThrow();
    });
  });
});
