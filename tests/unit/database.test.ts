import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BotDatabase } from '../../src/services/database';

describe('BotDatabase', () => {
  let db: BotDatabase;

  beforeEach(() => {
    db = new BotDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  describe('credits', () => {
    it('reports zero for unknown users', () => {
      expect(db.getCredits('1')).toBe(0);
    });

    it('accumulates added credits', () => {
      expect(db.addCredits('1', 5)).toBe(5);
      expect(db.addCredits('1', 3)).toBe(8);
      expect(db.getCredits('1')).toBe(8);
    });

    it('keeps snowflake ids exact', () => {
      db.addCredits('987654321098765432', 2);
      expect(db.getCredits('987654321098765432')).toBe(2);
      expect(db.getCredits('987654321098765433')).toBe(0);
    });

    it('clamps removals at zero', () => {
      db.addCredits('1', 4);
      expect(db.removeCredits('1', 10)).toBe(true);
      expect(db.getCredits('1')).toBe(0);
    });

    it('returns false when removing from an unknown user', () => {
      expect(db.removeCredits('2', 1)).toBe(false);
      expect(db.countUsers()).toBe(0);
    });

    it('reserves credits only when the balance covers them', () => {
      db.addCredits('1', 3);
      expect(db.reserveCredits('1', 4)).toBe(false);
      expect(db.getCredits('1')).toBe(3);
      expect(db.reserveCredits('1', 3)).toBe(true);
      expect(db.getCredits('1')).toBe(0);
      expect(db.reserveCredits('2', 1)).toBe(false);
    });

    it('clears a balance', () => {
      db.addCredits('1', 9);
      db.clearCredits('1');
      expect(db.getCredits('1')).toBe(0);
    });
  });

  describe('vps records', () => {
    const record = {
      userId: '1',
      containerName: 'user1-basic-240305070809',
      plan: 'basic',
      ramMb: 512,
      cpuCores: 1,
      arch: 'intel',
    };

    it('creates records as running with the given timestamp', () => {
      const id = db.createVps(record, new Date(Date.UTC(2024, 2, 5, 7, 8, 9)));

      expect(db.getVps(id)).toEqual({
        id,
        ...record,
        status: 'running',
        createdAt: '2024-03-05T07:08:09.000Z',
      });
    });

    it('lists records per user in creation order', () => {
      const first = db.createVps(record);
      db.createVps({ ...record, userId: '2', containerName: 'other' });
      const second = db.createVps({ ...record, containerName: 'user1-small-1' });

      expect(db.listVpsByUser('1').map(v => v.id)).toEqual([first, second]);
      expect(db.listAllVps()).toHaveLength(3);
    });

    it('updates status and deletes', () => {
      const id = db.createVps(record);
      db.updateVpsStatus(id, 'stopped');
      expect(db.getVps(id)?.status).toBe('stopped');

      expect(db.deleteVps(id)).toBe(true);
      expect(db.getVps(id)).toBeUndefined();
      expect(db.deleteVps(id)).toBe(false);
    });
  });
});
