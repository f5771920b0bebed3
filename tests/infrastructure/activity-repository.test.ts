import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StorageFault } from '../../src/domain/index.js';
import type { ActivityBuffer } from '../../src/application/activity-buffer.js';
import { createActivityBuffer, createDbClient, ensureSchema } from '../../src/infrastructure/db/index.js';
import { BASE_TIME, createTestBuffer, makeActivity } from '../helpers.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function at(minutes: number): Date {
  return new Date(BASE_TIME + minutes * 60_000);
}

describe('ActivityBuffer (SQLite)', () => {
  let buffer: ActivityBuffer;
  let close: () => void;

  beforeEach(async () => {
    ({ buffer, close } = await createTestBuffer());
  });

  afterEach(() => {
    close();
  });

  describe('append', () => {
    it('assigns increasing ids', async () => {
      const first = await buffer.append(makeActivity());
      const second = await buffer.append(makeActivity());
      const third = await buffer.append(makeActivity());

      expect(second).toBe(first + 1);
      expect(third).toBe(second + 1);
    });

    it('stores the activity as unconsumed with every field intact', async () => {
      const input = makeActivity({
        project: 'docs',
        started_at: at(5),
        ended_at: at(6),
        lines_added: 12,
        words_per_minute: 33.5,
        editor: 'helix',
      });

      const id = await buffer.append(input);
      const [stored] = await buffer.unconsumed(10);

      expect(stored).toMatchObject({
        id,
        project: 'docs',
        git_remote: 'git@example.com:team/relay.git',
        filename: 'src/index.ts',
        filetype: 'typescript',
        lines_added: 12,
        lines_removed: 1,
        git_branch: 'main',
        actions_per_minute: 42.5,
        words_per_minute: 33.5,
        editor: 'helix',
        machine: 'test-machine',
        consumed: false,
      });
      expect(stored?.started_at.toISOString()).toBe('2026-03-02T09:05:00.000Z');
      expect(stored?.ended_at.toISOString()).toBe('2026-03-02T09:06:00.000Z');
      expect(stored?.created_at).toBeInstanceOf(Date);
    });

    it('generates a UUID client_id when none is supplied', async () => {
      await buffer.append(makeActivity());
      const [stored] = await buffer.unconsumed(1);
      expect(stored?.client_id).toMatch(UUID_RE);
    });

    it('keeps a client-supplied client_id', async () => {
      const clientId = '7d444840-9dc0-11d1-b245-5ffdce74fad2';
      await buffer.append(makeActivity({ client_id: clientId }));
      const [stored] = await buffer.unconsumed(1);
      expect(stored?.client_id).toBe(clientId);
    });

    it('keeps null for absent optional text fields', async () => {
      await buffer.append(makeActivity({ project: null, filename: null }));
      const [stored] = await buffer.unconsumed(1);
      expect(stored?.project).toBeNull();
      expect(stored?.filename).toBeNull();
    });

    it('rejects a duplicate client_id with StorageFault', async () => {
      const clientId = '7d444840-9dc0-11d1-b245-5ffdce74fad2';
      await buffer.append(makeActivity({ client_id: clientId }));

      await expect(buffer.append(makeActivity({ client_id: clientId })))
        .rejects.toBeInstanceOf(StorageFault);
      expect(await buffer.counts()).toEqual({ total: 1, unconsumed: 1 });
    });
  });

  describe('unconsumed', () => {
    it('returns an empty array when nothing is buffered', async () => {
      expect(await buffer.unconsumed(10)).toEqual([]);
    });

    it('orders by started_at ascending, ties by id ascending', async () => {
      const late = await buffer.append(makeActivity({ started_at: at(30) }));
      const tieA = await buffer.append(makeActivity({ started_at: at(10) }));
      const early = await buffer.append(makeActivity({ started_at: at(1) }));
      const tieB = await buffer.append(makeActivity({ started_at: at(10) }));

      const rows = await buffer.unconsumed(10);
      expect(rows.map((r) => r.id)).toEqual([early, tieA, tieB, late]);
    });

    it('respects the limit', async () => {
      for (let i = 0; i < 5; i++) {
        await buffer.append(makeActivity({ started_at: at(i) }));
      }
      const rows = await buffer.unconsumed(3);
      expect(rows).toHaveLength(3);
      expect(rows.map((r) => r.started_at.getTime())).toEqual([at(0), at(1), at(2)].map((d) => d.getTime()));
    });

    it('never returns consumed activities', async () => {
      const ids: number[] = [];
      for (let i = 0; i < 8; i++) {
        ids.push(await buffer.append(makeActivity({ started_at: at(8 - i) })));
      }
      const consumed = ids.filter((_, i) => i === 0 || i === 3 || i === 5);
      await buffer.markConsumed(consumed);

      const rows = await buffer.unconsumed(100);
      expect(rows).toHaveLength(5);
      for (const row of rows) {
        expect(row.consumed).toBe(false);
        expect(consumed).not.toContain(row.id);
      }
    });
  });

  describe('markConsumed', () => {
    it('is a no-op for an empty set', async () => {
      await buffer.append(makeActivity());
      await expect(buffer.markConsumed([])).resolves.toBeUndefined();
      expect(await buffer.counts()).toEqual({ total: 1, unconsumed: 1 });
    });

    it('flips exactly the given ids', async () => {
      const a = await buffer.append(makeActivity({ started_at: at(1) }));
      const b = await buffer.append(makeActivity({ started_at: at(2) }));
      const c = await buffer.append(makeActivity({ started_at: at(3) }));

      await buffer.markConsumed([a, c]);

      const rows = await buffer.unconsumed(10);
      expect(rows.map((r) => r.id)).toEqual([b]);
      expect(await buffer.counts()).toEqual({ total: 3, unconsumed: 1 });
    });

    it('tolerates duplicate ids in the request', async () => {
      const a = await buffer.append(makeActivity());
      await buffer.markConsumed([a, a]);
      expect(await buffer.unconsumed(10)).toEqual([]);
    });

    it('marks nothing when any id is unknown', async () => {
      const a = await buffer.append(makeActivity({ started_at: at(1) }));
      const b = await buffer.append(makeActivity({ started_at: at(2) }));

      await expect(buffer.markConsumed([a, b, 9999])).rejects.toThrow(
        'mark consumed: matched 2 of 3 activities',
      );

      const rows = await buffer.unconsumed(10);
      expect(rows.map((r) => r.id)).toEqual([a, b]);
    });

    it('leaves already consumed ids consumed when the set is rejected', async () => {
      const a = await buffer.append(makeActivity({ started_at: at(1) }));
      const b = await buffer.append(makeActivity({ started_at: at(2) }));
      await buffer.markConsumed([a]);

      await expect(buffer.markConsumed([a, b, 4242])).rejects.toThrow(
        'mark consumed: matched 2 of 3 activities',
      );
      expect(await buffer.counts()).toEqual({ total: 2, unconsumed: 1 });
    });

    it('reports the failure as a StorageFault', async () => {
      await expect(buffer.markConsumed([42])).rejects.toBeInstanceOf(StorageFault);
    });
  });

  describe('counts', () => {
    it('reports total and unconsumed rows', async () => {
      expect(await buffer.counts()).toEqual({ total: 0, unconsumed: 0 });

      const a = await buffer.append(makeActivity());
      await buffer.append(makeActivity());
      await buffer.markConsumed([a]);

      expect(await buffer.counts()).toEqual({ total: 2, unconsumed: 1 });
    });
  });

  it('wraps driver errors after the database is closed', async () => {
    close();
    await expect(buffer.unconsumed(1)).rejects.toBeInstanceOf(StorageFault);
    // reopen so afterEach can close again
    ({ buffer, close } = await createTestBuffer());
  });
});

describe('ActivityBuffer persistence', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'relay-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps unconsumed activities across reopen', async () => {
    const path = join(dir, 'activity.db');

    const first = createDbClient(path);
    await ensureSchema(first.sqlite);
    const id = await createActivityBuffer(first.db).append(makeActivity({ project: 'persisted' }));
    first.sqlite.close();

    const second = createDbClient(path);
    await ensureSchema(second.sqlite);
    const rows = await createActivityBuffer(second.db).unconsumed(10);
    second.sqlite.close();

    expect(rows).toHaveLength(1);
    expect(rows[0]?.id).toBe(id);
    expect(rows[0]?.project).toBe('persisted');
  });

  it('does not reuse ids after a restart', async () => {
    const path = join(dir, 'activity.db');

    const first = createDbClient(path);
    await ensureSchema(first.sqlite);
    const buffer = createActivityBuffer(first.db);
    const a = await buffer.append(makeActivity());
    await first.sqlite.execute('DELETE FROM activities');
    first.sqlite.close();

    const second = createDbClient(path);
    await ensureSchema(second.sqlite);
    const b = await createActivityBuffer(second.db).append(makeActivity());
    second.sqlite.close();

    expect(b).toBeGreaterThan(a);
  });
});
