import { describe, it, expect, vi } from 'vitest';
import type { Database } from '@tallyplan/db';

// ── Hoisted mocks ─────────────────────────────────────────────────────

const { columns } = vi.hoisted(() => ({
  columns: {
    id: 'tagCorrections.id',
    userId: 'tagCorrections.userId',
    term: 'tagCorrections.term',
    predictedTag: 'tagCorrections.predictedTag',
    correctedTag: 'tagCorrections.correctedTag',
    modelType: 'tagCorrections.modelType',
    sourceFileId: 'tagCorrections.sourceFileId',
    createdAt: 'tagCorrections.createdAt',
    updatedAt: 'tagCorrections.updatedAt',
  },
}));

vi.mock('@tallyplan/db', () => ({
  tagCorrections: columns,
}));

vi.mock('drizzle-orm', () => ({
  eq: vi.fn((...args: unknown[]) => ['eq', ...args]),
  and: vi.fn((...args: unknown[]) => ['and', ...args]),
  asc: vi.fn((...args: unknown[]) => ['asc', ...args]),
  desc: vi.fn((...args: unknown[]) => ['desc', ...args]),
  sql: vi.fn((strings: TemplateStringsArray, ...values: unknown[]) => ({ sql: strings.join('?'), values })),
}));

import { DrizzleTagCorrectionStore } from '../stores/drizzle-tag-correction-store';

// ── Mock chain builder ──────────────────────────────────────────────

function makeChain(results: unknown[]) {
  const p = Promise.resolve(results);
  const chain = {
    from: vi.fn(),
    where: vi.fn(),
    orderBy: vi.fn(),
    groupBy: vi.fn(),
    values: vi.fn(),
    onConflictDoUpdate: vi.fn(),
    limit: vi.fn().mockResolvedValue(results),
    returning: vi.fn().mockResolvedValue(results),
    then: p.then.bind(p),
  };
  chain.from.mockReturnValue(chain);
  chain.where.mockReturnValue(chain);
  chain.orderBy.mockReturnValue(chain);
  chain.groupBy.mockReturnValue(chain);
  chain.values.mockReturnValue(chain);
  chain.onConflictDoUpdate.mockReturnValue(chain);
  return chain;
}

function setup(results: unknown[] = []) {
  const chain = makeChain(results);
  const db = {
    select: vi.fn().mockReturnValue(chain),
    insert: vi.fn().mockReturnValue(chain),
    delete: vi.fn().mockReturnValue(chain),
  };
  const store = new DrizzleTagCorrectionStore(db as unknown as Database);
  return { chain, db, store };
}

const CREATED = new Date('2026-01-05T10:00:00Z');
const UPDATED = new Date('2026-02-01T08:30:00Z');

function row(overrides: Record<string, unknown> = {}) {
  return {
    id: '01HZZZZZZZZZZZZZZZZZZZZZZZ',
    userId: 'user-a',
    term: 'gym',
    predictedTag: 'recurring',
    correctedTag: 'budget',
    modelType: 'TEXT',
    sourceFileId: null,
    createdAt: CREATED,
    updatedAt: UPDATED,
    ...overrides,
  };
}

describe('DrizzleTagCorrectionStore', () => {
  describe('saveCorrection', () => {
    it('upserts on the user, term and model type', async () => {
      const { chain, db, store } = setup([row()]);

      await store.saveCorrection({
        userId: 'user-a',
        term: 'gym',
        predictedTag: 'recurring',
        correctedTag: 'budget',
        modelType: 'TEXT',
      });

      expect(db.insert).toHaveBeenCalledWith(columns);
      expect(chain.values).toHaveBeenCalledWith({
        userId: 'user-a',
        term: 'gym',
        predictedTag: 'recurring',
        correctedTag: 'budget',
        modelType: 'TEXT',
        sourceFileId: null,
      });
      expect(chain.onConflictDoUpdate).toHaveBeenCalledWith({
        target: ['tagCorrections.userId', 'tagCorrections.term', 'tagCorrections.modelType'],
        set: {
          predictedTag: 'recurring',
          correctedTag: 'budget',
          sourceFileId: null,
          updatedAt: expect.any(Date),
        },
      });
      expect(chain.returning).toHaveBeenCalledTimes(1);
    });

    it('maps the returned row', async () => {
      const { store } = setup([row({ sourceFileId: 'file-1' })]);

      const saved = await store.saveCorrection({
        userId: 'user-a',
        term: 'gym',
        predictedTag: 'recurring',
        correctedTag: 'budget',
        modelType: 'TEXT',
        sourceFileId: 'file-1',
      });

      expect(saved).toEqual({
        id: '01HZZZZZZZZZZZZZZZZZZZZZZZ',
        userId: 'user-a',
        term: 'gym',
        predictedTag: 'recurring',
        correctedTag: 'budget',
        modelType: 'TEXT',
        sourceFileId: 'file-1',
        createdAt: CREATED,
        updatedAt: UPDATED,
      });
    });

    it('throws when the upsert returns no row', async () => {
      const { store } = setup([]);
      await expect(
        store.saveCorrection({ userId: 'user-a', term: 'gym', predictedTag: null, correctedTag: 'budget', modelType: 'TEXT' }),
      ).rejects.toThrow('Upsert of tag correction "gym" returned no row');
    });
  });

  describe('getUserCorrections', () => {
    it('filters by user and model type, oldest first', async () => {
      const { chain, store } = setup([row(), row({ id: '01HZZZZZZZZZZZZZZZZZZZZZZY', term: 'rent' })]);

      const corrections = await store.getUserCorrections('user-a');

      expect(chain.where).toHaveBeenCalledWith([
        'and',
        ['eq', 'tagCorrections.userId', 'user-a'],
        ['eq', 'tagCorrections.modelType', 'TEXT'],
      ]);
      expect(chain.orderBy).toHaveBeenCalledWith(['asc', 'tagCorrections.updatedAt'], ['asc', 'tagCorrections.id']);
      expect(corrections.map((c) => [c.term, c.modelType])).toEqual([
        ['gym', 'TEXT'],
        ['rent', 'TEXT'],
      ]);
    });
  });

  describe('deleteCorrection', () => {
    it('reports whether a row was removed', async () => {
      await expect(setup([{ id: 'x' }]).store.deleteCorrection('user-a', 'gym', 'TEXT')).resolves.toBe(true);
      await expect(setup([]).store.deleteCorrection('user-a', 'gym', 'TEXT')).resolves.toBe(false);
    });

    it('scopes the delete to one user, term and model type', async () => {
      const { chain, store } = setup([]);
      await store.deleteCorrection('user-a', 'gym', 'STRUCTURE');

      expect(chain.where).toHaveBeenCalledWith([
        'and',
        ['eq', 'tagCorrections.userId', 'user-a'],
        ['eq', 'tagCorrections.term', 'gym'],
        ['eq', 'tagCorrections.modelType', 'STRUCTURE'],
      ]);
      expect(chain.returning).toHaveBeenCalledWith({ id: 'tagCorrections.id' });
    });
  });

  describe('getMostCorrectedTerms', () => {
    it('ranks term and tag pairs by distinct users', async () => {
      const stats = [{ term: 'gym', correctedTag: 'budget', userCount: 3 }];
      const { chain, db, store } = setup(stats);

      await expect(store.getMostCorrectedTerms(25)).resolves.toEqual(stats);

      const userCount = { sql: 'count(distinct ?)::int', values: ['tagCorrections.userId'] };
      expect(db.select).toHaveBeenCalledWith({
        term: 'tagCorrections.term',
        correctedTag: 'tagCorrections.correctedTag',
        userCount,
      });
      expect(chain.where).toHaveBeenCalledWith(['eq', 'tagCorrections.modelType', 'TEXT']);
      expect(chain.groupBy).toHaveBeenCalledWith('tagCorrections.term', 'tagCorrections.correctedTag');
      expect(chain.orderBy).toHaveBeenCalledWith(['desc', userCount], ['asc', 'tagCorrections.term']);
      expect(chain.limit).toHaveBeenCalledWith(25);
    });
  });
});
