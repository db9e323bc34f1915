/**
 * Record Store Tests
 *
 * Mutations, renumbering on delete, change notifications and validation.
 */

import { describe, it, expect, vi } from 'vitest';
import { RecordStore, type StoreChange } from '../src/storage/records/index.js';
import { NotFoundError, ValidationError } from '../src/errors.js';
import { createApplication, createSnapshot } from './setup.js';

describe('RecordStore', () => {
  describe('add', () => {
    it('appends with the next id and returns it', () => {
      const store = new RecordStore();

      expect(store.add(createApplication({ company: 'Acme' }))).toBe(0);
      expect(store.add(createApplication({ company: 'Globex' }))).toBe(1);

      expect(store.list().map(r => [r.id, r.company])).toEqual([
        [0, 'Acme'],
        [1, 'Globex'],
      ]);
    });

    it('defaults status to Submitted and date to today', () => {
      const store = new RecordStore([], { today: () => new Date(2024, 4, 1) });

      const id = store.add({ company: 'Acme', position: 'Engineer' });

      expect(store.get(id)).toEqual({
        id: 0,
        company: 'Acme',
        position: 'Engineer',
        portalUrl: '',
        dateApplied: '2024-05-01',
        status: 'Submitted',
      });
    });

    it('trims text fields and matches status case-insensitively', () => {
      const store = new RecordStore();

      store.add(createApplication({ company: '  Acme  ', position: ' Engineer ', status: 'interview' }));

      const record = store.get(0);
      expect(record.company).toBe('Acme');
      expect(record.position).toBe('Engineer');
      expect(record.status).toBe('Interview');
    });

    it('rejects an empty company without changing the table', () => {
      const store = new RecordStore();
      const listener = vi.fn();
      store.subscribe(listener);

      expect(() => store.add(createApplication({ company: '   ' }))).toThrow(ValidationError);
      expect(() => store.add(createApplication({ company: '' }))).toThrow('Company is required');

      expect(store.size).toBe(0);
      expect(store.revision).toBe(0);
      expect(listener).not.toHaveBeenCalled();
    });

    it('rejects an unknown status', () => {
      const store = new RecordStore();

      expect(() => store.add(createApplication({ status: 'Ghosted' }))).toThrow('Unknown status "Ghosted"');
    });

    it('rejects a malformed date', () => {
      const store = new RecordStore();

      expect(() => store.add(createApplication({ dateApplied: '2024-02-30' }))).toThrow(ValidationError);
      expect(() => store.add(createApplication({ dateApplied: '01/05/2024' }))).toThrow(ValidationError);
    });
  });

  describe('update', () => {
    it('changes a single field', () => {
      const store = new RecordStore(createSnapshot([{ company: 'Acme' }, { company: 'Globex' }]));

      store.update(1, 'status', 'Offer');

      expect(store.get(1).status).toBe('Offer');
      expect(store.get(0).status).toBe('Submitted');
    });

    it('throws NotFoundError for a missing id', () => {
      const store = new RecordStore(createSnapshot([{}]));

      expect(() => store.update(5, 'company', 'Initech')).toThrow(NotFoundError);
      expect(() => store.update(-1, 'company', 'Initech')).toThrow('No application with id -1');
    });

    it('rejects an invalid status and keeps the old value', () => {
      const store = new RecordStore(createSnapshot([{ status: 'Interview' }]));

      expect(() => store.update(0, 'status', 'Hired')).toThrow('Unknown status "Hired"');
      expect(store.get(0).status).toBe('Interview');
    });

    it('rejects clearing the position', () => {
      const store = new RecordStore(createSnapshot([{}]));

      let caught: unknown;
      try {
        store.update(0, 'position', ' ');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError && caught.field).toBe('position');
    });

    it('does not notify when the value is unchanged', () => {
      const store = new RecordStore(createSnapshot([{ company: 'Acme' }]));
      const listener = vi.fn();
      store.subscribe(listener);

      store.update(0, 'company', 'Acme');

      expect(listener).not.toHaveBeenCalled();
      expect(store.revision).toBe(0);
    });
  });

  describe('delete', () => {
    it('renumbers the remaining records contiguously', () => {
      const store = new RecordStore(
        createSnapshot([{ company: 'A' }, { company: 'B' }, { company: 'C' }, { company: 'D' }])
      );

      store.delete([1, 3]);

      expect(store.list().map(r => [r.id, r.company])).toEqual([
        [0, 'A'],
        [1, 'C'],
      ]);
    });

    it('deletes nothing if any id is missing', () => {
      const store = new RecordStore(createSnapshot([{ company: 'A' }, { company: 'B' }]));

      expect(() => store.delete([0, 7])).toThrow(NotFoundError);
      expect(store.size).toBe(2);
    });

    it('ignores duplicate ids and an empty set', () => {
      const store = new RecordStore(createSnapshot([{ company: 'A' }, { company: 'B' }]));
      const listener = vi.fn();
      store.subscribe(listener);

      store.delete([]);
      expect(listener).not.toHaveBeenCalled();

      store.delete([0, 0]);
      expect(store.list().map(r => r.company)).toEqual(['B']);
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe('replace', () => {
    it('swaps the whole table and renumbers it', () => {
      const store = new RecordStore(createSnapshot([{ company: 'Old' }]));

      store.replace(createSnapshot([{ company: 'New 1' }, { company: 'New 2' }]));

      expect(store.list().map(r => [r.id, r.company])).toEqual([
        [0, 'New 1'],
        [1, 'New 2'],
      ]);
    });

    it('rejects an invalid snapshot and keeps the current table', () => {
      const store = new RecordStore(createSnapshot([{ company: 'Keep' }]));

      expect(() => store.replace(createSnapshot([{ company: '' }]))).toThrow(ValidationError);
      expect(store.list().map(r => r.company)).toEqual(['Keep']);
    });
  });

  describe('reads', () => {
    it('returns copies that later mutations do not affect', () => {
      const store = new RecordStore(createSnapshot([{ company: 'Acme' }]));
      const before = store.list();

      store.update(0, 'company', 'Globex');

      expect(before[0]?.company).toBe('Acme');
      expect(store.get(0).company).toBe('Globex');
    });

    it('filters lazily over a stable copy', () => {
      const store = new RecordStore(
        createSnapshot([{ status: 'Offer' }, { status: 'Rejected' }, { status: 'Offer' }])
      );

      const offers = store.filter(r => r.status === 'Offer');
      const first = offers.next();
      store.delete([2]);

      expect(first.value).toMatchObject({ id: 0 });
      expect([...offers].map(r => r.id)).toEqual([2]);
      expect(store.size).toBe(2);
    });
  });

  describe('notifications', () => {
    it('reports reason, snapshot and an increasing revision', () => {
      const store = new RecordStore();
      const changes: StoreChange[] = [];
      store.subscribe(change => changes.push(change));

      store.add(createApplication({ company: 'Acme' }));
      store.update(0, 'status', 'Interview');
      store.replace([]);

      expect(changes.map(c => [c.reason, c.revision, c.snapshot.length])).toEqual([
        ['add', 1, 1],
        ['update', 2, 1],
        ['replace', 3, 0],
      ]);
      expect(changes[1]?.snapshot[0]?.status).toBe('Interview');
    });

    it('stops notifying after unsubscribe', () => {
      const store = new RecordStore();
      const listener = vi.fn();
      const unsubscribe = store.subscribe(listener);

      unsubscribe();
      store.add(createApplication());

      expect(listener).not.toHaveBeenCalled();
    });
  });

  it('walks through a full add, update and delete session', () => {
    const store = new RecordStore([], { today: () => new Date(2024, 0, 15) });

    store.add({ company: 'Acme', position: 'Engineer', portalUrl: 'https://acme.example.com' });
    store.add({ company: 'Globex', position: 'Analyst', dateApplied: '2024-01-10' });
    store.add({ company: 'Initech', position: 'Developer', status: 'Rejected' });
    store.update(1, 'status', 'Interview');
    store.delete([0]);

    expect(store.list()).toEqual([
      {
        id: 0,
        company: 'Globex',
        position: 'Analyst',
        portalUrl: '',
        dateApplied: '2024-01-10',
        status: 'Interview',
      },
      {
        id: 1,
        company: 'Initech',
        position: 'Developer',
        portalUrl: '',
        dateApplied: '2024-01-15',
        status: 'Rejected',
      },
    ]);
    expect(store.revision).toBe(5);
  });
});
