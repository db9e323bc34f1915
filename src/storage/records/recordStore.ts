import { ZodError } from 'zod';
import { NotFoundError, ValidationError } from '../../errors.js';
import {
  ApplicationStatus,
  CalendarDate,
  DEFAULT_STATUS,
  RecordFieldsSchema,
  formatCalendarDate,
  numberRecords,
  parseStatus,
  validateSnapshot,
  type ApplicationRecord,
  type EditableField,
  type NewApplication,
  type RecordFields,
  type Snapshot,
} from './schema.js';

export type ChangeReason = 'add' | 'update' | 'delete' | 'replace';

export interface StoreChange {
  reason: ChangeReason;
  snapshot: Snapshot;
  revision: number;
}

export type StoreListener = (change: StoreChange) => void;

function toValidationError(error: unknown): ValidationError {
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const field = issue?.path.map(String).join('.');
    return new ValidationError(issue?.message ?? 'Invalid application record', field || undefined);
  }
  if (error instanceof ValidationError) {
    return error;
  }
  return new ValidationError(error instanceof Error ? error.message : String(error));
}

/**
 * Authoritative in-memory table of application records.
 *
 * Every method runs synchronously on the event loop, so a mutation can never
 * interleave with another mutation or with a sync-driven replace. Listeners
 * see the table only between operations.
 */
export class RecordStore {
  private rows: RecordFields[];
  private listeners = new Set<StoreListener>();
  private rev = 0;
  private readonly today: () => Date;

  constructor(initial: Snapshot = [], options: { today?: () => Date } = {}) {
    this.rows = this.validate(initial);
    this.today = options.today ?? (() => new Date());
  }

  /**
   * Bumped by every successful mutation, including replace.
   */
  get revision(): number {
    return this.rev;
  }

  get size(): number {
    return this.rows.length;
  }

  list(): Snapshot {
    return numberRecords(this.rows);
  }

  get(id: number): ApplicationRecord {
    const row = this.rows[id];
    if (!Number.isInteger(id) || row === undefined) {
      throw new NotFoundError(id);
    }
    return { ...row, id };
  }

  /**
   * Lazily yield records matching a predicate. Iterates over a copy taken on
   * the first pull, so later mutations do not affect an open iteration.
   */
  *filter(predicate: (record: ApplicationRecord) => boolean): Generator<ApplicationRecord, void, undefined> {
    for (const record of this.list()) {
      if (predicate(record)) {
        yield record;
      }
    }
  }

  add(input: NewApplication): number {
    let status = DEFAULT_STATUS;
    if (input.status !== undefined && input.status.trim() !== '') {
      const parsed = parseStatus(input.status);
      if (!parsed) {
        throw new ValidationError(`Unknown status "${input.status}"`, 'status');
      }
      status = parsed;
    }

    let row: RecordFields;
    try {
      row = RecordFieldsSchema.parse({
        company: input.company,
        position: input.position,
        portalUrl: input.portalUrl ?? '',
        dateApplied: input.dateApplied?.trim() || formatCalendarDate(this.today()),
        status,
      });
    } catch (error) {
      throw toValidationError(error);
    }

    const id = this.rows.length;
    this.rows = [...this.rows, row];
    this.emit('add');
    return id;
  }

  update(id: number, field: EditableField, value: string): void {
    const current = this.rows[id];
    if (!Number.isInteger(id) || current === undefined) {
      throw new NotFoundError(id);
    }

    const next: RecordFields = { ...current, ...this.buildPatch(field, value) };
    if (next[field] === current[field]) {
      return;
    }

    const rows = [...this.rows];
    rows[id] = next;
    this.rows = rows;
    this.emit('update');
  }

  /**
   * Remove records and renumber the rest to stay contiguous from 0.
   * Fails without side effects if any id is absent.
   */
  delete(ids: Iterable<number>): void {
    const doomed = new Set<number>();
    for (const id of ids) {
      if (!Number.isInteger(id) || id < 0 || id >= this.rows.length) {
        throw new NotFoundError(id);
      }
      doomed.add(id);
    }

    if (doomed.size === 0) {
      return;
    }

    this.rows = this.rows.filter((_, index) => !doomed.has(index));
    this.emit('delete');
  }

  /**
   * Swap the whole table for another snapshot in one step.
   */
  replace(snapshot: Snapshot): void {
    this.rows = this.validate(snapshot);
    this.emit('replace');
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private buildPatch(field: EditableField, value: string): Partial<RecordFields> {
    try {
      switch (field) {
        case 'company':
          return { company: RecordFieldsSchema.shape.company.parse(value) };
        case 'position':
          return { position: RecordFieldsSchema.shape.position.parse(value) };
        case 'portalUrl':
          return { portalUrl: value.trim() };
        case 'dateApplied':
          return { dateApplied: CalendarDate.parse(value) };
        case 'status':
          return { status: ApplicationStatus.parse(parseStatus(value) ?? value) };
      }
    } catch (error) {
      if (error instanceof ZodError && field === 'status') {
        throw new ValidationError(`Unknown status "${value}"`, 'status');
      }
      const invalid = toValidationError(error);
      throw new ValidationError(invalid.message, field);
    }
  }

  private validate(snapshot: Snapshot): RecordFields[] {
    try {
      return validateSnapshot(snapshot);
    } catch (error) {
      throw toValidationError(error);
    }
  }

  private emit(reason: ChangeReason): void {
    this.rev++;
    const change: StoreChange = { reason, snapshot: this.list(), revision: this.rev };
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
