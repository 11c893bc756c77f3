import { randomUUID } from 'crypto';
import { FindOperator, getMetadataArgsStorage } from 'typeorm';

/**
 * In-process stand-in for the TypeORM DataSource / EntityManager, limited to
 * the calls the ladder services make: find/findOne (equality, the range
 * operators and IsNull; order; take), create, save, insert, clear and
 * `createQueryBuilder().update().set().execute()`.
 *
 * Primary keys, generated columns, defaults and create/update dates are read
 * from the entities' decorator metadata.
 */

type Row = Record<string, unknown>;
type Direction = 'ASC' | 'DESC' | 'asc' | 'desc';

export type EntityClass<T extends object = object> = new () => T;

export type InMemoryFindOptions = {
  where?: Row | Row[];
  order?: Record<string, Direction>;
  take?: number;
  select?: unknown;
};

export type FailingMethod = 'save' | 'insert' | 'clear' | 'update';

type EntityShape = {
  primary: string[];
  generated: Array<{ property: string; strategy: string }>;
  createDate: string[];
  updateDate: string[];
  nullable: string[];
  defaults: Array<[string, unknown]>;
};

function shapeOf(target: EntityClass): EntityShape {
  const storage = getMetadataArgsStorage();
  const columns = storage.columns.filter((c) => c.target === target);

  return {
    primary: columns
      .filter((c) => c.options.primary === true)
      .map((c) => c.propertyName),
    generated: storage.generations
      .filter((g) => g.target === target)
      .map((g) => ({ property: g.propertyName, strategy: g.strategy })),
    createDate: columns
      .filter((c) => c.mode === 'createDate')
      .map((c) => c.propertyName),
    updateDate: columns
      .filter((c) => c.mode === 'updateDate')
      .map((c) => c.propertyName),
    nullable: columns
      .filter((c) => c.options.nullable === true)
      .map((c) => c.propertyName),
    defaults: columns
      .filter(
        (c) =>
          c.options.default !== undefined &&
          typeof c.options.default !== 'function',
      )
      .map((c): [string, unknown] => [c.propertyName, c.options.default]),
  };
}

// eslint-disable-next-line @typescript-eslint/no-empty-object-type
function toRow(value: {}): Row {
  return Object.fromEntries(Object.entries(value));
}

function sameValue(a: unknown, b: unknown) {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}

function compareValues(a: unknown, b: unknown): number | null {
  if (a === null || a === undefined || b === null || b === undefined) {
    return null;
  }
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function applyOperator(op: FindOperator<unknown>, actual: unknown): boolean {
  const value: unknown = op.value;

  switch (op.type) {
    case 'isNull':
      return actual === null || actual === undefined;
    case 'lessThan': {
      const c = compareValues(actual, value);
      return c !== null && c < 0;
    }
    case 'lessThanOrEqual': {
      const c = compareValues(actual, value);
      return c !== null && c <= 0;
    }
    case 'moreThanOrEqual': {
      const c = compareValues(actual, value);
      return c !== null && c >= 0;
    }
    case 'between': {
      if (!Array.isArray(value) || value.length !== 2) return false;
      const lower = compareValues(actual, value[0]);
      const upper = compareValues(actual, value[1]);
      return lower !== null && upper !== null && lower >= 0 && upper <= 0;
    }
    default:
      throw new Error(`InMemoryDataSource: unsupported operator "${op.type}"`);
  }
}

function matchesWhere(row: Row, where: Row) {
  return Object.entries(where).every(([key, expected]) =>
    expected instanceof FindOperator
      ? applyOperator(expected, row[key])
      : sameValue(row[key], expected),
  );
}

function byOrder(order: Record<string, Direction>) {
  const keys = Object.entries(order);
  return (a: Row, b: Row) => {
    for (const [key, direction] of keys) {
      const c = compareValues(a[key], b[key]) ?? 0;
      if (c !== 0) return direction.toUpperCase() === 'DESC' ? -c : c;
    }
    return 0;
  };
}

export class InMemoryDataSource {
  readonly queries: Array<{ sql: string; params: unknown[] }> = [];

  private tables = new Map<EntityClass, Row[]>();
  private counters = new Map<string, number>();
  private failures: Array<{
    target: EntityClass;
    method: FailingMethod;
    error: Error;
  }> = [];

  getRepository<T extends object>(target: EntityClass<T>) {
    return new InMemoryRepository<T>(this, target);
  }

  async query(sql: string, params: unknown[] = []): Promise<unknown[]> {
    this.queries.push({ sql, params });
    return [];
  }

  /** Runs `work`; on a throw every table is restored to its prior state. */
  async transaction<R>(
    work: (manager: InMemoryDataSource) => Promise<R>,
  ): Promise<R> {
    const tables = new Map(
      [...this.tables].map(([target, rows]) => [
        target,
        rows.map((r) => ({ ...r })),
      ]),
    );
    const counters = new Map(this.counters);

    try {
      return await work(this);
    } catch (err: unknown) {
      this.tables = tables;
      this.counters = counters;
      throw err;
    }
  }

  /** Makes the next `method` call on `target`'s repository throw `error`. */
  failNext(
    target: EntityClass,
    method: FailingMethod,
    error = new Error(`injected ${method} failure`),
  ) {
    this.failures.push({ target, method, error });
  }

  /** Current rows of a table, as fresh entity instances. */
  rows<T extends object>(target: EntityClass<T>): T[] {
    return this.rowsOf(target).map((r) => Object.assign(new target(), r));
  }

  rowsOf(target: EntityClass): Row[] {
    let rows = this.tables.get(target);
    if (!rows) {
      rows = [];
      this.tables.set(target, rows);
    }
    return rows;
  }

  replaceRows(target: EntityClass, rows: Row[]) {
    this.tables.set(target, rows);
  }

  checkFailure(target: EntityClass, method: FailingMethod) {
    const i = this.failures.findIndex(
      (f) => f.target === target && f.method === method,
    );
    if (i === -1) return;
    const [failure] = this.failures.splice(i, 1);
    throw failure.error;
  }

  nextCounter(key: string) {
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    return next;
  }
}

export class InMemoryRepository<T extends object> {
  private readonly shape: EntityShape;

  constructor(
    private readonly ds: InMemoryDataSource,
    readonly target: EntityClass<T>,
  ) {
    this.shape = shapeOf(target);
  }

  create(plain: Partial<T> = {}): T {
    return Object.assign(new this.target(), plain);
  }

  async find(options: InMemoryFindOptions = {}): Promise<T[]> {
    const wheres =
      options.where === undefined
        ? []
        : Array.isArray(options.where)
          ? options.where
          : [options.where];

    let rows = this.ds
      .rowsOf(this.target)
      .filter((r) => wheres.length === 0 || wheres.some((w) => matchesWhere(r, w)));

    if (options.order) rows = [...rows].sort(byOrder(options.order));
    if (options.take !== undefined) rows = rows.slice(0, options.take);

    return rows.map((r) => this.hydrate(r));
  }

  async findOne(options: InMemoryFindOptions): Promise<T | null> {
    const [first] = await this.find({ ...options, take: 1 });
    return first ?? null;
  }

  save(entity: T): Promise<T>;
  save(entities: T[]): Promise<T[]>;
  async save(input: T | T[]): Promise<T | T[]> {
    this.ds.checkFailure(this.target, 'save');
    const entities = Array.isArray(input) ? input : [input];

    for (const entity of entities) {
      const row = toRow(entity);
      const existing = this.findByPrimary(row);

      if (existing) {
        Object.assign(existing, row);
        for (const prop of this.shape.updateDate) existing[prop] = new Date();
        Object.assign(entity, existing);
      } else {
        const stored = this.materialize(row);
        this.ds.rowsOf(this.target).push(stored);
        Object.assign(entity, stored);
      }
    }

    return input;
  }

  async insert(input: Partial<T> | Array<Partial<T>>) {
    this.ds.checkFailure(this.target, 'insert');
    const items = Array.isArray(input) ? input : [input];
    const identifiers: Row[] = [];

    for (const item of items) {
      const row = toRow(item);
      if (this.findByPrimary(row)) {
        throw new Error(
          `duplicate key value violates primary key of ${this.target.name}`,
        );
      }
      const stored = this.materialize(row);
      this.ds.rowsOf(this.target).push(stored);
      identifiers.push(
        Object.fromEntries(this.shape.primary.map((p) => [p, stored[p]])),
      );
    }

    return { identifiers, generatedMaps: identifiers, raw: [] };
  }

  async clear() {
    this.ds.checkFailure(this.target, 'clear');
    this.ds.replaceRows(this.target, []);
  }

  createQueryBuilder() {
    return new InMemoryUpdateBuilder<T>(this);
  }

  async updateAll(values: Row) {
    this.ds.checkFailure(this.target, 'update');
    const rows = this.ds.rowsOf(this.target);
    for (const row of rows) {
      Object.assign(row, values);
      for (const prop of this.shape.updateDate) row[prop] = new Date();
    }
    return { affected: rows.length, raw: [], generatedMaps: [] };
  }

  private findByPrimary(row: Row): Row | undefined {
    const keys = this.shape.primary;
    if (keys.length === 0 || keys.some((k) => row[k] == null)) return undefined;
    return this.ds
      .rowsOf(this.target)
      .find((r) => keys.every((k) => sameValue(r[k], row[k])));
  }

  private materialize(row: Row): Row {
    const stored: Row = { ...row };

    for (const [prop, value] of this.shape.defaults) {
      if (stored[prop] === undefined) stored[prop] = value;
    }
    for (const prop of this.shape.nullable) {
      if (stored[prop] === undefined) stored[prop] = null;
    }
    for (const { property, strategy } of this.shape.generated) {
      if (stored[property] != null) continue;
      stored[property] =
        strategy === 'uuid'
          ? randomUUID()
          : this.ds.nextCounter(`${this.target.name}.${property}`);
    }
    for (const prop of [...this.shape.createDate, ...this.shape.updateDate]) {
      if (stored[prop] == null) stored[prop] = new Date();
    }

    return stored;
  }

  private hydrate(row: Row): T {
    return Object.assign(new this.target(), row);
  }
}

class InMemoryUpdateBuilder<T extends object> {
  private values: Row = {};

  constructor(private readonly repo: InMemoryRepository<T>) {}

  update() {
    return this;
  }

  set(values: Partial<T>) {
    this.values = toRow(values);
    return this;
  }

  execute() {
    return this.repo.updateAll(this.values);
  }
}

export function createInMemoryDataSource() {
  return new InMemoryDataSource();
}
