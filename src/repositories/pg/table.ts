import type { QueryResultRow } from 'pg';
import type { Queryable } from '../../lib/db';

export interface TableDefinition<T> {
  name: string;
  /** Property name → column name. */
  columns: { [K in keyof T]-?: string };
  /** DATE columns, returned as `YYYY-MM-DD` strings instead of JS dates. */
  dateOnly?: ReadonlyArray<keyof T>;
  orderBy?: string;
}

/**
 * Thin SQL builder over one table. Rows come back already shaped as the
 * entity type because every column is selected under its camelCase alias.
 */
export class PgTable<T extends QueryResultRow & { id: number }> {
  readonly selectList: string;
  private readonly columnByProp = new Map<string, string>();

  constructor(
    private readonly db: Queryable,
    private readonly definition: TableDefinition<T>
  ) {
    const dateOnly = new Set((definition.dateOnly ?? []).map(String));
    const select: string[] = [];

    for (const [prop, column] of Object.entries(definition.columns)) {
      this.columnByProp.set(prop, column);
      select.push(`${column}${dateOnly.has(prop) ? '::text' : ''} AS "${prop}"`);
    }

    this.selectList = select.join(', ');
  }

  get name() {
    return this.definition.name;
  }

  async findAll(where?: string, values: unknown[] = []): Promise<T[]> {
    const { rows } = await this.db.query<T>(
      `SELECT ${this.selectList} FROM ${this.definition.name}${where ? ` WHERE ${where}` : ''} ORDER BY ${this.definition.orderBy ?? 'id'}`,
      values
    );
    return rows;
  }

  async findOne(where: string, values: unknown[]): Promise<T | null> {
    const { rows } = await this.db.query<T>(
      `SELECT ${this.selectList} FROM ${this.definition.name} WHERE ${where} LIMIT 1`,
      values
    );
    return rows[0] ?? null;
  }

  findById(id: number): Promise<T | null> {
    return this.findOne('id = $1', [id]);
  }

  async insert(data: object): Promise<T> {
    const assignments = this.assignments(data);
    const sql = assignments.length
      ? `INSERT INTO ${this.definition.name} (${assignments.map(([column]) => column).join(', ')})
         VALUES (${assignments.map((_, i) => `$${i + 1}`).join(', ')})
         RETURNING ${this.selectList}`
      : `INSERT INTO ${this.definition.name} DEFAULT VALUES RETURNING ${this.selectList}`;

    const { rows } = await this.db.query<T>(
      sql,
      assignments.map(([, value]) => value)
    );
    return rows[0];
  }

  /**
   * Updates the defined properties of `data`. `touch` holds raw SET
   * fragments applied on every update, e.g. `updated_at = now()`.
   */
  async update(id: number, data: object, touch: string[] = []): Promise<T | null> {
    const assignments = this.assignments(data);
    const sets = [...assignments.map(([column], i) => `${column} = $${i + 2}`), ...touch];

    if (sets.length === 0) {
      return this.findById(id);
    }

    const { rows } = await this.db.query<T>(
      `UPDATE ${this.definition.name} SET ${sets.join(', ')} WHERE id = $1 RETURNING ${this.selectList}`,
      [id, ...assignments.map(([, value]) => value)]
    );
    return rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const { rowCount } = await this.db.query(`DELETE FROM ${this.definition.name} WHERE id = $1`, [id]);
    return (rowCount ?? 0) > 0;
  }

  private assignments(data: object): Array<[string, unknown]> {
    const result: Array<[string, unknown]> = [];

    for (const [prop, value] of Object.entries(data)) {
      if (value === undefined) continue;

      const column = this.columnByProp.get(prop);
      if (!column || prop === 'id') {
        throw new Error(`Cannot write "${prop}" on table ${this.definition.name}`);
      }
      result.push([column, value]);
    }

    return result;
  }
}

/** CRUD over a single table; subclasses add the entity-specific lookups. */
export abstract class PgCrudRepository<T extends QueryResultRow & { id: number }, TCreate extends object, TUpdate extends object> {
  protected readonly table: PgTable<T>;

  protected constructor(
    protected readonly db: Queryable,
    definition: TableDefinition<T>,
    private readonly touchOnUpdate: string[] = []
  ) {
    this.table = new PgTable<T>(db, definition);
  }

  list(): Promise<T[]> {
    return this.table.findAll();
  }

  findById(id: number): Promise<T | null> {
    return this.table.findById(id);
  }

  create(data: TCreate): Promise<T> {
    return this.table.insert(data);
  }

  update(id: number, data: TUpdate): Promise<T | null> {
    return this.table.update(id, data, this.touchOnUpdate);
  }

  delete(id: number): Promise<boolean> {
    return this.table.delete(id);
  }
}
