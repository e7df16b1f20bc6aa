/**
 * @module loader/document
 * Reads one YAML or JSON schema document into changes and schema objects.
 *
 * A document may hold `tables`, `views` and `changes` lists (or a single
 * `table`, `view` or `change`). List items may be written flat or wrapped in
 * a key naming their kind:
 *
 * ```yaml
 * tables:
 *   - name: PRICE
 *     columns:
 *       - column:
 *           name: Price
 *           type: float
 *           constraints:
 *             - type: not null
 * ```
 *
 * Every item is validated on its own. An item that fails validation is
 * reported as an error problem and skipped; the rest of the document is
 * still read.
 */

import { parse, YAMLError } from 'yaml';
import { z } from 'zod';
import { StrataError } from '../core/errors';
import { Change, CreateSchemaChange, CreateSqlChange } from '../model/change';
import { ProblemLevel, SchemaProblem } from '../model/problem';
import {
  Column,
  Constraint,
  CreateColumn,
  CreateConstraint,
  CreateFullName,
  CreateTable,
  CreateView,
  SchemaObject,
  SchemaObjectType,
  Table,
  View,
} from '../model/schema';
import { CreateSqlStatement, SqlSet } from '../model/sql';
import { Order } from '../order/order';

// ─── Schemas ─────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwraps `{ column: {...} }` into `{...}`.
 */
function unwrap(key: string) {
  return (value: unknown): unknown => {
    if (isRecord(value) && Object.keys(value).length === 1 && isRecord(value[key])) {
      return value[key];
    }
    return value;
  };
}

/** A list of strings, or one comma-separated string */
const StringListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    typeof value === 'string'
      ? value.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
      : value
  );

const OrderFields = {
  order: z.number().int().optional(),
  before: StringListSchema.optional(),
  after: StringListSchema.optional(),
  comment: z.string().optional(),
};

const DialectSchema = z.preprocess(
  unwrap('dialect'),
  z
    .object({
      platforms: StringListSchema.optional(),
      syntax: z.string().optional(),
      sql: z.string().min(1),
    })
    .strict()
);

const SqlFields = {
  sql: z.string().min(1).optional(),
  dialects: z.array(DialectSchema).optional(),
};

const ChangeSchema = z.preprocess(
  unwrap('change'),
  z
    .object({
      ...OrderFields,
      ...SqlFields,
      change: z.enum(['add', 'remove', 'rename', 'alter', 'sql']),
      schema: z.enum(['table', 'view', 'column', 'constraint']).optional(),
      was: z.string().min(1).optional(),
      affects: StringListSchema.optional(),
    })
    .strict()
);

const CONSTRAINT_KEYS = ['type', 'name', 'columns', 'changes', 'sql', 'dialects', 'order', 'before', 'after', 'comment'];

/** Constraints keep any extra keys as details */
const ConstraintSchema = z.preprocess(
  unwrap('constraint'),
  z
    .object({
      ...OrderFields,
      ...SqlFields,
      type: z.string().min(1),
      name: z.string().min(1).optional(),
      columns: StringListSchema.optional(),
      changes: z.array(ChangeSchema).optional(),
    })
    .catchall(z.unknown())
);

const ColumnSchema = z.preprocess(
  unwrap('column'),
  z
    .object({
      ...OrderFields,
      name: z.string().min(1),
      type: z.string().min(1),
      dataType: z.string().min(1).optional(),
      autoIncrement: z.boolean().optional(),
      default: z.union([z.string(), z.number(), z.boolean()]).transform(String).optional(),
      remarks: z.string().optional(),
      constraints: z.array(ConstraintSchema).optional(),
      changes: z.array(ChangeSchema).optional(),
    })
    .strict()
);

const ColumnarFields = {
  ...OrderFields,
  name: z.string().min(1),
  catalog: z.string().min(1).optional(),
  schema: z.string().min(1).optional(),
  columns: z.array(ColumnSchema).optional(),
  constraints: z.array(ConstraintSchema).optional(),
  changes: z.array(ChangeSchema).optional(),
};

const TableSchema = z.preprocess(
  unwrap('table'),
  z.object({ ...ColumnarFields, space: z.string().min(1).optional() }).strict()
);

const ViewSchema = z.preprocess(
  unwrap('view'),
  z
    .object({
      ...ColumnarFields,
      query: z.string().min(1).optional(),
      dialects: z.array(DialectSchema).optional(),
      replace: z.boolean().optional(),
    })
    .strict()
    .refine((v) => v.query !== undefined || v.dialects !== undefined, {
      message: "a view requires 'query' or 'dialects'",
    })
);

const DocumentSchema = z
  .object({
    changes: z.array(z.unknown()).optional(),
    change: z.unknown().optional(),
    tables: z.array(z.unknown()).optional(),
    table: z.unknown().optional(),
    views: z.array(z.unknown()).optional(),
    view: z.unknown().optional(),
  })
  .strict();

type ChangeInput = z.infer<typeof ChangeSchema>;
type ConstraintInput = z.infer<typeof ConstraintSchema>;
type ColumnInput = z.infer<typeof ColumnSchema>;
type TableInput = z.infer<typeof TableSchema>;
type ViewInput = z.infer<typeof ViewSchema>;

interface OrderInput {
  order?: number;
  before?: string[];
  after?: string[];
}

interface SqlInput {
  sql?: string;
  dialects?: { platforms?: string[]; syntax?: string; sql: string }[];
}

// ─── Reading ─────────────────────────────────────────────────────────

/**
 * Everything read from one document.
 */
export interface ParsedDocument {
  TopChanges: Change[];
  Schema: SchemaObject[];
  Problems: SchemaProblem[];
}

/**
 * Parses a YAML (or JSON) document and reads it.
 *
 * @param content - The document text
 * @param sourceName - File name used in problems
 * @param fileRank - Position of the file within its version; the first
 *   number of every Order read from it
 */
export function ParseSchemaDocument(content: string, sourceName: string, fileRank: number): ParsedDocument {
  let data: unknown;
  try {
    data = parse(content);
  } catch (err) {
    if (err instanceof YAMLError) {
      return {
        TopChanges: [],
        Schema: [],
        Problems: [{ Level: 'fatal', Message: `cannot parse document: ${err.message}`, SourceName: sourceName }],
      };
    }
    throw err;
  }
  return ReadSchemaDocument(data, sourceName, fileRank);
}

/**
 * Reads an already parsed document. `null` (an empty file) reads as nothing.
 */
export function ReadSchemaDocument(data: unknown, sourceName: string, fileRank: number): ParsedDocument {
  const reader = new DocumentReader(sourceName, fileRank);
  reader.Read(data);
  return { TopChanges: reader.TopChanges, Schema: reader.Schema, Problems: reader.Problems };
}

class DocumentReader {
  readonly TopChanges: Change[] = [];
  readonly Schema: SchemaObject[] = [];
  readonly Problems: SchemaProblem[] = [];

  private readonly sourceName: string;
  private readonly fileRank: number;
  private sequence = 0;

  constructor(sourceName: string, fileRank: number) {
    this.sourceName = sourceName;
    this.fileRank = fileRank;
  }

  Read(data: unknown): void {
    if (data === null || data === undefined) {
      return;
    }
    const doc = DocumentSchema.safeParse(data);
    if (!doc.success) {
      const issue = doc.error.issues[0];
      this.problem('fatal', `unrecognized document: ${issue?.message ?? 'validation failed'}`, issue?.path.join('.'));
      return;
    }

    const items = (key: 'change' | 'table' | 'view', single: unknown, list: unknown[] | undefined) => {
      const ret: { Raw: unknown; Position: string }[] = [];
      if (single !== undefined) {
        ret.push({ Raw: single, Position: key });
      }
      (list ?? []).forEach((raw, idx) => ret.push({ Raw: raw, Position: `${key}s[${idx}]` }));
      return ret;
    };

    for (const item of items('change', doc.data.change, doc.data.changes)) {
      const input = this.validate(ChangeSchema, item.Raw, item.Position);
      const change = input && this.toChange(input, 'table', item.Position);
      if (change) {
        this.TopChanges.push(change);
      }
    }
    for (const item of items('table', doc.data.table, doc.data.tables)) {
      const input = this.validate(TableSchema, item.Raw, item.Position);
      if (input) {
        this.Schema.push(this.toTable(input, item.Position));
      }
    }
    for (const item of items('view', doc.data.view, doc.data.views)) {
      const input = this.validate(ViewSchema, item.Raw, item.Position);
      const view = input && this.toView(input, item.Position);
      if (view) {
        this.Schema.push(view);
      }
    }
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, position: string): T | null {
    const result = schema.safeParse(raw);
    if (result.success) {
      return result.data;
    }
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${position}.${issue.path.join('.')}` : position;
    this.problem('error', issue?.message ?? 'validation failed', where);
    return null;
  }

  private problem(level: ProblemLevel, message: string, position?: string): void {
    this.Problems.push({
      Level: level,
      Message: message,
      SourceName: this.sourceName,
      SourcePosition: position,
    });
  }

  private nextOrder(input: OrderInput, label?: string): Order {
    return new Order([this.fileRank, input.order ?? 0, this.sequence++], {
      Before: input.before,
      After: input.after,
      Label: label,
    });
  }

  /**
   * Runs a model factory, turning its validation errors into problems.
   */
  private build<T>(position: string, factory: () => T): T | null {
    try {
      return factory();
    } catch (err) {
      if (err instanceof StrataError) {
        this.problem('error', err.message, position);
        return null;
      }
      throw err;
    }
  }

  private toChanges(inputs: ChangeInput[] | undefined, defaultType: SchemaObjectType, position: string): Change[] {
    const ret: Change[] = [];
    (inputs ?? []).forEach((input, idx) => {
      const change = this.toChange(input, defaultType, `${position}.changes[${idx}]`);
      if (change) {
        ret.push(change);
      }
    });
    return ret;
  }

  private toChange(input: ChangeInput, defaultType: SchemaObjectType, position: string): Change | null {
    const order = this.nextOrder(input);
    const objectType = input.schema ?? defaultType;

    if (input.change === 'sql') {
      const sql = toSqlSet(input);
      if (!sql) {
        this.problem('error', "a sql change requires 'sql' or 'dialects'", position);
        return null;
      }
      return this.build(position, () =>
        CreateSqlChange({ Order: order, ObjectType: objectType, Sql: sql, Affects: input.affects, Comment: input.comment })
      );
    }

    const changeType = input.change;
    return this.build(position, () =>
      CreateSchemaChange({
        Order: order,
        ObjectType: objectType,
        ChangeType: changeType,
        PreviousName: input.was,
        Affects: input.affects,
        Comment: input.comment,
      })
    );
  }

  private toConstraints(
    inputs: ConstraintInput[] | undefined,
    defaultColumns: string[],
    position: string
  ): Constraint[] {
    const ret: Constraint[] = [];
    (inputs ?? []).forEach((input, idx) => {
      const where = `${position}.constraints[${idx}]`;
      const order = this.nextOrder(input);
      const changes = this.toChanges(input.changes, 'constraint', where);
      const details: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(input)) {
        if (!CONSTRAINT_KEYS.includes(key)) {
          details[key] = value;
        }
      }
      const constraint = this.build(where, () =>
        CreateConstraint({
          ConstraintType: input.type,
          ConstraintName: input.name,
          ColumnNames: input.columns ?? defaultColumns,
          Order: order,
          Details: details,
          Sql: toSqlSet(input),
          Comment: input.comment,
          Changes: changes,
        })
      );
      if (constraint) {
        ret.push(constraint);
      }
    });
    return ret;
  }

  private toColumns(inputs: ColumnInput[] | undefined, position: string): Column[] {
    return (inputs ?? []).map((input, idx) => {
      const where = `${position}.columns[${idx}]`;
      const order = this.nextOrder(input, input.name);
      const changes = this.toChanges(input.changes, 'column', where);
      return CreateColumn({
        Name: input.name,
        Order: order,
        Comment: input.comment,
        Changes: changes,
        ValueType: input.type,
        DataType: input.dataType,
        AutoIncrement: input.autoIncrement,
        DefaultValue: input.default,
        Remarks: input.remarks,
        Constraints: this.toConstraints(input.constraints, [input.name], where),
      });
    });
  }

  private toTable(input: TableInput, position: string): Table {
    const order = this.nextOrder(input, CreateFullName(input.catalog, input.schema, input.name));
    const changes = this.toChanges(input.changes, 'table', position);
    const columns = this.toColumns(input.columns, position);
    return CreateTable({
      Name: input.name,
      Order: order,
      Comment: input.comment,
      Changes: changes,
      CatalogName: input.catalog,
      SchemaName: input.schema,
      TableSpace: input.space,
      Columns: columns,
      Constraints: this.toConstraints(input.constraints, [], position),
    });
  }

  private toView(input: ViewInput, position: string): View | null {
    const order = this.nextOrder(input, CreateFullName(input.catalog, input.schema, input.name));
    const query = toSqlSet({ sql: input.query, dialects: input.dialects });
    if (!query) {
      this.problem('error', "a view requires 'query' or 'dialects'", position);
      return null;
    }
    const changes = this.toChanges(input.changes, 'view', position);
    const columns = this.toColumns(input.columns, position);
    return CreateView({
      Name: input.name,
      Order: order,
      Comment: input.comment,
      Changes: changes,
      CatalogName: input.catalog,
      SchemaName: input.schema,
      SelectQuery: query,
      ReplaceIfExists: input.replace,
      Columns: columns,
      Constraints: this.toConstraints(input.constraints, [], position),
    });
  }
}

/**
 * Collects the dialect statements, then the universal `sql`, into one set.
 * Returns undefined when there is no SQL at all.
 */
function toSqlSet(input: SqlInput): SqlSet | undefined {
  const statements = (input.dialects ?? []).map((d) =>
    CreateSqlStatement(d.sql, d.syntax ?? 'native', d.platforms ?? ['all'])
  );
  if (input.sql !== undefined) {
    statements.push(CreateSqlStatement(input.sql));
  }
  return statements.length > 0 ? { Statements: statements } : undefined;
}
