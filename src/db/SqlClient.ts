/**
 * SQL Client
 *
 * A single PostgreSQL connection with a positional-parameter session on
 * top. Parameters are bound with addParameter() and written into the SQL
 * text as escaped literals when the next query runs; nothing is sent to
 * the server as a separate bind value.
 */

import { Client, QueryResult, TypeOverrides } from "pg";
import { dbConfig, SqlCredentials } from "../config/db.config";
import {
  asBool,
  asDateTime,
  asFloat,
  asInt,
  asString,
  asStringSafe,
} from "../core/DataHelper";
import {
  ArgumentError,
  ConfigurationError,
  SqlExecutionError,
} from "../core/errors";
import {
  formatArgumentList,
  quoteIdentifier,
  substituteParameters,
} from "../query/ValueFormatter";
import {
  DataConnection,
  SqlDataType,
  SqlParameter,
  SqlRow,
  SqlValue,
} from "./DataConnection";

/**
 * An open result set served one row at a time by nextRow()
 */
interface RowCursor {
  next(): Promise<SqlRow | null>;
  release(): Promise<void>;
}

/**
 * OID of `timestamp without time zone`
 */
const TIMESTAMP_OID = 1114;

/**
 * Result parsers for a connection. Timestamps are written as GMT text, so
 * `timestamp` columns are read back as GMT rather than in the process's
 * local zone.
 */
export function gmtTypeParsers(): TypeOverrides {
  const overrides = new TypeOverrides();
  overrides.setTypeParser(TIMESTAMP_OID, (value: string) => asDateTime(value));
  return overrides;
}

/**
 * Coerce a raw value for a declared parameter type
 */
export function coerceParameter(type: SqlDataType, value: unknown): SqlValue {
  if (value === null || value === undefined) {
    return null;
  }

  switch (type) {
    case SqlDataType.String:
      return asStringSafe(value);
    case SqlDataType.Text:
      // markup is kept for text blocks
      return asStringSafe(value, false);
    case SqlDataType.Integer:
      return asInt(value);
    case SqlDataType.Float:
      return asFloat(value);
    case SqlDataType.Timestamp:
      return asDateTime(value);
    case SqlDataType.Bool:
      return asBool(value);
    case SqlDataType.Data:
      return Buffer.isBuffer(value) ? value : asString(value);
    default: {
      const unknownType: never = type;
      throw new ConfigurationError(`Invalid data type: ${String(unknownType)}`);
    }
  }
}

function driverError(error: unknown, sql: string): SqlExecutionError {
  if (error instanceof SqlExecutionError) {
    return error;
  }
  const message =
    error instanceof Error ? error.message : "Unknown database error";
  const code =
    error instanceof Error && "code" in error && typeof error.code === "string"
      ? error.code
      : null;
  return new SqlExecutionError(message, sql, code);
}

/**
 * PostgreSQL implementation of DataConnection
 *
 * @example
 * const db = new SqlClient();
 * db.addParameter(SqlDataType.String, "foo");
 * db.addParameter(SqlDataType.Integer, 12345);
 * const rows = await db.query('select * from "Users" where "Username"=? and "Type"=?');
 * // runs: select * from "Users" where "Username"='foo' and "Type"=12345
 * await db.close();
 */
export class SqlClient implements DataConnection {
  private readonly credentials: SqlCredentials;
  private handle: Client | null = null;
  private params: SqlParameter[] = [];
  private lastRowCount: number = 0;
  private cursor: RowCursor | null = null;
  private detachedCursors: RowCursor[] = [];
  private cursorSequence: number = 0;

  /**
   * @param credentials - Defaults to the environment configuration
   * @throws ArgumentError when hostname, username or database is missing
   */
  constructor(credentials: SqlCredentials = dbConfig) {
    if (!credentials.hostname || !credentials.username || !credentials.database) {
      throw new ArgumentError("Missing SQL credentials");
    }
    this.credentials = credentials;
  }

  // ==========================================================================
  // CONNECTION
  // ==========================================================================

  async open(): Promise<void> {
    if (this.handle) {
      return;
    }

    const client = new Client({
      host: this.credentials.hostname,
      port: this.credentials.port,
      user: this.credentials.username,
      password: this.credentials.password,
      database: this.credentials.database,
      client_encoding: this.credentials.charset,
      types: gmtTypeParsers(),
    });

    // An idle connection can fail between queries; drop it so the next
    // statement reconnects.
    client.on("error", (err: Error) => {
      console.error("Unexpected error on idle connection:", err);
      if (this.handle === client) {
        this.handle = null;
        this.cursor = null;
        this.detachedCursors = [];
      }
    });

    try {
      await client.connect();
    } catch (error) {
      throw driverError(error, "");
    }
    this.handle = client;
  }

  async close(): Promise<void> {
    const client = this.handle;
    if (!client) {
      return;
    }

    try {
      this.detachCursor();
      await this.releaseDetachedCursors();
    } finally {
      this.handle = null;
      await client.end();
    }
  }

  hasConnection(): boolean {
    return this.handle !== null;
  }

  // ==========================================================================
  // PARAMETERS
  // ==========================================================================

  /**
   * Queue a parameter for the next query, coerced for its type
   *
   * @throws ConfigurationError for an unknown type
   */
  addParameter(type: SqlDataType, value: unknown): void {
    this.params.push({ type, value: coerceParameter(type, value) });
  }

  newQuery(): void {
    this.params = [];
    this.lastRowCount = 0;
    this.detachCursor();
  }

  /**
   * Parameters bound since the last newQuery() or execution
   */
  getPendingParameters(): readonly SqlParameter[] {
    return this.params;
  }

  getAffectedRowCount(): number {
    return this.lastRowCount;
  }

  // ==========================================================================
  // EXECUTION
  // ==========================================================================

  async query(sql: string, skipParameters: boolean = false): Promise<SqlRow[]> {
    const client = await this.prepare();
    const text = this.buildQuery(client, sql, skipParameters);
    return this.execute(client, text);
  }

  async beginQuery(sql: string, skipParameters: boolean = false): Promise<void> {
    const client = await this.prepare();
    const text = this.buildQuery(client, sql, skipParameters);
    const name = quoteIdentifier(`cursor_${++this.cursorSequence}`);

    await this.execute(client, `declare ${name} cursor with hold for ${text}`);
    this.cursor = this.serverCursor(client, name);
  }

  async nextRow(): Promise<SqlRow | null> {
    if (!this.cursor) {
      return null;
    }
    const row = await this.cursor.next();
    if (row === null) {
      this.detachCursor();
      await this.releaseDetachedCursors();
    }
    return row;
  }

  async procedure(name: string): Promise<SqlRow[]> {
    const client = await this.prepare();
    return this.execute(client, this.buildProcedureCall(client, name));
  }

  async beginProcedure(name: string): Promise<void> {
    const rows = await this.procedure(name);
    this.cursor = {
      next: async () => rows.shift() ?? null,
      release: async () => undefined,
    };
  }

  /**
   * @throws ConfigurationError when not connected
   */
  async lastId(): Promise<number> {
    const client = this.requireHandle("Cannot read last id as connection not open");
    const result = await this.run(client, 'select lastval() as "Id"');
    return asInt(result.rows[0]?.Id);
  }

  /**
   * Escape a string as a quoted literal with the driver's rules
   *
   * @throws ConfigurationError when not connected
   */
  escapeVariable(value: string): string {
    const client = this.requireHandle("Cannot escape input as connection not open");
    return client.escapeLiteral(value);
  }

  quoteIdentifier(name: string): string {
    return quoteIdentifier(name);
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /**
   * Connect if needed and release cursors left from earlier statements
   */
  private async prepare(): Promise<Client> {
    await this.open();
    const client = this.requireHandle("Cannot execute query as connection not open");
    this.detachCursor();
    await this.releaseDetachedCursors();
    return client;
  }

  private requireHandle(message: string): Client {
    if (!this.handle) {
      throw new ConfigurationError(message);
    }
    return this.handle;
  }

  private buildQuery(client: Client, sql: string, skipParameters: boolean): string {
    if (skipParameters) {
      return sql;
    }
    return substituteParameters(sql, this.params, (value) =>
      client.escapeLiteral(value)
    );
  }

  private buildProcedureCall(client: Client, name: string): string {
    const args = formatArgumentList(this.params, (value) =>
      client.escapeLiteral(value)
    );
    return `call ${quoteIdentifier(name)}(${args})`;
  }

  /**
   * Run a caller's statement. Bound parameters are spent afterwards,
   * whether it succeeded or not.
   */
  private async execute(client: Client, sql: string): Promise<SqlRow[]> {
    let result: QueryResult<SqlRow>;
    try {
      result = await this.run(client, sql);
    } finally {
      this.params = [];
    }

    // statements without a result set (insert, update, delete) report
    // affected rows instead
    if (result.fields.length > 0) {
      this.lastRowCount = result.rows.length;
      return result.rows;
    }
    this.lastRowCount = result.rowCount ?? 0;
    return [];
  }

  /**
   * Send SQL text as-is, leaving session state alone
   */
  private async run(client: Client, sql: string): Promise<QueryResult<SqlRow>> {
    try {
      return await client.query<SqlRow>(sql);
    } catch (error) {
      throw driverError(error, sql);
    }
  }

  private serverCursor(client: Client, name: string): RowCursor {
    return {
      next: async () => {
        const result = await this.run(client, `fetch next from ${name}`);
        return result.rows[0] ?? null;
      },
      release: async () => {
        if (this.handle === client) {
          await this.run(client, `close ${name}`);
        }
      },
    };
  }

  private detachCursor(): void {
    if (this.cursor) {
      this.detachedCursors.push(this.cursor);
      this.cursor = null;
    }
  }

  private async releaseDetachedCursors(): Promise<void> {
    const cursors = this.detachedCursors;
    this.detachedCursors = [];
    for (const cursor of cursors) {
      await cursor.release();
    }
  }
}
