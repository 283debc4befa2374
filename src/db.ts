import pg from "pg";
import type { Settings } from "./config";
import { DataAccessError, errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("db");

export type Row = Record<string, unknown>;
export type QueryParam = string | number | boolean | Date | null | readonly (string | number)[];

/** Rows plus the column names the statement declared, even when no row came back. */
export interface QueryResult {
    columns: string[];
    rows: Row[];
}

/** Read-only query access to the clinical store. */
export interface DataStore {
    execute(sql: string, params?: readonly QueryParam[]): Promise<Row[]>;
    query(sql: string, params?: readonly QueryParam[]): Promise<QueryResult>;
}

/** Postgres-backed store: read-only sessions with a per-statement timeout. */
export class PgDataStore implements DataStore {
    private readonly pool: pg.Pool;
    private readonly schema: string;
    private readonly timeoutS: number;

    constructor(settings: Settings["db"]) {
        this.schema = settings.schema;
        this.timeoutS = settings.queryTimeoutS;
        this.pool = new pg.Pool({
            connectionString: settings.connectionString,
            host: settings.host,
            port: settings.port,
            database: settings.database,
            user: settings.user,
            password: settings.password,
            min: 1,
            max: 5,
            connectionTimeoutMillis: 10_000,
        });
        this.pool.on("error", (err) => log.warn(`Idle client error: ${err.message}`));
    }

    async execute(sql: string, params: readonly QueryParam[] = []): Promise<Row[]> {
        return (await this.query(sql, params)).rows;
    }

    async query(sql: string, params: readonly QueryParam[] = []): Promise<QueryResult> {
        let client: pg.PoolClient;
        try {
            client = await this.pool.connect();
        } catch (err) {
            throw new DataAccessError(`Database unreachable: ${errorMessage(err)}`, { cause: err });
        }
        try {
            // SET cannot take bind parameters; both values are validated by loadSettings.
            await client.query(`SET statement_timeout TO '${this.timeoutS}s'`);
            await client.query("SET default_transaction_read_only TO on");
            await client.query(`SET search_path TO "${this.schema}"`);
            const res = await client.query<Row>(sql, [...params]);
            return { columns: res.fields.map((f) => f.name), rows: res.rows };
        } catch (err) {
            throw toDataAccessError(err, this.timeoutS);
        } finally {
            client.release();
        }
    }

    async close() {
        await this.pool.end();
        log.info("Database pool closed");
    }
}

export function toDataAccessError(err: unknown, timeoutS: number): DataAccessError {
    const msg = errorMessage(err);
    if (msg.includes("canceling statement due to statement timeout")) {
        return new DataAccessError(`Query timed out (exceeded ${timeoutS}s).`, { timedOut: true, cause: err });
    }
    if (msg.includes("cannot execute") && msg.includes("read-only")) {
        return new DataAccessError("Query blocked: only read-only SELECT queries are allowed.", { cause: err });
    }
    return new DataAccessError(msg, { cause: err });
}

/** Records every statement, in issuance order, before forwarding it. */
export class QueryLog implements DataStore {
    private readonly issued: string[] = [];

    constructor(private readonly inner: DataStore) {}

    execute(sql: string, params?: readonly QueryParam[]): Promise<Row[]> {
        this.issued.push(sql);
        return this.inner.execute(sql, params);
    }

    query(sql: string, params?: readonly QueryParam[]): Promise<QueryResult> {
        this.issued.push(sql);
        return this.inner.query(sql, params);
    }

    get queries(): string[] {
        return [...this.issued];
    }
}

// --- row readers ---

export function asNumber(v: unknown, column: string): number {
    if (typeof v === "number" && Number.isFinite(v)) return v;
    // pg returns bigint / numeric columns as strings
    if (typeof v === "string" && v.trim() !== "" && Number.isFinite(Number(v))) return Number(v);
    throw new DataAccessError(`Unexpected value in column ${column}: ${String(v)}`);
}

export function asDate(v: unknown, column: string): Date {
    if (v instanceof Date && !Number.isNaN(v.getTime())) return v;
    if (typeof v === "string") {
        const d = new Date(v.length === 10 ? `${v}T00:00:00Z` : v);
        if (!Number.isNaN(d.getTime())) return d;
    }
    throw new DataAccessError(`Unexpected value in column ${column}: ${String(v)}`);
}

export function asString(v: unknown): string {
    return typeof v === "string" ? v : v == null ? "" : String(v);
}
