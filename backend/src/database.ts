import pg from 'pg';
import { newDb } from 'pg-mem';
import type { DomainErrorKind } from './origami/errors';
import type { DesignRun, IDesignVault, RunStatus } from './interfaces';

const { Pool } = pg;

const MEMORY_URL_PREFIX = 'pg-mem://';

interface DesignRunRow {
    id: string;
    project_name: string;
    helical_form: string;
    helical_turns: number;
    status: RunStatus;
    error_kind: DomainErrorKind | null;
    error_message: string | null;
    file_name: string | null;
    output_dir: string | null;
    warnings: number;
    created_at: Date | string;
}

const RUN_COLUMNS = 'id, project_name, helical_form, helical_turns, status, error_kind, error_message, file_name, output_dir, warnings, created_at';

function toRun(row: DesignRunRow): DesignRun {
    return {
        id: row.id,
        projectName: row.project_name,
        helicalForm: row.helical_form,
        helicalTurns: row.helical_turns,
        status: row.status,
        errorKind: row.error_kind,
        errorMessage: row.error_message,
        fileName: row.file_name,
        outputDir: row.output_dir,
        warnings: row.warnings,
        timestamp: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at
    };
}

function createMemoryPool(): pg.Pool {
    const db = newDb();
    const adapter = db.adapters.createPg();
    const pool: pg.Pool = new adapter.Pool();
    return pool;
}

/**
 * Postgres pool for the design vault. Without a URL (or with `pg-mem://`)
 * the vault lives in process memory and is lost on restart.
 */
export function createVaultPool(databaseUrl?: string): pg.Pool {
    const url = databaseUrl?.trim();
    if (!url) {
        console.warn('[vault] ORIGAMI_DATABASE_URL not provided, using in-memory pg-mem instance');
        return createMemoryPool();
    }
    if (url.startsWith(MEMORY_URL_PREFIX)) {
        return createMemoryPool();
    }
    return new Pool({ connectionString: url });
}

// Run history for the HTTP surface.
export class Database implements IDesignVault {
    private opened = false;
    private ended = false;

    constructor(private readonly pool: pg.Pool) {}

    public async open(): Promise<void> {
        await this.pool.query(`
            CREATE TABLE IF NOT EXISTS design_runs (
                seq SERIAL,
                id TEXT PRIMARY KEY,
                project_name TEXT NOT NULL,
                helical_form TEXT NOT NULL,
                helical_turns INTEGER NOT NULL,
                status TEXT NOT NULL,
                error_kind TEXT,
                error_message TEXT,
                file_name TEXT,
                output_dir TEXT,
                warnings INTEGER NOT NULL DEFAULT 0,
                created_at TIMESTAMPTZ NOT NULL DEFAULT now()
            )
        `);
        this.opened = true;
        console.log('Connected to design vault');
    }

    private connection(): pg.Pool {
        if (!this.opened) throw new Error('Design vault is not open');
        return this.pool;
    }

    public async saveRun(run: DesignRun): Promise<void> {
        await this.connection().query(
            `INSERT INTO design_runs (id, project_name, helical_form, helical_turns, status, error_kind, error_message, file_name, output_dir, warnings)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
            [
                run.id,
                run.projectName,
                run.helicalForm,
                run.helicalTurns,
                run.status,
                run.errorKind,
                run.errorMessage,
                run.fileName,
                run.outputDir,
                run.warnings
            ]
        );
    }

    public async getRecentRuns(limit: number = 50): Promise<DesignRun[]> {
        // seq follows insertion order even for runs saved within the same instant
        const { rows } = await this.connection().query<DesignRunRow>(
            `SELECT ${RUN_COLUMNS} FROM design_runs ORDER BY seq DESC LIMIT $1`,
            [limit]
        );
        return rows.map(toRun);
    }

    public async getRun(id: string): Promise<DesignRun | undefined> {
        const { rows } = await this.connection().query<DesignRunRow>(
            `SELECT ${RUN_COLUMNS} FROM design_runs WHERE id = $1`,
            [id]
        );
        return rows.length > 0 ? toRun(rows[0]) : undefined;
    }

    public async close(): Promise<void> {
        this.opened = false;
        if (this.ended) return;
        this.ended = true;
        await this.pool.end();
    }
}
