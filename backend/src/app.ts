import path from 'path';
import express from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CONFIG } from './config';
import type { DesignRun, IDesignVault } from './interfaces';
import { Orchestrator, DesignWarning, buildRequest } from './origami/orchestrator';
import { parseScaffoldInput } from './origami/scaffold';

const designRequestSchema = z.object({
    projectName: z.string().min(1),
    geometryFile: z.string().min(1),
    helicalForm: z.string().optional(),
    helicalTurns: z.number().optional(),
    scaffold: z.string().nullable().optional(),
    outputDir: z.string().optional(),
    singleCrossovers: z.boolean().optional(),
    printOutput: z.boolean().optional()
});

const MAX_RUNS_PAGE = 200;

/** Resolves a requested output directory under `root`, or undefined when it escapes it. */
export function confineOutputDir(root: string, requested?: string): string | undefined {
    const resolved = path.resolve(root, requested ?? '.');
    const relative = path.relative(root, resolved);
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
        return undefined;
    }
    return resolved;
}

export interface AppDeps {
    orchestrator: Orchestrator;
    vault: IDesignVault;
    // Root for every output directory; requests may only name paths inside it
    defaultOutputDir?: string;
}

export function createApp({ orchestrator, vault, defaultOutputDir = CONFIG.PATHS.OUTPUT_DIR }: AppDeps) {
    const app = express();
    const outputRoot = path.resolve(defaultOutputDir);

    app.use(cors());
    app.use(express.json());

    // --- API Endpoints ---

    app.get('/api/health', (req, res) => {
        res.json({ status: 'ok', mode: CONFIG.MODE });
    });

    app.post('/api/designs', async (req, res) => {
        const parsed = designRequestSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({ error: 'invalid-design-request', details: parsed.error.flatten() });
            return;
        }

        const body = parsed.data;
        const outputDir = confineOutputDir(outputRoot, body.outputDir);
        if (outputDir === undefined) {
            res.status(400).json({ error: 'output-dir-outside-root', details: `outputDir must stay inside ${outputRoot}` });
            return;
        }

        const id = uuidv4();
        const request = buildRequest(body.projectName, body.geometryFile, {
            helicalForm: body.helicalForm,
            helicalTurns: body.helicalTurns,
            scaffold: parseScaffoldInput(body.scaffold),
            outputDir,
            singleCrossovers: body.singleCrossovers,
            // The server streams progress over WebSocket instead
            printOutput: body.printOutput ?? false,
            runId: id
        });

        let warnings = 0;
        const countWarning = (warning: DesignWarning) => {
            if (warning.runId === id) warnings++;
        };

        try {
            orchestrator.on('warning', countWarning);
            const outcome = await orchestrator.design(request).finally(() => {
                orchestrator.off('warning', countWarning);
            });

            const run: DesignRun = {
                id,
                projectName: request.projectName,
                helicalForm: request.helicalForm,
                helicalTurns: request.helicalTurns,
                status: outcome.ok ? 'SUCCEEDED' : 'FAILED',
                errorKind: outcome.ok ? null : outcome.error.kind,
                errorMessage: outcome.ok ? null : outcome.error.message,
                fileName: outcome.ok ? outcome.value.fileName : null,
                outputDir: outcome.ok ? outcome.value.outputDir : null,
                warnings
            };
            await vault.saveRun(run);

            if (outcome.ok) {
                res.status(201).json({ id, result: outcome.value, warnings });
            } else {
                res.status(422).json({ id, error: outcome.error });
            }
        } catch (e) {
            res.status(500).json({ error: String(e) });
        }
    });

    app.get('/api/designs', async (req, res) => {
        const requested = Number(req.query.limit ?? 20);
        const limit = Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_RUNS_PAGE) : 20;
        try {
            res.json(await vault.getRecentRuns(limit));
        } catch (e) {
            res.status(500).json({ error: String(e) });
        }
    });

    app.get('/api/designs/:id', async (req, res) => {
        try {
            const run = await vault.getRun(req.params.id);
            if (run) {
                res.json(run);
            } else {
                res.status(404).json({ error: 'design-run-not-found' });
            }
        } catch (e) {
            res.status(500).json({ error: String(e) });
        }
    });

    return app;
}
