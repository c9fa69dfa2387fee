import { execFile } from 'child_process';
import { AssertionError } from 'assert';
import util from 'util';
import { z } from 'zod';
import { CONFIG } from '../../config';
import type { CageDesignParams, GeometryInput, IDesignEngine } from '../../interfaces';

const execFileAsync = util.promisify(execFile);

const bridgeReplySchema = z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true), result: z.unknown() }),
    z.object({ ok: z.literal(false), errorType: z.string(), message: z.string() })
]);

type BridgeReply = z.infer<typeof bridgeReplySchema>;

const geometryInputSchema = z.object({
    coordinates: z.array(z.tuple([z.number(), z.number(), z.number()])),
    edges: z.array(z.tuple([z.number().int(), z.number().int()])),
    faces: z.array(z.array(z.number().int())),
    edgeLengths: z.array(z.number()),
    fileName: z.string(),
    stapleName: z.string(),
    singleCrossovers: z.array(z.number())
});

// 64 MB: geometry replies carry full coordinate lists
const MAX_BRIDGE_OUTPUT = 64 * 1024 * 1024;

function parseReply(stdout: string): BridgeReply {
    // The engine prints progress to stdout; the bridge's reply is the last line
    const lines = stdout.trim().split('\n');
    const last = lines[lines.length - 1];
    let json: unknown;
    try {
        json = JSON.parse(last);
    } catch {
        throw new Error(`Malformed reply from design engine bridge: ${last}`);
    }
    const parsed = bridgeReplySchema.safeParse(json);
    if (!parsed.success) {
        throw new Error(`Malformed reply from design engine bridge: ${last}`);
    }
    return parsed.data;
}

function stdoutOf(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'stdout' in error && typeof error.stdout === 'string') {
        return error.stdout;
    }
    return undefined;
}

/**
 * Drives the external DAEDALUS engine through bin/daedalus_bridge.py. Each
 * operation is one interpreter process; arguments go in as a JSON argv
 * entry and a one-line JSON reply comes back on stdout.
 */
export class RealEngine implements IDesignEngine {
    constructor(
        private readonly interpreter: string = CONFIG.PATHS.PYTHON,
        private readonly bridge: string = CONFIG.PATHS.ENGINE_BRIDGE
    ) {}

    private async call(operation: string, args: Record<string, unknown>): Promise<unknown> {
        let stdout: string;
        try {
            ({ stdout } = await execFileAsync(
                this.interpreter,
                [this.bridge, operation, JSON.stringify(args)],
                { maxBuffer: MAX_BRIDGE_OUTPUT }
            ));
        } catch (error) {
            // The bridge exits non-zero on engine failures but still replies
            const output = stdoutOf(error);
            if (!output) throw error;
            stdout = output;
        }

        const reply = parseReply(stdout);
        if (reply.ok) {
            return reply.result;
        }
        if (reply.errorType === 'AssertionError') {
            throw new AssertionError({ message: reply.message });
        }
        throw new Error(`${reply.errorType}: ${reply.message}`);
    }

    public async geometryToInput(geometryFile: string, outputDir: string, minEdgeLength: number, useAForm: boolean): Promise<GeometryInput> {
        const result = await this.call('geometry_to_input', { geometryFile, outputDir, minEdgeLength, useAForm });
        const parsed = geometryInputSchema.safeParse(result);
        if (!parsed.success) {
            throw new Error(`Design engine bridge returned malformed geometry: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    public async designCage(params: CageDesignParams): Promise<string> {
        const result = await this.call('design_cage', { ...params });
        if (typeof result !== 'string') {
            throw new Error('Design engine bridge returned no file name');
        }
        return result;
    }

    public async generateAtomicModel(fileName: string, useAForm: boolean, outputDir: string): Promise<void> {
        await this.call('generate_atomic_model', { fileName, useAForm, outputDir });
    }
}
