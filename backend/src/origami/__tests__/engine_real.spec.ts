import { AssertionError } from 'assert';
import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CageDesignParams } from '../../interfaces';
import { RealEngine } from '../modules/engine_real';
import { translateGeometryFailure } from '../translator';
import { TET_GEOMETRY, makeTempDir, removeDir } from './helpers';

// Bridges are small Node scripts run with the current Node binary in place of the interpreter
const BRIDGE_PRELUDE = 'const [op, raw] = process.argv.slice(2);\nconst args = JSON.parse(raw);\n';

const CAGE_PARAMS: CageDesignParams = {
    geometry: TET_GEOMETRY,
    singleCrossovers: false,
    scaffoldSequence: '',
    scaffoldName: 'M13',
    useAForm: false,
    outputDir: '/designs/tet',
    twist: 1,
    printOutput: false
};

describe('RealEngine', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    async function engineWithBridge(body: string): Promise<RealEngine> {
        const bridge = path.join(dir, 'bridge.js');
        await fs.writeFile(bridge, BRIDGE_PRELUDE + body);
        return new RealEngine(process.execPath, bridge);
    }

    it('reads the reply from the last line after engine progress output', async () => {
        const engine = await engineWithBridge(`
console.log('Reading PLY file');
console.log('Found 6 edges');
console.log(JSON.stringify({ ok: true, result: {
    coordinates: [[0, 0, 0], [1, 0, 0]],
    edges: [[0, 1]],
    faces: [],
    edgeLengths: [args.minEdgeLength],
    fileName: op,
    stapleName: args.useAForm ? 'staples_tet_A' : 'staples_tet_B',
    singleCrossovers: [0]
} }));
`);

        const geometry = await engine.geometryToInput('tet.ply', dir, 42, false);

        expect(geometry).toEqual({
            coordinates: [[0, 0, 0], [1, 0, 0]],
            edges: [[0, 1]],
            faces: [],
            edgeLengths: [42],
            fileName: 'geometry_to_input',
            stapleName: 'staples_tet_B',
            singleCrossovers: [0]
        });
    });

    it('passes the cage design parameters through as JSON', async () => {
        const engine = await engineWithBridge(`
console.log(JSON.stringify({ ok: true, result: args.geometry.fileName + '_' + args.scaffoldName + '_' + args.twist }));
`);

        expect(await engine.designCage(CAGE_PARAMS)).toBe('tet_M13_1');
    });

    it('uses the reply on stdout when the bridge exits non-zero', async () => {
        const engine = await engineWithBridge(`
console.log(JSON.stringify({ ok: false, errorType: 'ValueError', message: 'Scaffold too short for routing' }));
process.exitCode = 1;
`);

        await expect(engine.designCage(CAGE_PARAMS)).rejects.toThrow('ValueError: Scaffold too short for routing');
    });

    it('rethrows the process failure when the bridge exits non-zero without a reply', async () => {
        const engine = await engineWithBridge(`
process.stderr.write('interpreter crashed');
process.exit(2);
`);

        await expect(engine.generateAtomicModel('tet_M13', false, dir)).rejects.toThrow('Command failed');
    });

    it('rethrows bridge assertion failures as AssertionError', async () => {
        const engine = await engineWithBridge(`
console.log(JSON.stringify({ ok: false, errorType: 'AssertionError', message: 'Face references unknown vertex' }));
process.exitCode = 1;
`);

        const error = await engine.geometryToInput('tet.ply', dir, 42, false).then(() => undefined, (e: unknown) => e);

        expect(error).toBeInstanceOf(AssertionError);
        const translated = translateGeometryFailure(error, 'tet.ply');
        expect(translated.kind).toBe('GeometryFileError');
        expect(translated.message).toBe("Problem with geometry file 'tet.ply': PLY file format validation failed");
    });

    it('rejects replies that are not bridge JSON', async () => {
        const engine = await engineWithBridge(`
console.log('Traceback (most recent call last):');
console.log('not json');
`);

        await expect(engine.designCage(CAGE_PARAMS)).rejects.toThrow('Malformed reply from design engine bridge: not json');
    });

    it('rejects replies with the wrong shape', async () => {
        const engine = await engineWithBridge(`
console.log(JSON.stringify({ status: 'done' }));
`);

        await expect(engine.designCage(CAGE_PARAMS)).rejects.toThrow('Malformed reply from design engine bridge: {"status":"done"}');
    });

    it('rejects malformed geometry', async () => {
        const engine = await engineWithBridge(`
console.log(JSON.stringify({ ok: true, result: { fileName: 'tet' } }));
`);

        await expect(engine.geometryToInput('tet.ply', dir, 42, false)).rejects.toThrow('Design engine bridge returned malformed geometry');
    });

    it('rejects a cage design without a file name', async () => {
        const engine = await engineWithBridge(`
console.log(JSON.stringify({ ok: true, result: null }));
`);

        await expect(engine.designCage(CAGE_PARAMS)).rejects.toThrow('Design engine bridge returned no file name');
    });
});
