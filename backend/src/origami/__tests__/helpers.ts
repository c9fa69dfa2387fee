import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { GeometryInput } from '../../interfaces';

export const TET_PLY = path.join(__dirname, 'fixtures', 'tet.ply');

// What the simulated engine reports for fixtures/tet.ply at 42 nt minimum
export const TET_GEOMETRY: GeometryInput = {
    coordinates: [[0, 0, 0], [1, 0, 0], [0, 1, 0], [0, 0, 1]],
    edges: [[0, 1], [1, 2], [0, 2], [1, 3], [0, 3], [2, 3]],
    faces: [[0, 1, 2], [0, 1, 3], [0, 2, 3], [1, 2, 3]],
    edgeLengths: [42, 59, 42, 59, 42, 59],
    fileName: 'tet',
    stapleName: 'staples_tet_B',
    singleCrossovers: [0, 0, 0, 0, 0, 0]
};

export function createFakeEngine(geometry: GeometryInput = TET_GEOMETRY) {
    return {
        geometryToInput: vi.fn(async (): Promise<GeometryInput> => geometry),
        designCage: vi.fn(async (): Promise<string> => 'tet_M13'),
        generateAtomicModel: vi.fn(async (): Promise<void> => undefined)
    };
}

export function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'origami-'));
}

export function removeDir(dir: string): Promise<void> {
    return fs.rm(dir, { recursive: true, force: true });
}
