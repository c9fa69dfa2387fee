import assert from 'assert';
import fs from 'fs/promises';
import path from 'path';
import { CONFIG } from '../../config';
import type { CageDesignParams, Edge, GeometryInput, IDesignEngine, Vertex } from '../../interfaces';

interface PlyMesh {
    vertices: Vertex[];
    faces: number[][];
}

export function parseAsciiPly(content: string): PlyMesh {
    const lines = content.split(/\r?\n/).map(l => l.trim());
    assert.ok(lines[0] === 'ply', 'PLY magic number missing');

    let vertexCount = 0;
    let faceCount = 0;
    let cursor = 1;
    for (; cursor < lines.length && lines[cursor] !== 'end_header'; cursor++) {
        const tokens = lines[cursor].split(/\s+/);
        if (tokens[0] === 'format') {
            assert.ok(tokens[1] === 'ascii', `Unsupported PLY format '${tokens[1]}'`);
        } else if (tokens[0] === 'element' && tokens[1] === 'vertex') {
            vertexCount = Number(tokens[2]);
        } else if (tokens[0] === 'element' && tokens[1] === 'face') {
            faceCount = Number(tokens[2]);
        }
    }
    assert.ok(cursor < lines.length, 'PLY header is not terminated by end_header');
    assert.ok(Number.isInteger(vertexCount) && vertexCount > 0, 'PLY declares no vertices');

    const body = lines.slice(cursor + 1).filter(l => l.length > 0);
    assert.ok(body.length >= vertexCount + faceCount, 'PLY body is shorter than its header declares');

    const vertices: Vertex[] = body.slice(0, vertexCount).map(line => {
        const [x, y, z] = line.split(/\s+/).map(Number);
        assert.ok([x, y, z].every(Number.isFinite), `Malformed vertex line '${line}'`);
        return [x, y, z];
    });

    const faces = body.slice(vertexCount, vertexCount + faceCount).map(line => {
        const [count, ...indices] = line.split(/\s+/).map(Number);
        assert.ok(indices.length === count, `Malformed face line '${line}'`);
        assert.ok(indices.every(i => Number.isInteger(i) && i >= 0 && i < vertexCount), `Face references unknown vertex '${line}'`);
        return indices;
    });

    return { vertices, faces };
}

export function facesToEdges(faces: number[][]): Edge[] {
    const seen = new Set<string>();
    const edges: Edge[] = [];
    for (const face of faces) {
        for (let i = 0; i < face.length; i++) {
            const a = face[i];
            const b = face[(i + 1) % face.length];
            const edge: Edge = a < b ? [a, b] : [b, a];
            const key = `${edge[0]}-${edge[1]}`;
            if (!seen.has(key)) {
                seen.add(key);
                edges.push(edge);
            }
        }
    }
    return edges;
}

function distance(a: Vertex, b: Vertex): number {
    return Math.hypot(a[0] - b[0], a[1] - b[1], a[2] - b[2]);
}

// Mock of the external design engine: enough geometry handling to exercise
// the pipeline end to end, with placeholder artifacts.
export class SimulatedEngine implements IDesignEngine {

    public async geometryToInput(geometryFile: string, outputDir: string, minEdgeLength: number, useAForm: boolean): Promise<GeometryInput> {
        const { vertices, faces } = parseAsciiPly(await fs.readFile(geometryFile, 'utf-8'));
        const edges = facesToEdges(faces);

        // Shortest edge gets exactly minEdgeLength, the rest scale with it
        const distances = edges.map(([a, b]) => distance(vertices[a], vertices[b]));
        const shortest = Math.min(...distances);
        assert.ok(edges.length === 0 || shortest > 0, 'Geometry contains a zero-length edge');
        const edgeLengths = distances.map(d => Math.round(minEdgeLength * d / shortest));

        const fileName = path.basename(geometryFile, path.extname(geometryFile));
        return {
            coordinates: vertices,
            edges,
            faces,
            edgeLengths,
            fileName,
            stapleName: `staples_${fileName}_${useAForm ? 'A' : 'B'}`,
            singleCrossovers: edges.map(() => 0)
        };
    }

    public async designCage(params: CageDesignParams): Promise<string> {
        const { geometry } = params;
        const total = geometry.edgeLengths.reduce((sum, length) => sum + length, 0);
        const scaffoldName = params.scaffoldName
            || (2 * total <= CONFIG.SIMULATION.DEFAULT_SCAFFOLD_LENGTH ? 'M13' : 'random');
        const stem = `${geometry.fileName}_${scaffoldName}`;

        if (params.printOutput) {
            console.log(`[SimulatedEngine] Routing scaffold over ${geometry.edges.length} edges (twist ${params.twist})`);
        }

        const rows = ['Staple Name,Sequence,Length'];
        geometry.edges.forEach(([a, b], i) => {
            const length = geometry.edgeLengths[i];
            rows.push(`${geometry.stapleName}_${a}_${b},${'N'.repeat(length)},${length}`);
        });
        await fs.writeFile(path.join(params.outputDir, `staples_${stem}.csv`), rows.join('\n') + '\n');
        await fs.writeFile(path.join(params.outputDir, `${stem}.cndo`), JSON.stringify({
            edges: geometry.edges.length,
            totalLength: total,
            aForm: params.useAForm,
            twist: params.twist,
            singleCrossovers: params.singleCrossovers
        }, null, 2));

        return stem;
    }

    public async generateAtomicModel(fileName: string, useAForm: boolean, outputDir: string): Promise<void> {
        const form = useAForm ? 'A-FORM' : 'B-FORM';
        await fs.writeFile(path.join(outputDir, `${fileName}.pdb`), `HEADER    SIMULATED ${form} ORIGAMI\nEND\n`);
    }
}
