import fs from 'fs/promises';
import path from 'path';
import { Result, ok, fail, scaffoldSequenceError } from './errors';

export type ScaffoldInput =
    | { kind: 'absent' }
    | { kind: 'default' }
    | { kind: 'inline'; sequence: string }
    | { kind: 'file'; path: string };

export interface ResolvedScaffold {
    // Empty means the engine picks M13 or a random sequence itself
    readonly sequence: string;
    readonly name: string;
}

export const NUCLEOTIDES: ReadonlySet<string> = new Set(['A', 'T', 'G', 'C', 'U']);

const DEFAULT_SCAFFOLD_KEYWORDS = ['M13', 'M13.txt'];

/**
 * Maps a loosely typed scaffold value (an HTTP field, a CLI argument) onto
 * a ScaffoldInput. This is the only place that guesses whether a string is
 * a path or a sequence.
 */
export function parseScaffoldInput(raw?: string | null): ScaffoldInput {
    const value = raw?.trim();
    if (!value) {
        return { kind: 'absent' };
    }
    if (DEFAULT_SCAFFOLD_KEYWORDS.includes(value)) {
        return { kind: 'default' };
    }
    if (value.includes('/') || value.includes('\\') || path.extname(value) !== '') {
        return { kind: 'file', path: value };
    }
    return { kind: 'inline', sequence: value };
}

/** Sorted, de-duplicated characters of `sequence` outside the nucleotide alphabet. */
export function invalidNucleotides(sequence: string): string[] {
    const invalid = new Set<string>();
    for (const char of sequence.toUpperCase()) {
        if (!NUCLEOTIDES.has(char)) {
            invalid.add(char);
        }
    }
    return [...invalid].sort();
}

export function normalizeScaffoldText(text: string): string {
    return text
        .split(/\r?\n/)
        .map(line => line.replace(/\s+/g, ''))
        .join('')
        .toUpperCase();
}

export async function readScaffoldFile(filePath: string): Promise<string> {
    const content = await fs.readFile(filePath, 'utf-8');
    return normalizeScaffoldText(content);
}

export async function resolveScaffold(input: ScaffoldInput, projectName: string): Promise<ResolvedScaffold> {
    switch (input.kind) {
        case 'absent':
        case 'default':
            return { sequence: '', name: '' };
        case 'file':
            return { sequence: await readScaffoldFile(input.path), name: projectName };
        case 'inline':
            return { sequence: input.sequence.toUpperCase(), name: projectName };
    }
}

// Runs once geometry conversion has reported the edge lengths.
export function checkScaffoldLength(scaffold: ResolvedScaffold, edgeLengths: readonly number[]): Result<void> {
    const totalEdgeLength = edgeLengths.reduce((sum, length) => sum + length, 0);
    const required = 2 * totalEdgeLength;
    const provided = scaffold.sequence.length;

    if (provided > 0 && provided < required) {
        return fail(scaffoldSequenceError(
            'Scaffold sequence too short',
            `Provided: ${provided} nt, Required: ≥${required} nt`,
            `Geometry requires ~${required} nucleotides ` +
                `(${edgeLengths.length} edges, total length ${totalEdgeLength.toFixed(1)} bp). ` +
                'Rule of thumb: scaffold length ≥ 2 × total edge length.'
        ));
    }
    return ok(undefined);
}
