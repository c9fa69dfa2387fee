import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    validateGeometryFile,
    validateHelicalTurns,
    validateOutputDirectory,
    validateProjectName,
    validateScaffoldInput
} from '../validation';
import { TET_PLY, makeTempDir, removeDir } from './helpers';

let dir: string;

beforeEach(async () => {
    dir = await makeTempDir();
});

afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
});

const errno = (code: string) => Object.assign(new Error(`${code}: simulated failure`), { code });

describe('validateGeometryFile', () => {
    it('accepts a PLY file', async () => {
        expect(await validateGeometryFile(TET_PLY)).toEqual({ ok: true, value: undefined });
    });

    it('lists sibling PLY files when the file is missing', async () => {
        await fs.writeFile(path.join(dir, 'oct.ply'), 'ply\n');
        await fs.writeFile(path.join(dir, 'cube.PLY'), 'ply\n');
        await fs.writeFile(path.join(dir, 'notes.txt'), 'hello');
        const missing = path.join(dir, 'tet.ply');

        const outcome = await validateGeometryFile(missing);
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.kind).toBe('GeometryFileError');
        expect(outcome.error.message).toBe(`Problem with geometry file '${missing}': File not found`);
        expect(outcome.error.technicalDetail).toBe(
            `File path: ${missing}\n\nFound these PLY files in ${dir}:\n  - cube.PLY\n  - oct.ply`
        );
    });

    it('rejects other extensions', async () => {
        const file = path.join(dir, 'tet.obj');
        await fs.writeFile(file, 'ply\nformat ascii 1.0\n');

        const outcome = await validateGeometryFile(file);
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.kind).toBe('GeometryFileError');
        expect(outcome.error.message).toBe(`Problem with geometry file '${file}': Expected PLY file, got '.obj' file`);
    });

    it('rejects empty files', async () => {
        const file = path.join(dir, 'empty.ply');
        await fs.writeFile(file, '  \n');

        const outcome = await validateGeometryFile(file);
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.message).toBe(`Problem with geometry file '${file}': File is empty`);
    });

    it('rejects files without a PLY header', async () => {
        const file = path.join(dir, 'fake.ply');
        await fs.writeFile(file, 'solid cube\nfacet normal 0 0 1\n');

        const outcome = await validateGeometryFile(file);
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.message).toBe(`Problem with geometry file '${file}': File doesn't appear to be in PLY format`);
        expect(outcome.error.technicalDetail).toBe('Expected PLY header, found: solid cube\nfacet normal 0 0 1\n...');
    });

    it('reports unreadable files as permission problems', async () => {
        vi.spyOn(fs, 'open').mockRejectedValueOnce(errno('EACCES'));

        const outcome = await validateGeometryFile(TET_PLY);
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.kind).toBe('GeometryFileError');
        expect(outcome.error.message).toBe(`Problem with geometry file '${TET_PLY}': Permission denied`);
        expect(outcome.error.technicalDetail).toBe('Cannot read file due to permission restrictions');
    });
});

describe('validateScaffoldInput', () => {
    it('always accepts absent and default scaffolds', async () => {
        expect((await validateScaffoldInput({ kind: 'absent' })).ok).toBe(true);
        expect((await validateScaffoldInput({ kind: 'default' })).ok).toBe(true);
    });

    it('reports invalid inline characters case-insensitively', async () => {
        const outcome = await validateScaffoldInput({ kind: 'inline', sequence: 'atgxc' });
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.kind).toBe('ScaffoldSequenceError');
        expect(outcome.error.message).toBe('Scaffold sequence problem: Invalid characters in scaffold sequence string (Found: X)');
        expect(outcome.error.technicalDetail).toBe('Invalid characters: X. Only A, T, G, C, U are allowed. Sequence length: 5');
    });

    it('accepts lowercase inline nucleotides', async () => {
        expect((await validateScaffoldInput({ kind: 'inline', sequence: 'augc' })).ok).toBe(true);
    });

    it('reports a missing scaffold file', async () => {
        const file = path.join(dir, 'p7249.txt');
        const outcome = await validateScaffoldInput({ kind: 'file', path: file });
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.message).toBe(`Scaffold sequence problem: Scaffold sequence file not found (File: ${file})`);
        expect(outcome.error.technicalDetail).toBe(`Attempted to read: ${file}`);
    });

    it('reports an empty scaffold file', async () => {
        const file = path.join(dir, 'empty.txt');
        await fs.writeFile(file, '\n\n');
        const outcome = await validateScaffoldInput({ kind: 'file', path: file });
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.message).toBe(`Scaffold sequence problem: Scaffold sequence file is empty (File: ${file})`);
    });

    it('reports sorted offending characters from a file', async () => {
        const file = path.join(dir, 'bad.txt');
        await fs.writeFile(file, 'ATGN\nCCBN\n');
        const outcome = await validateScaffoldInput({ kind: 'file', path: file });
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.message).toBe('Scaffold sequence problem: Invalid characters in scaffold sequence (Found: B, N)');
    });

    it('accepts a multi-line scaffold file', async () => {
        const file = path.join(dir, 'good.txt');
        await fs.writeFile(file, 'ATGC\nAUGC\n');
        expect((await validateScaffoldInput({ kind: 'file', path: file })).ok).toBe(true);
    });
});

describe('validateOutputDirectory', () => {
    it('creates the project directory and is idempotent', async () => {
        const first = await validateOutputDirectory(dir, 'tet');
        expect(first).toEqual({ ok: true, value: path.join(dir, 'tet') });

        await fs.writeFile(path.join(dir, 'tet', 'keep.csv'), 'a,b\n');

        const second = await validateOutputDirectory(dir, 'tet');
        expect(second).toEqual({ ok: true, value: path.join(dir, 'tet') });
        expect(await fs.readdir(path.join(dir, 'tet'))).toEqual(['keep.csv']);
        expect(await fs.readFile(path.join(dir, 'tet', 'keep.csv'), 'utf-8')).toBe('a,b\n');
    });

    it('fails when the directory cannot be created', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, '');

        const outcome = await validateOutputDirectory(blocker, 'tet');
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.kind).toBe('OutputDirectoryError');
        expect(outcome.error.message.startsWith('Output directory problem: Cannot create directory: ')).toBe(true);
        expect(outcome.error.technicalDetail).toBe(`Cannot access or create directory: ${path.join(blocker, 'tet')}`);
    });

    it('fails when the created directory cannot be written to', async () => {
        vi.spyOn(fs, 'writeFile').mockRejectedValueOnce(errno('EACCES'));

        const outcome = await validateOutputDirectory(dir, 'tet');
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.kind).toBe('OutputDirectoryError');
        expect(outcome.error.message).toBe('Output directory problem: Directory exists but is not writable');
        expect(outcome.error.technicalDetail).toBe(`Cannot access or create directory: ${path.join(dir, 'tet')}`);
    });

    it('reports a full disk during the write check', async () => {
        vi.spyOn(fs, 'writeFile').mockRejectedValueOnce(errno('ENOSPC'));

        const outcome = await validateOutputDirectory(dir, 'tet');
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.message).toBe('Output directory problem: No space left on device');
    });

    it('lets concurrent requests check the same directory', async () => {
        await fs.mkdir(path.join(dir, 'tet'));
        await fs.writeFile(path.join(dir, 'tet', '.write_test'), 'user data');

        const outcomes = await Promise.all(Array.from({ length: 20 }, () => validateOutputDirectory(dir, 'tet')));

        expect(outcomes.every(outcome => outcome.ok)).toBe(true);
        expect(await fs.readdir(path.join(dir, 'tet'))).toEqual(['.write_test']);
        expect(await fs.readFile(path.join(dir, 'tet', '.write_test'), 'utf-8')).toBe('user data');
    });
});

describe('validateProjectName', () => {
    it('accepts identifiers and rejects path-like names', () => {
        expect(validateProjectName('tet_v1.2-b').ok).toBe(true);
        expect(validateProjectName('').ok).toBe(false);
        expect(validateProjectName('..').ok).toBe(false);
        expect(validateProjectName('a/b').ok).toBe(false);
    });
});

describe('validateHelicalTurns', () => {
    it('rejects fractional turn counts', () => {
        const outcome = validateHelicalTurns(4.5);
        if (outcome.ok) throw new Error('expected failure');
        expect(outcome.error.kind).toBe('InvalidRequestError');
    });
});
