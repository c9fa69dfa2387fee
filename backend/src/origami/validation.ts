import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
    Result,
    ok,
    fail,
    errorText,
    isErrnoException,
    geometryFileError,
    scaffoldSequenceError,
    outputDirectoryError,
    invalidRequestError
} from './errors';
import { ScaffoldInput, invalidNucleotides, normalizeScaffoldText } from './scaffold';

const GEOMETRY_EXTENSION = '.ply';
const HEADER_PROBE_LENGTH = 100;
const WRITE_PROBE_PREFIX = '.write_test_';

const PROJECT_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function validateProjectName(projectName: string): Result<void> {
    if (!PROJECT_NAME_PATTERN.test(projectName) || projectName === '.' || projectName === '..') {
        return fail(invalidRequestError(
            `Invalid project name '${projectName}'`,
            'Project names become a directory under the output directory and may only contain letters, digits, "_", "-" and "."',
            ['Use a short identifier such as "tetrahedron_v1"']
        ));
    }
    return ok(undefined);
}

export function validateHelicalTurns(helicalTurns: number): Result<void> {
    if (!Number.isInteger(helicalTurns)) {
        return fail(invalidRequestError(
            `Invalid helical turn count '${helicalTurns}'`,
            'Helical turns must be a whole number',
            ['Use a whole number of helical turns, e.g. 4']
        ));
    }
    return ok(undefined);
}

async function findSiblingGeometryFiles(directory: string): Promise<string[]> {
    try {
        const entries = await fs.readdir(directory);
        return entries.filter(name => path.extname(name).toLowerCase() === GEOMETRY_EXTENSION).sort();
    } catch {
        // The listing only enriches the error report
        return [];
    }
}

async function readHeader(filePath: string): Promise<string> {
    const handle = await fs.open(filePath, 'r');
    try {
        const buffer = Buffer.alloc(HEADER_PROBE_LENGTH);
        const { bytesRead } = await handle.read(buffer, 0, HEADER_PROBE_LENGTH, 0);
        return buffer.subarray(0, bytesRead).toString('utf-8');
    } finally {
        await handle.close();
    }
}

export async function validateGeometryFile(geometryFile: string): Promise<Result<void>> {
    const absolute = path.resolve(geometryFile);

    try {
        await fs.stat(absolute);
    } catch {
        let technicalDetail = `File path: ${absolute}`;
        const parent = path.dirname(absolute);
        const siblings = await findSiblingGeometryFiles(parent);
        if (siblings.length > 0) {
            technicalDetail += `\n\nFound these PLY files in ${parent}:\n` + siblings.map(f => `  - ${f}`).join('\n');
        }
        return fail(geometryFileError(geometryFile, 'File not found', technicalDetail));
    }

    const extension = path.extname(geometryFile);
    if (extension.toLowerCase() !== GEOMETRY_EXTENSION) {
        return fail(geometryFileError(
            geometryFile,
            `Expected PLY file, got '${extension}' file`,
            'File must have .ply extension and be in PLY format'
        ));
    }

    let header: string;
    try {
        header = await readHeader(absolute);
    } catch (e) {
        if (isErrnoException(e) && (e.code === 'EACCES' || e.code === 'EPERM')) {
            return fail(geometryFileError(geometryFile, 'Permission denied', 'Cannot read file due to permission restrictions'));
        }
        return fail(geometryFileError(geometryFile, 'Cannot read file', `Unexpected error: ${errorText(e)}`));
    }

    if (!header.trim()) {
        return fail(geometryFileError(geometryFile, 'File is empty', 'PLY file contains no data'));
    }
    if (!header.toLowerCase().includes('ply')) {
        return fail(geometryFileError(
            geometryFile,
            "File doesn't appear to be in PLY format",
            `Expected PLY header, found: ${header.slice(0, 50)}...`
        ));
    }
    return ok(undefined);
}

function checkAlphabet(sequence: string, issue: string): Result<void> {
    const invalid = invalidNucleotides(sequence);
    if (invalid.length > 0) {
        return fail(scaffoldSequenceError(
            issue,
            `Found: ${invalid.join(', ')}`,
            `Invalid characters: ${invalid.join(', ')}. Only A, T, G, C, U are allowed. Sequence length: ${sequence.length}`
        ));
    }
    return ok(undefined);
}

export async function validateScaffoldInput(input: ScaffoldInput): Promise<Result<void>> {
    switch (input.kind) {
        case 'absent':
        case 'default':
            return ok(undefined);
        case 'inline':
            return checkAlphabet(input.sequence, 'Invalid characters in scaffold sequence string');
        case 'file': {
            let content: string;
            try {
                content = await fs.readFile(input.path, 'utf-8');
            } catch (e) {
                if (isErrnoException(e) && e.code === 'ENOENT') {
                    return fail(scaffoldSequenceError(
                        'Scaffold sequence file not found',
                        `File: ${input.path}`,
                        `Attempted to read: ${path.resolve(input.path)}`
                    ));
                }
                if (isErrnoException(e) && (e.code === 'EACCES' || e.code === 'EPERM')) {
                    return fail(scaffoldSequenceError('Cannot read scaffold sequence file', `Permission denied: ${input.path}`));
                }
                return fail(scaffoldSequenceError(
                    'Cannot read scaffold sequence file',
                    `File: ${input.path}`,
                    `Unexpected error: ${errorText(e)}`
                ));
            }

            const sequence = normalizeScaffoldText(content);
            if (!sequence) {
                return fail(scaffoldSequenceError('Scaffold sequence file is empty', `File: ${input.path}`));
            }
            return checkAlphabet(sequence, 'Invalid characters in scaffold sequence');
        }
    }
}

/**
 * Creates `<outputDir>/<projectName>` (idempotently) and proves it is
 * writable. Resolves to the project directory.
 */
export async function validateOutputDirectory(outputDir: string | undefined, projectName: string): Promise<Result<string>> {
    const projectDir = path.resolve(outputDir ?? process.cwd(), projectName);

    try {
        await fs.mkdir(projectDir, { recursive: true });
    } catch (e) {
        if (isErrnoException(e) && (e.code === 'EACCES' || e.code === 'EPERM')) {
            return fail(outputDirectoryError(projectDir, 'Permission denied - cannot create directory'));
        }
        if (isErrnoException(e) && e.code === 'ENOSPC') {
            return fail(outputDirectoryError(projectDir, 'No space left on device'));
        }
        return fail(outputDirectoryError(projectDir, `Cannot create directory: ${errorText(e)}`));
    }

    // mkdir succeeding says nothing about whether files can be written.
    // Each call gets its own probe name so concurrent runs never collide.
    const probe = path.join(projectDir, `${WRITE_PROBE_PREFIX}${uuidv4()}`);
    try {
        await fs.writeFile(probe, '', { flag: 'wx' });
        await fs.unlink(probe);
    } catch (e) {
        if (isErrnoException(e) && e.code === 'ENOSPC') {
            return fail(outputDirectoryError(projectDir, 'No space left on device'));
        }
        return fail(outputDirectoryError(projectDir, 'Directory exists but is not writable'));
    }

    return ok(projectDir);
}
