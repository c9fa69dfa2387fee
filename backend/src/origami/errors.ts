// Error taxonomy for the design pipeline.
// Every failure a caller can observe is one of these records; raw engine
// errors only ever show up inside `technicalDetail`.

export type DomainErrorKind =
    | 'GeometryFileError'
    | 'ScaffoldSequenceError'
    | 'HelicalParameterError'
    | 'DesignConstraintError'
    | 'StapleGenerationError'
    | 'OutputDirectoryError'
    | 'InvalidRequestError';

export interface DomainError {
    readonly kind: DomainErrorKind;
    readonly message: string;
    readonly technicalDetail: string;
    readonly suggestions: readonly string[];
}

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: DomainError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail<T = never>(error: DomainError): Result<T> {
    return { ok: false, error };
}

function domainError(
    kind: DomainErrorKind,
    message: string,
    technicalDetail: string,
    suggestions: string[]
): DomainError {
    return Object.freeze({
        kind,
        message,
        technicalDetail,
        suggestions: Object.freeze([...suggestions])
    });
}

export function invalidRequestError(message: string, technicalDetail: string, suggestions: string[] = []): DomainError {
    return domainError('InvalidRequestError', message, technicalDetail, suggestions);
}

export function geometryFileError(filename: string, issue: string, technicalDetail = ''): DomainError {
    return domainError('GeometryFileError', `Problem with geometry file '${filename}': ${issue}`, technicalDetail, [
        `Check that the file '${filename}' exists and is readable`,
        'Verify the file is in PLY format (see https://en.wikipedia.org/wiki/PLY_(file_format))',
        "Try opening the PLY file in a 3D viewer (like MeshLab) to verify it's valid",
        'Check the example PLY files in the repository for reference format'
    ]);
}

export function scaffoldSequenceError(issue: string, sequenceInfo = '', technicalDetail = ''): DomainError {
    let message = `Scaffold sequence problem: ${issue}`;
    if (sequenceInfo) {
        message += ` (${sequenceInfo})`;
    }
    return domainError('ScaffoldSequenceError', message, technicalDetail, [
        'Check that scaffold sequence file exists and contains valid nucleotides (A, T, G, C, U)',
        'Verify sequence length is sufficient for your geometry (typically 2x total edge length)',
        "Use 'M13.txt' or leave the scaffold out to use the default M13 scaffold sequence",
        'For large designs, the engine will generate a random sequence automatically'
    ]);
}

export function helicalParameterError(helicalForm: string, helicalTurns: number, minRequired: number): DomainError {
    return domainError(
        'HelicalParameterError',
        `Invalid helical parameters: ${helicalForm} with ${helicalTurns} turns (minimum ${minRequired} required)`,
        `Helical form '${helicalForm}' requires minimum ${minRequired} helical turns. ` +
            'This ensures sufficient nucleotides for proper crossover formation and structural stability.',
        [
            `Use at least ${minRequired} helical turns for ${helicalForm}`,
            `A-form (RNA): minimum 4 turns, 11 bp/turn → ${4 * 11} bp minimum edge`,
            `B-form (DNA): minimum 3 turns, 10.5 bp/turn → ${Math.floor(3 * 10.5)} bp minimum edge`,
            'Consider using longer edges or switching helical form',
            'Check that your geometry has sufficiently long edges for the chosen parameters'
        ]
    );
}

export function designConstraintError(constraint: string, geometryInfo = '', technicalDetail = ''): DomainError {
    let message = `Design constraint violation: ${constraint}`;
    if (geometryInfo) {
        message += `\nGeometry: ${geometryInfo}`;
    }
    return domainError('DesignConstraintError', message, technicalDetail, [
        'Try increasing the number of helical turns per edge',
        'Use a simpler geometry with fewer faces or shorter edges',
        'Check that the geometry is a valid 3D polyhedron',
        'Verify the PLY file defines a closed, manifold surface',
        'Consider using B-form instead of A-form for more flexibility'
    ]);
}

export function stapleGenerationError(stage: string, technicalDetail = ''): DomainError {
    return domainError('StapleGenerationError', `Staple generation failed at stage: ${stage}`, technicalDetail, [
        'Check that scaffold sequence is long enough for the design',
        'Verify geometry has reasonable edge length distribution',
        'Try using double crossover staples instead of single crossover',
        'Use a different scaffold sequence or let the engine generate one',
        'Simplify the geometry to reduce design complexity'
    ]);
}

export function outputDirectoryError(directory: string, issue: string): DomainError {
    return domainError(
        'OutputDirectoryError',
        `Output directory problem: ${issue}`,
        `Cannot access or create directory: ${directory}`,
        [
            `Check that you have write permissions for '${directory}'`,
            'Verify the parent directory exists',
            'Try using a different output directory',
            'Check available disk space',
            "Ensure the path doesn't contain invalid characters"
        ]
    );
}

// Renders an error the way it is printed to a console or log stream.
export function formatDomainError(error: DomainError): string {
    let text = error.message;
    if (error.technicalDetail) {
        text += `\n\nTechnical Details:\n${error.technicalDetail}`;
    }
    if (error.suggestions.length > 0) {
        text += '\n\nSuggestions to fix this:';
        error.suggestions.forEach((suggestion, i) => {
            text += `\n  ${i + 1}. ${suggestion}`;
        });
    }
    return text;
}

export function errorText(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
