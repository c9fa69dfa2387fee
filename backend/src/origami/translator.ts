import { AssertionError } from 'assert';
import { DomainError, errorText, geometryFileError, designConstraintError, scaffoldSequenceError, stapleGenerationError } from './errors';

// Classification rules for failures thrown by the external engine. The
// engine has no typed error contract, so these inspect the error itself and
// its text; unmatched failures fall through to a generic constraint error.

export function translateGeometryFailure(error: unknown, geometryFile: string): DomainError {
    const text = errorText(error);

    if (error instanceof AssertionError) {
        return geometryFileError(
            geometryFile,
            'PLY file format validation failed',
            `The PLY file appears to be corrupted or malformed: ${text}`
        );
    }

    if (text.includes('map') && text.includes('subscriptable')) {
        return designConstraintError(
            'Geometry processing failed',
            `File: ${geometryFile}`,
            'The geometry may have edges that are too short for the chosen helical parameters, ' +
                'or the PLY file uses a layout the geometry converter cannot index.'
        );
    }

    return designConstraintError(
        'Geometry processing failed',
        `File: ${geometryFile}`,
        `Unexpected error during PLY processing: ${text}`
    );
}

export interface CageDesignContext {
    projectName: string;
    helicalForm: string;
    helicalTurns: number;
    edgeCount: number;
    scaffoldLength: number;
}

export function translateCageDesignFailure(error: unknown, context: CageDesignContext): DomainError {
    const raw = errorText(error);
    const text = raw.toLowerCase();

    if (text.includes('scaffold') && (text.includes('short') || text.includes('length'))) {
        return scaffoldSequenceError(
            'Scaffold too short during design',
            `Current scaffold: ${context.scaffoldLength > 0 ? context.scaffoldLength : 'default'} nt`,
            `Design algorithm error: ${raw}`
        );
    }
    if (text.includes('staple')) {
        return stapleGenerationError('Staple sequence assignment', `Error during staple generation: ${raw}`);
    }
    if (text.includes('routing') || text.includes('path')) {
        return designConstraintError(
            'Scaffold routing failed',
            `Edges: ${context.edgeCount}, Form: ${context.helicalForm}`,
            `Cannot find valid scaffold path through geometry: ${raw}`
        );
    }
    return designConstraintError(
        'Design algorithm failed',
        `Project: ${context.projectName}, Form: ${context.helicalForm}, Turns: ${context.helicalTurns}`,
        `Unexpected error in cage design: ${raw}`
    );
}
