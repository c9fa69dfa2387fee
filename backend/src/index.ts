import { Orchestrator, DesignOptions, buildRequest } from './origami/orchestrator';
import type { Result } from './origami/errors';
import type { DesignResult } from './origami/result';

let defaultOrchestrator: Orchestrator | undefined;

function orchestrator(): Orchestrator {
    defaultOrchestrator ??= new Orchestrator();
    return defaultOrchestrator;
}

/**
 * Designs a wireframe origami structure from a PLY geometry.
 *
 * @example
 * const outcome = await designStructure('tetrahedron', 'tet.ply', { helicalTurns: 4, outputDir: './results' });
 * if (outcome.ok) console.log(outcome.value.csvFile);
 */
export function designStructure(projectName: string, geometryFile: string, options: DesignOptions = {}): Promise<Result<DesignResult>> {
    return orchestrator().design(buildRequest(projectName, geometryFile, options));
}

/** B-form (DNA) design. */
export function designDnaStructure(projectName: string, geometryFile: string, options: Omit<DesignOptions, 'helicalForm'> = {}): Promise<Result<DesignResult>> {
    return designStructure(projectName, geometryFile, { ...options, helicalForm: 'BForm' });
}

/** A-form (RNA) design. */
export function designRnaStructure(projectName: string, geometryFile: string, options: Omit<DesignOptions, 'helicalForm'> = {}): Promise<Result<DesignResult>> {
    return designStructure(projectName, geometryFile, { ...options, helicalForm: 'AForm' });
}

export { Orchestrator, buildRequest, createEngine } from './origami/orchestrator';
export type { DesignRequest, DesignOptions, DesignWarning } from './origami/orchestrator';
export { DesignResult, packageResult } from './origami/result';
export { formatDomainError } from './origami/errors';
export type { DomainError, DomainErrorKind, Result } from './origami/errors';
export { HELICAL_FORMS, MIN_HELICAL_TURNS, resolveHelicalConfig } from './origami/helical';
export type { HelicalForm, HelicalConfig } from './origami/helical';
export { parseScaffoldInput, resolveScaffold, checkScaffoldLength } from './origami/scaffold';
export type { ScaffoldInput, ResolvedScaffold } from './origami/scaffold';
export { validateGeometryFile, validateScaffoldInput, validateOutputDirectory } from './origami/validation';
export type { IDesignEngine, GeometryInput, CageDesignParams } from './interfaces';
