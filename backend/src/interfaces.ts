import type { DomainErrorKind } from './origami/errors';
import type { TwistMode } from './origami/helical';

export type Vertex = [number, number, number];
export type Edge = [number, number];

export interface GeometryInput {
    coordinates: Vertex[];
    edges: Edge[];
    faces: number[][];
    edgeLengths: number[];
    fileName: string;
    stapleName: string;
    singleCrossovers: number[];
}

export interface CageDesignParams {
    geometry: GeometryInput;
    singleCrossovers: boolean;
    scaffoldSequence: string;
    scaffoldName: string;
    useAForm: boolean;
    outputDir: string;
    twist: TwistMode;
    printOutput: boolean;
}

// The external design engine. Implementations throw on failure; the
// orchestrator is responsible for translating what they throw.
export interface IDesignEngine {
    geometryToInput(geometryFile: string, outputDir: string, minEdgeLength: number, useAForm: boolean): Promise<GeometryInput>;
    designCage(params: CageDesignParams): Promise<string>;
    generateAtomicModel(fileName: string, useAForm: boolean, outputDir: string): Promise<void>;
}

export type RunStatus = 'SUCCEEDED' | 'FAILED';

export interface DesignRun {
    id: string;
    projectName: string;
    helicalForm: string;
    helicalTurns: number;
    status: RunStatus;
    errorKind: DomainErrorKind | null;
    errorMessage: string | null;
    fileName: string | null;
    outputDir: string | null;
    warnings: number;
    timestamp?: string;
}

export interface IDesignVault {
    saveRun(run: DesignRun): Promise<void>;
    getRecentRuns(limit?: number): Promise<DesignRun[]>;
    getRun(id: string): Promise<DesignRun | undefined>;
}
