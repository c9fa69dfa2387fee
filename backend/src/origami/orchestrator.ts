import EventEmitter from 'events';
import { SimulatedEngine } from './modules/engine';
import { RealEngine } from './modules/engine_real';
import { CONFIG } from '../config';
import type { GeometryInput, IDesignEngine } from '../interfaces';
import { Result, ok, fail, errorText, designConstraintError, scaffoldSequenceError, formatDomainError } from './errors';
import { HelicalForm, resolveHelicalConfig } from './helical';
import { ResolvedScaffold, ScaffoldInput, checkScaffoldLength, resolveScaffold } from './scaffold';
import { translateCageDesignFailure, translateGeometryFailure } from './translator';
import { validateGeometryFile, validateHelicalTurns, validateOutputDirectory, validateProjectName, validateScaffoldInput } from './validation';
import { DesignResult, packageResult } from './result';

export interface DesignRequest {
    projectName: string;
    geometryFile: string;
    // Loose so that unknown forms from the outside reach the resolver's error
    helicalForm: HelicalForm | (string & {});
    helicalTurns: number;
    scaffold: ScaffoldInput;
    outputDir?: string;
    singleCrossovers: boolean;
    printOutput: boolean;
    // Tags this request's events when several share one orchestrator
    runId?: string;
}

export type DesignOptions = Partial<Omit<DesignRequest, 'projectName' | 'geometryFile'>>;

export function buildRequest(projectName: string, geometryFile: string, options: DesignOptions = {}): DesignRequest {
    return {
        projectName,
        geometryFile,
        helicalForm: options.helicalForm ?? 'BForm',
        helicalTurns: options.helicalTurns ?? 4,
        scaffold: options.scaffold ?? { kind: 'absent' },
        outputDir: options.outputDir,
        singleCrossovers: options.singleCrossovers ?? false,
        printOutput: options.printOutput ?? true,
        runId: options.runId
    };
}

export interface DesignWarning {
    runId?: string;
    projectName: string;
    message: string;
}

export function createEngine(): IDesignEngine {
    // FACTORY PATTERN: choose the engine based on config
    if (CONFIG.MODE === 'REAL') {
        console.log('⚠️ Origami designer using the external DAEDALUS engine');
        return new RealEngine();
    }
    console.log('ℹ️ Origami designer starting in Simulation Mode');
    return new SimulatedEngine();
}

/**
 * Runs one design request through validation, configuration, the engine
 * and packaging. Emits `log`, `warning`, `status`, `design_complete` and
 * `design_failed`.
 */
export class Orchestrator extends EventEmitter {
    private engine: IDesignEngine;

    constructor(engine: IDesignEngine = createEngine()) {
        super();
        this.engine = engine;
    }

    private log(request: DesignRequest, message: string) {
        if (request.printOutput) console.log(message);
        this.emit('log', message);
    }

    private warn(request: DesignRequest, message: string) {
        if (request.printOutput) console.warn(`Warning: ${message}`);
        const warning: DesignWarning = { runId: request.runId, projectName: request.projectName, message };
        this.emit('warning', warning);
    }

    public async design(request: DesignRequest): Promise<Result<DesignResult>> {
        this.emit('status', `Designing ${request.projectName}`);
        const outcome = await this.runPipeline(request);
        if (outcome.ok) {
            this.emit('design_complete', outcome.value);
        } else {
            if (request.printOutput) console.error(formatDomainError(outcome.error));
            this.emit('design_failed', { projectName: request.projectName, error: outcome.error });
        }
        return outcome;
    }

    public designDna(request: Omit<DesignRequest, 'helicalForm'>): Promise<Result<DesignResult>> {
        return this.design({ ...request, helicalForm: 'BForm' });
    }

    public designRna(request: Omit<DesignRequest, 'helicalForm'>): Promise<Result<DesignResult>> {
        return this.design({ ...request, helicalForm: 'AForm' });
    }

    private async runPipeline(request: DesignRequest): Promise<Result<DesignResult>> {
        // 1. Validate
        const name = validateProjectName(request.projectName);
        if (!name.ok) return name;

        const geometry = await validateGeometryFile(request.geometryFile);
        if (!geometry.ok) return geometry;

        const config = resolveHelicalConfig(request.helicalForm, request.helicalTurns);
        if (!config.ok) return config;

        const turns = validateHelicalTurns(request.helicalTurns);
        if (!turns.ok) return turns;

        const scaffoldCheck = await validateScaffoldInput(request.scaffold);
        if (!scaffoldCheck.ok) return scaffoldCheck;

        const projectDir = await validateOutputDirectory(request.outputDir, request.projectName);
        if (!projectDir.ok) return projectDir;

        const { minEdgeLength, useAForm, twist } = config.value;
        this.log(request, `🔬 ${request.projectName}: ${request.helicalForm} x${request.helicalTurns} turns, min edge ${minEdgeLength} nt`);

        // 2. Geometry conversion
        let input: GeometryInput;
        try {
            input = await this.engine.geometryToInput(request.geometryFile, projectDir.value, minEdgeLength, useAForm);
        } catch (e) {
            return fail(translateGeometryFailure(e, request.geometryFile));
        }

        if (input.edges.length === 0) {
            return fail(designConstraintError(
                'No edges found in geometry',
                `File: ${request.geometryFile}`,
                'The PLY file must define a 3D polyhedron with edges'
            ));
        }
        this.log(request, `Geometry: ${input.edges.length} edges, ${input.coordinates.length} vertices`);

        // 3. Scaffold (its length can only be checked now that edge lengths are known)
        const scaffold = await this.prepareScaffold(request, input.edgeLengths);
        if (!scaffold.ok) return scaffold;

        // 4. Cage design
        let fileName: string;
        try {
            fileName = await this.engine.designCage({
                geometry: input,
                singleCrossovers: request.singleCrossovers,
                scaffoldSequence: scaffold.value.sequence,
                scaffoldName: scaffold.value.name,
                useAForm,
                outputDir: projectDir.value,
                twist,
                printOutput: request.printOutput
            });
        } catch (e) {
            return fail(translateCageDesignFailure(e, {
                projectName: request.projectName,
                helicalForm: request.helicalForm,
                helicalTurns: request.helicalTurns,
                edgeCount: input.edges.length,
                scaffoldLength: scaffold.value.sequence.length
            }));
        }
        this.log(request, `✅ Cage designed: ${fileName}`);

        // 5. Atomic model; the staple table and CanDo file already exist, so this only degrades
        try {
            await this.engine.generateAtomicModel(fileName, useAForm, projectDir.value);
        } catch (e) {
            this.warn(request, `PDB file generation failed: ${errorText(e)}. Other output files (CSV, CanDo) were generated successfully.`);
        }

        return ok(packageResult(request.projectName, projectDir.value, fileName));
    }

    private async prepareScaffold(request: DesignRequest, edgeLengths: number[]): Promise<Result<ResolvedScaffold>> {
        let scaffold: ResolvedScaffold;
        try {
            scaffold = await resolveScaffold(request.scaffold, request.projectName);
        } catch (e) {
            return fail(scaffoldSequenceError('Error processing scaffold sequence', '', errorText(e)));
        }
        const length = checkScaffoldLength(scaffold, edgeLengths);
        if (!length.ok) return length;
        return ok(scaffold);
    }
}
