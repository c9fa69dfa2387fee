import path from 'path';

/**
 * Locations of a finished design's artifacts. Only the engine's file-name
 * stem is stored; every artifact path is derived from it.
 */
export class DesignResult {
    constructor(
        public readonly projectName: string,
        public readonly outputDir: string,
        public readonly fileName: string
    ) {}

    /** Staple sequence table. */
    get csvFile(): string {
        return path.join(this.outputDir, `staples_${this.fileName}.csv`);
    }

    /** CanDo structure description. */
    get cndoFile(): string {
        return path.join(this.outputDir, `${this.fileName}.cndo`);
    }

    /** Atomic model; may be missing when model generation failed. */
    get pdbFile(): string {
        return path.join(this.outputDir, `${this.fileName}.pdb`);
    }

    get plotFile(): string {
        return path.join(this.outputDir, `${this.fileName}.png`);
    }

    toJSON() {
        return {
            projectName: this.projectName,
            outputDir: this.outputDir,
            fileName: this.fileName,
            csvFile: this.csvFile,
            cndoFile: this.cndoFile,
            pdbFile: this.pdbFile,
            plotFile: this.plotFile
        };
    }
}

export function packageResult(projectName: string, outputDir: string, fileName: string): DesignResult {
    return new DesignResult(projectName, outputDir, fileName);
}
