import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createCollaboratorFailure } from '../../types/errors.js';
import { DEFAULTS } from '../../types/options.js';

export interface StagedFiles {
    program: string;
    evidence: string;
    query: string;
}

/**
 * A fresh working directory holding one run's input and output files.
 * Each run gets its own directory, so runs never share files.
 */
export class Workspace {
    readonly dir: string;

    private constructor(dir: string) {
        this.dir = dir;
    }

    static async create(prefix: string = DEFAULTS.tempDirPrefix): Promise<Workspace> {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
        return new Workspace(dir);
    }

    get programPath(): string {
        return path.join(this.dir, DEFAULTS.programFilename);
    }

    get evidencePath(): string {
        return path.join(this.dir, DEFAULTS.evidenceFilename);
    }

    get queryPath(): string {
        return path.join(this.dir, DEFAULTS.queryFilename);
    }

    /** Where Tuffy writes its result. */
    get outputPath(): string {
        return path.join(this.dir, DEFAULTS.outputFilename);
    }

    async stage(files: StagedFiles): Promise<void> {
        await fs.writeFile(this.programPath, files.program);
        await fs.writeFile(this.evidencePath, files.evidence);
        await fs.writeFile(this.queryPath, files.query);
    }

    async readOutput(): Promise<string> {
        try {
            return await fs.readFile(this.outputPath, 'utf-8');
        } catch (e) {
            throw createCollaboratorFailure(`Tuffy produced no readable output at ${this.outputPath}`, {
                cause: e instanceof Error ? e.message : String(e),
            });
        }
    }

    /**
     * Remove the directory unless asked to retain it. Failure to remove is
     * reported and otherwise ignored.
     */
    async dispose(retain: boolean = false): Promise<void> {
        if (retain) {
            console.warn(`Keeping Tuffy working directory: ${this.dir}`);
            return;
        }
        try {
            await fs.rm(this.dir, { recursive: true, force: true });
        } catch (e) {
            console.warn(`Error removing Tuffy working directory ${this.dir}:`, e);
        }
    }
}
