import { BaseEngine, SolveOptions, SolveResults } from '../interface.js';
import { Relation, RowValue } from '../../model/relation.js';
import { Rule } from '../../model/rule.js';
import { checkVariableTypes, inferVariableTypes } from '../../model/typeInference.js';
import { createCollaboratorFailure } from '../../types/errors.js';
import { DEFAULTS, ResolvedTuffyOptions, TuffyOptions, resolveTuffyOptions } from '../../types/options.js';
import { ContainerRuntime, DockerRuntime } from './runtime.js';
import { normalizeArgument, tupleKey, writeEvidence, writeProgram, writeQuery } from './translator.js';
import { InferenceResults, LearnedWeights, parseInferenceResults, parseLearnedWeights } from './parser.js';
import { Workspace } from './workspace.js';

/**
 * Runs the Tuffy MLN engine in a container.
 *
 * Each call stages prog.mln, evidence.db and query.db into a fresh working
 * directory, runs the container against it, and parses out.txt.
 */
export class TuffyEngine extends BaseEngine {
    readonly name = 'tuffy';

    private readonly options: ResolvedTuffyOptions;
    private readonly runtime: ContainerRuntime;

    constructor(
        relations: Relation[],
        rules: Rule[],
        options: TuffyOptions = {},
        runtime: ContainerRuntime = new DockerRuntime()
    ) {
        super(relations, rules);
        this.options = resolveTuffyOptions(options);
        this.runtime = runtime;

        const typeCheck = checkVariableTypes(this.relations);
        if (typeCheck.needsInference) {
            console.warn('Warning: Required types are missing for Tuffy, inferring types.');
            inferVariableTypes(this.relations, this.rules);
        }
    }

    /**
     * Learn weights and write them back: each rule gets its learned weight
     * (null for hard rules) and each reported prior lands on its relation.
     */
    async learn(): Promise<LearnedWeights> {
        const output = await this.run([DEFAULTS.learnFlag]);
        const weights = parseLearnedWeights(output, this.relations, this.rules.length);

        this.rules.forEach((rule, i) => rule.setWeight(weights.ruleWeights[i]));
        for (const [relation, weight] of weights.priorWeights) {
            relation.setNegativePriorWeight(weight);
        }

        return weights;
    }

    async solve(options: SolveOptions = {}): Promise<SolveResults> {
        const marginal = options.marginal ?? false;
        const output = await this.run(marginal ? [DEFAULTS.marginalFlag] : []);
        const raw = parseInferenceResults(output, this.relations, marginal);
        return this.collectResults(raw);
    }

    /**
     * One result row per query row. Lookups use the same space normalization
     * the query file was written with; rows Tuffy did not report are 0.
     */
    private collectResults(raw: InferenceResults): SolveResults {
        const results: SolveResults = new Map();

        for (const relation of this.relations) {
            if (!relation.hasUnobservedData()) continue;

            const table = raw.get(relation);
            const rows: RowValue[][] = [];
            for (const row of relation.unobservedData()) {
                const key = row.slice(0, relation.arity());
                const value = table?.get(tupleKey(key.map(normalizeArgument))) ?? 0.0;
                rows.push([...key, value]);
            }
            results.set(relation, rows);
        }

        return results;
    }

    private async run(args: string[]): Promise<string> {
        const files = {
            program: writeProgram(this.relations, this.rules),
            evidence: writeEvidence(this.relations),
            query: writeQuery(this.relations),
        };

        const workspace = await Workspace.create(this.options.tempDirPrefix);
        try {
            await workspace.stage(files);

            const status = await this.runtime.run({
                image: this.options.image,
                name: this.options.containerName,
                buildContext: this.options.buildContext,
                hostDir: workspace.dir,
                mountPath: this.options.mountPath,
                args,
            }, this.options.onLog);

            if (status !== 0) {
                throw createCollaboratorFailure(`Tuffy exited with status ${status}`, { status, args });
            }

            return await workspace.readOutput();
        } finally {
            await workspace.dispose(!this.options.cleanupFiles);
        }
    }
}

/**
 * Create a Tuffy engine over the given relations and rules.
 */
export function createTuffyEngine(
    relations: Relation[],
    rules: Rule[],
    options?: TuffyOptions,
    runtime?: ContainerRuntime
): TuffyEngine {
    return new TuffyEngine(relations, rules, options, runtime);
}
