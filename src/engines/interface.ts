/**
 * Inference Engine Interface
 *
 * Abstract interface for pluggable statistical-relational backends.
 * Every backend works over the same relations and rules and exposes
 * weight learning and inference.
 */

import { Relation, RowValue } from '../model/relation.js';
import { Rule } from '../model/rule.js';
import { createNotSupportedError } from '../types/errors.js';

/**
 * Options for solve operations
 */
export interface SolveOptions {
    /** Ask for marginal probabilities instead of a MAP state */
    marginal?: boolean;
}

/**
 * Per relation with unobserved data, one row per query row:
 * the key columns followed by the inferred value.
 */
export type SolveResults = Map<Relation, RowValue[][]>;

/**
 * Abstract inference engine interface.
 * All engine backends must implement this interface.
 */
export interface InferenceEngine {
    /** Unique name of the engine */
    readonly name: string;

    /**
     * Learn rule weights (and relation priors) from the observed data,
     * updating the rules and relations in place.
     */
    learn(): Promise<unknown>;

    /**
     * Infer values for every unobserved row.
     */
    solve(options?: SolveOptions): Promise<SolveResults>;

    /**
     * Ground the rules over the data.
     */
    ground(): Promise<unknown>;
}

/**
 * Shared state and defaults for engine implementations.
 */
export abstract class BaseEngine implements InferenceEngine {
    abstract readonly name: string;

    protected readonly relations: Relation[];
    protected readonly rules: Rule[];

    constructor(relations: Relation[], rules: Rule[]) {
        this.relations = relations;
        this.rules = rules;
    }

    abstract learn(): Promise<unknown>;

    abstract solve(options?: SolveOptions): Promise<SolveResults>;

    async ground(): Promise<unknown> {
        throw createNotSupportedError(this.name, 'ground');
    }
}
