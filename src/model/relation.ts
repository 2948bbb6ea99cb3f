/**
 * Relation Model
 *
 * A named, fixed-arity predicate with typed columns, evidence rows
 * (observed data) and query rows (unobserved data).
 */

import { createInvalidProblemError } from '../types/errors.js';

/**
 * A single cell of a data row.
 */
export type RowValue = string | number;

export interface RelationOptions {
    name: string;
    arity: number;
    /** One type tag per column. Absent types are inferred before translation. */
    variableTypes?: string[] | null;
    /** Evidence rows. A column past the arity is a soft-evidence weight. */
    observedData?: RowValue[][];
    /** Rows whose truth value is to be inferred. */
    unobservedData?: RowValue[][];
    /** Closed-world relation: evidence only, never a query target. */
    observed?: boolean;
    negativePriorWeight?: number | null;
}

const IDENTIFIER = /^\w+$/;

export class Relation {
    private readonly _name: string;
    private readonly _arity: number;
    private _variableTypes: string[] | null;
    private readonly _observedData: RowValue[][];
    private readonly _unobservedData: RowValue[][];
    private readonly _observed: boolean;
    private _negativePriorWeight: number | null;

    constructor(options: RelationOptions) {
        if (!IDENTIFIER.test(options.name)) {
            throw createInvalidProblemError(`Relation name must be an identifier, got '${options.name}'`, options.name);
        }
        if (!Number.isInteger(options.arity) || options.arity < 1) {
            throw createInvalidProblemError(`Relation ${options.name} must have a positive integer arity, got ${options.arity}`);
        }

        this._name = options.name;
        this._arity = options.arity;
        this._variableTypes = null;
        this._observedData = options.observedData ?? [];
        this._unobservedData = options.unobservedData ?? [];
        this._observed = options.observed ?? false;
        this._negativePriorWeight = options.negativePriorWeight ?? null;

        if (options.variableTypes) {
            this.setVariableTypes(options.variableTypes);
        }

        for (const row of [...this._observedData, ...this._unobservedData]) {
            if (row.length < this._arity) {
                throw createInvalidProblemError(
                    `Row of relation ${this._name} has ${row.length} columns, expected at least ${this._arity}`,
                    row.join(', ')
                );
            }
        }
    }

    name(): string {
        return this._name;
    }

    arity(): number {
        return this._arity;
    }

    variableTypes(): string[] | null {
        return this._variableTypes;
    }

    setVariableTypes(types: string[]): void {
        if (types.length !== this._arity) {
            throw createInvalidProblemError(
                `Relation ${this._name} has arity ${this._arity} but ${types.length} variable types were given`,
                types.join(', ')
            );
        }
        this._variableTypes = [...types];
    }

    isObserved(): boolean {
        return this._observed;
    }

    hasObservedData(): boolean {
        return this._observedData.length > 0;
    }

    observedData(): RowValue[][] {
        return this._observedData;
    }

    hasUnobservedData(): boolean {
        return this._unobservedData.length > 0;
    }

    unobservedData(): RowValue[][] {
        return this._unobservedData;
    }

    hasNegativePriorWeight(): boolean {
        return this._negativePriorWeight !== null;
    }

    negativePriorWeight(): number | null {
        return this._negativePriorWeight;
    }

    setNegativePriorWeight(weight: number | null): void {
        this._negativePriorWeight = weight;
    }

    toString(): string {
        return `${this._name}/${this._arity}`;
    }
}

/**
 * Case-insensitive lookup of a relation by name.
 */
export function findRelation(relations: readonly Relation[], name: string): Relation | undefined {
    const wanted = name.toLowerCase();
    return relations.find(relation => relation.name().toLowerCase() === wanted);
}
