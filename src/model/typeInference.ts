/**
 * Variable Type Inference
 *
 * Tuffy requires every predicate declaration to carry argument types.
 * When relations come without them, columns that share a rule variable
 * are unified into one type and each resulting class is named.
 */

import { Relation, findRelation } from './relation.js';
import { Rule } from './rule.js';

export interface TypeCheckResult {
    needsInference: boolean;
    missing: Relation[];
}

/**
 * Pre-flight check: which relations lack declared variable types.
 */
export function checkVariableTypes(relations: readonly Relation[]): TypeCheckResult {
    const missing = relations.filter(relation => relation.variableTypes() === null);
    return { needsInference: missing.length > 0, missing };
}

/** An atom as written in rule text: name(arg, arg, ...) */
const ATOM = /(\w+)\s*\(([^()]*)\)/g;
const VARIABLE = /^[A-Za-z_]\w*$/;

/**
 * Union-find over (relation, column) slots.
 */
class SlotSets {
    private parent: number[] = [];

    constructor(size: number) {
        for (let i = 0; i < size; i++) this.parent.push(i);
    }

    find(slot: number): number {
        let root = slot;
        while (this.parent[root] !== root) root = this.parent[root];
        // Path compression
        while (this.parent[slot] !== root) {
            const next = this.parent[slot];
            this.parent[slot] = root;
            slot = next;
        }
        return root;
    }

    union(a: number, b: number): void {
        const rootA = this.find(a);
        const rootB = this.find(b);
        // Keep the lower slot as root so naming follows declaration order.
        if (rootA < rootB) this.parent[rootB] = rootA;
        else if (rootB < rootA) this.parent[rootA] = rootB;
    }
}

/**
 * Assign types to every relation that has none.
 *
 * Declared types are kept. A class of unified slots takes the first declared
 * type among its slots, otherwise a fresh name t0, t1, ... in order of first
 * appearance over relations and columns.
 */
export function inferVariableTypes(relations: readonly Relation[], rules: readonly Rule[]): void {
    const offsets = new Map<Relation, number>();
    let size = 0;
    for (const relation of relations) {
        offsets.set(relation, size);
        size += relation.arity();
    }

    const sets = new SlotSets(size);

    for (const rule of rules) {
        const bindings = new Map<string, number>();
        for (const match of rule.text().matchAll(ATOM)) {
            const relation = findRelation(relations, match[1]);
            const offset = relation ? offsets.get(relation) : undefined;
            if (!relation || offset === undefined) continue;

            const args = match[2].split(',').map(arg => arg.trim());
            args.slice(0, relation.arity()).forEach((arg, column) => {
                if (!VARIABLE.test(arg)) return;
                // Rule text is lowercased on the way out, so A and a are one variable.
                const symbol = arg.toLowerCase();
                const slot = offset + column;
                const seen = bindings.get(symbol);
                if (seen === undefined) bindings.set(symbol, slot);
                else sets.union(seen, slot);
            });
        }
    }

    const names = new Map<number, string>();
    for (const relation of relations) {
        const declared = relation.variableTypes();
        const offset = offsets.get(relation) ?? 0;
        declared?.forEach((type, column) => {
            const root = sets.find(offset + column);
            if (!names.has(root)) names.set(root, type);
        });
    }

    let fresh = 0;
    for (const relation of relations) {
        if (relation.variableTypes() !== null) continue;
        const offset = offsets.get(relation) ?? 0;
        const types: string[] = [];
        for (let column = 0; column < relation.arity(); column++) {
            const root = sets.find(offset + column);
            let name = names.get(root);
            if (name === undefined) {
                name = `t${fresh++}`;
                names.set(root, name);
            }
            types.push(name);
        }
        relation.setVariableTypes(types);
    }
}
