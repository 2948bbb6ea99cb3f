/**
 * Parser: Tuffy Output → Weights and Results
 *
 * Learning output (-learnwt) repeats the program with learned weights after a
 * "WEIGHT OF LAST ITERATION" header; every rule line carries a trailing
 * comment with its 1-based index in the input program:
 *
 *   -1.250000 !Smokes(a) //3.0          prior
 *   0.842100 Smokes(a) => Cancer(a) //1.0  soft rule
 *   Knows(a, b) => Knows(b, a) . //2.0hardfixed
 *
 * Inference output is one atom per line, optionally followed by a tab and
 * its marginal probability.
 */

import { Relation, findRelation } from '../../model/relation.js';
import { createFormatError, createLookupError } from '../../types/errors.js';
import { tupleKey } from './translator.js';

export const WEIGHTS_HEADER = 'WEIGHT OF LAST ITERATION';

/**
 * Learned weights, one slot per input rule; null marks a hard (fixed) rule.
 */
export interface LearnedWeights {
    ruleWeights: (number | null)[];
    priorWeights: Map<Relation, number>;
}

/**
 * Inference results per relation, keyed by tupleKey(args).
 */
export type InferenceResults = Map<Relation, Map<string, number>>;

type WeightLine =
    | { kind: 'prior'; weight: number; relation: string; index: number }
    | { kind: 'soft'; weight: number; index: number }
    | { kind: 'hard'; index: number };

const PRIOR_LINE = /^(?<weight>-?\d+(?:\.\d+))\s+!(?<relation>\w+)\([^)]+\)\s+\/\/(?<index>\d+\.0)$/;
const SOFT_LINE = /^(?<weight>-?\d+(?:\.\d+))\s+.+?\s+\/\/(?<index>\d+\.0)$/;
const HARD_LINE = / \. \/\/(?<index>\d+\.0)hardfixed$/;

export function matchPriorLine(line: string): WeightLine | null {
    const groups = PRIOR_LINE.exec(line)?.groups;
    if (!groups) return null;
    return {
        kind: 'prior',
        weight: parseFloat(groups.weight),
        relation: groups.relation,
        index: parseFloat(groups.index),
    };
}

export function matchSoftRuleLine(line: string): WeightLine | null {
    const groups = SOFT_LINE.exec(line)?.groups;
    if (!groups) return null;
    return { kind: 'soft', weight: parseFloat(groups.weight), index: parseFloat(groups.index) };
}

export function matchHardRuleLine(line: string): WeightLine | null {
    const groups = HARD_LINE.exec(line)?.groups;
    if (!groups) return null;
    return { kind: 'hard', index: parseFloat(groups.index) };
}

/**
 * Classify one learned-program line. Order matters: a prior line also
 * matches the soft-rule grammar.
 */
export function classifyWeightLine(line: string): WeightLine | null {
    return matchPriorLine(line) ?? matchSoftRuleLine(line) ?? matchHardRuleLine(line);
}

/**
 * Parse learned weights from Tuffy's -learnwt output.
 *
 * Lines before the header are ignored. After it, every non-blank line must be
 * a prior, soft rule or hard rule line; anything else aborts the parse.
 * Rules the output never mentions keep a weight of 0.
 */
export function parseLearnedWeights(
    output: string,
    relations: readonly Relation[],
    ruleCount: number
): LearnedWeights {
    const ruleWeights: (number | null)[] = new Array<number | null>(ruleCount).fill(0);
    const priorWeights = new Map<Relation, number>();

    let state: 'SEEKING_MARKER' | 'PARSING_RULES' = 'SEEKING_MARKER';

    for (const rawLine of output.split('\n')) {
        if (rawLine.includes(WEIGHTS_HEADER)) {
            state = 'PARSING_RULES';
            continue;
        }
        if (state === 'SEEKING_MARKER') continue;

        const line = rawLine.trim();
        if (line === '') continue;

        const parsed = classifyWeightLine(line);
        if (!parsed) {
            throw createFormatError('Could not parse learned Tuffy weight from output rule', line);
        }

        if (parsed.kind === 'prior') {
            const relation = findRelation(relations, parsed.relation);
            if (!relation) {
                throw createLookupError(parsed.relation.toUpperCase(), line);
            }
            priorWeights.set(relation, parsed.weight);
            continue;
        }

        const slot = parsed.index - 1;
        if (!Number.isInteger(slot) || slot < 0 || slot >= ruleCount) {
            throw createFormatError(
                `Rule index ${parsed.index} is outside 1..${ruleCount}`,
                line,
                { index: parsed.index, ruleCount }
            );
        }
        ruleWeights[slot] = parsed.kind === 'soft' ? parsed.weight : null;
    }

    return { ruleWeights, priorWeights };
}

/**
 * Parse Tuffy's inference output.
 *
 * With hasValue, each line is "atom\tprobability" with a probability in
 * [0, 1]; otherwise a listed atom is true with value 1.0. Atoms of predicates
 * not among the relations are skipped.
 */
export function parseInferenceResults(
    output: string,
    relations: readonly Relation[],
    hasValue: boolean = false
): InferenceResults {
    const results: InferenceResults = new Map();

    for (const rawLine of output.split('\n')) {
        const line = rawLine.trim();
        if (line === '') continue;

        const parts = line.split('\t');
        const atom = parts[0];
        let value = 1.0;

        if (hasValue) {
            value = parts.length > 1 ? Number(parts[1]) : NaN;
            if (!Number.isFinite(value)) {
                throw createFormatError('Could not parse probability from Tuffy result', line);
            }
            if (value < 0 || value > 1) {
                throw createFormatError('Probability outside [0, 1] in Tuffy result', line, { value });
            }
        }

        const open = atom.indexOf('(');
        const predicate = open < 0 ? atom : atom.slice(0, open);
        const relation = findRelation(relations, predicate);
        if (!relation) continue;

        const argText = open < 0 ? '' : atom.slice(open + 1).replace(/\)+$/, '');
        const args = argText.replace(/"/g, '').split(', ');

        let table = results.get(relation);
        if (!table) {
            table = new Map();
            results.set(relation, table);
        }
        table.set(tupleKey(args), value);
    }

    return results;
}
