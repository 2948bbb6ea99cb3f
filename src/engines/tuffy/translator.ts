/**
 * Translator: Relations and Rules → Tuffy Input Files
 *
 * Program (prog.mln):
 *   *Knows(person, person)        declarations, '*' marks closed-world relations
 *   Smokes(person)
 *
 *   1.500000 Knows(a, b), Smokes(a) => Smokes(b)
 *   Smokes(a) => Cancer(a) .      hard rule
 *
 *   -2.000000 !Smokes(a)          negative priors
 *
 * Evidence (evidence.db) and query (query.db): one ground atom per line,
 * evidence optionally led by a soft-evidence weight.
 */

import { Relation, RowValue } from '../../model/relation.js';
import { Rule } from '../../model/rule.js';
import { createInvalidProblemError } from '../../types/errors.js';

const PRIOR_VARIABLES = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Tuffy has no quoting for constants, so spaces become underscores.
 */
export function normalizeArgument(value: RowValue): string {
    return String(value).replace(/ /g, '_');
}

/**
 * Key identifying an argument tuple in parsed results.
 */
export function tupleKey(args: readonly string[]): string {
    return JSON.stringify(args);
}

/**
 * Format a weight the way Tuffy output and input agree on: fixed, six decimals.
 */
export function formatWeight(weight: number): string {
    return weight.toFixed(6);
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rewrite rule text into Tuffy's formula syntax.
 *
 * Conjunction '&' becomes ',', implications become '=>', and inline
 * disequality guards such as ', (A != B)' are dropped since Tuffy cannot
 * express them. Tuffy wants lowercase variables, so the whole text is
 * lowercased and every relation name is then restored to its declared
 * casing, whole words only, in declaration order.
 */
export function normalizeRuleText(text: string, relations: readonly Relation[]): string {
    let rule = text
        .replace(/&/g, ',')
        .replace(/->/g, '=>')
        .replace(/ = /g, ' => ')
        .replace(/,\s*\(\w+\s*!=\s*\w+\)/g, '');

    rule = rule.toLowerCase();
    for (const relation of relations) {
        const pattern = new RegExp(`(?<!\\w)${escapeRegExp(relation.name().toLowerCase())}(?!\\w)`, 'g');
        rule = rule.replace(pattern, relation.name());
    }

    return rule;
}

function declaration(relation: Relation): string {
    const types = relation.variableTypes();
    if (types === null) {
        throw createInvalidProblemError(
            `Relation ${relation.name()} has no variable types; infer them before writing the program`,
            relation.name()
        );
    }
    const predicate = `${relation.name()}(${types.join(', ')})`;
    return relation.isObserved() ? `*${predicate}` : predicate;
}

function priorDeclaration(relation: Relation, weight: number): string {
    if (relation.arity() > PRIOR_VARIABLES.length) {
        throw createInvalidProblemError(
            `Relation ${relation.name()} has arity ${relation.arity()}; priors support at most ${PRIOR_VARIABLES.length} arguments`,
            relation.name()
        );
    }
    const args = PRIOR_VARIABLES.slice(0, relation.arity()).split('').join(', ');
    return `${formatWeight(weight)} !${relation.name()}(${args})`;
}

function toFileText(lines: string[]): string {
    return lines.map(line => `${line}\n`).join('');
}

/**
 * Build the program file: declarations, rules (in order), then any priors.
 * Rule order fixes the 1-based index Tuffy reports learned weights under.
 */
export function writeProgram(relations: readonly Relation[], rules: readonly Rule[]): string {
    const program: string[] = relations.map(declaration);
    program.push('');

    for (const rule of rules) {
        const text = normalizeRuleText(rule.text(), relations);
        const weight = rule.weight();
        program.push(weight === null ? `${text} .` : `${formatWeight(weight)} ${text}`);
    }

    const priors = relations.filter(relation => relation.hasNegativePriorWeight());
    if (priors.length > 0) {
        program.push('');
        for (const relation of priors) {
            program.push(priorDeclaration(relation, relation.negativePriorWeight() ?? 0));
        }
    }

    return toFileText(program);
}

function atom(relation: Relation, row: readonly RowValue[]): string {
    const args = row.slice(0, relation.arity()).map(normalizeArgument);
    return `${relation.name()}(${args.join(', ')})`;
}

/**
 * Build the evidence file from observed rows. A trailing column past the
 * arity is a soft-evidence weight written in front of the atom.
 */
export function writeEvidence(relations: readonly Relation[]): string {
    const evidence: string[] = [];

    for (const relation of relations) {
        for (const row of relation.observedData()) {
            let line = atom(relation, row);

            if (row.length > relation.arity()) {
                const raw = row[row.length - 1];
                const weight = typeof raw === 'number' ? raw : Number(raw);
                if (String(raw).trim() === '' || !Number.isFinite(weight)) {
                    throw createInvalidProblemError(
                        `Soft evidence weight for ${relation.name()} is not a number: '${raw}'`,
                        row.join(', ')
                    );
                }
                line = `${formatWeight(weight)} ${line}`;
            }

            evidence.push(line);
        }
    }

    return toFileText(evidence);
}

/**
 * Build the query file from unobserved rows.
 */
export function writeQuery(relations: readonly Relation[]): string {
    const query: string[] = [];

    for (const relation of relations) {
        for (const row of relation.unobservedData()) {
            query.push(atom(relation, row));
        }
    }

    return toFileText(query);
}
