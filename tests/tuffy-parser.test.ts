/**
 * Tests for parsing Tuffy learning and inference output
 */

import { Relation } from '../src/model/relation.js';
import {
    classifyWeightLine,
    parseInferenceResults,
    parseLearnedWeights,
} from '../src/engines/tuffy/parser.js';
import { tupleKey } from '../src/engines/tuffy/translator.js';
import { MlnException } from '../src/types/errors.js';

function catchError(fn: () => unknown): MlnException {
    try {
        fn();
    } catch (e) {
        if (e instanceof MlnException) return e;
        throw e;
    }
    throw new Error('Expected an MlnException');
}

describe('classifyWeightLine', () => {
    test('prefers the prior grammar over the soft rule grammar', () => {
        expect(classifyWeightLine('-1.250000 !Smokes(a) //4.0')).toEqual({
            kind: 'prior',
            weight: -1.25,
            relation: 'Smokes',
            index: 4,
        });
    });

    test('recognizes soft rules', () => {
        expect(classifyWeightLine('0.731000 Friends(a, b) , Smokes(a) => Smokes(b) //3.0')).toEqual({
            kind: 'soft',
            weight: 0.731,
            index: 3,
        });
    });

    test('recognizes hard rules', () => {
        expect(classifyWeightLine('Smokes(a) => Cancer(a) . //1.0hardfixed')).toEqual({
            kind: 'hard',
            index: 1,
        });
    });

    test('returns null for lines without an index comment', () => {
        expect(classifyWeightLine('0.500000 Smokes(a) => Cancer(a)')).toBeNull();
    });
});

describe('parseLearnedWeights', () => {
    let smokes: Relation;
    let friends: Relation;
    let relations: Relation[];

    beforeEach(() => {
        smokes = new Relation({ name: 'Smokes', arity: 1, variableTypes: ['person'] });
        friends = new Relation({ name: 'Friends', arity: 2, variableTypes: ['person', 'person'] });
        relations = [smokes, friends];
    });

    test('assigns weights by index regardless of line order', () => {
        const output = [
            'Loading program...',
            'bogus line before the header //1.0',
            'WEIGHT OF LAST ITERATION',
            '-1.250000 !SMOKES(a) //4.0',
            'Smokes(a) => Cancer(a) . //1.0hardfixed',
            '',
            '0.731000 Friends(a, b) , Smokes(a) => Smokes(b) //3.0',
        ].join('\n');

        const weights = parseLearnedWeights(output, relations, 3);

        expect(weights.ruleWeights).toEqual([null, 0, 0.731]);
        expect(weights.priorWeights.get(smokes)).toBe(-1.25);
        expect(weights.priorWeights.size).toBe(1);
    });

    test('matches prior relations case-insensitively', () => {
        const output = 'WEIGHT OF LAST ITERATION\n-0.500000 !friends(a, b) //2.0\n';

        const weights = parseLearnedWeights(output, relations, 1);

        expect(weights.priorWeights.get(friends)).toBe(-0.5);
    });

    test('ignores everything without a header', () => {
        const weights = parseLearnedWeights('0.1 something odd\n', relations, 2);

        expect(weights.ruleWeights).toEqual([0, 0]);
        expect(weights.priorWeights.size).toBe(0);
    });

    test('trims lines after the header', () => {
        const output = 'noise\n>>> WEIGHT OF LAST ITERATION <<<\n\n   0.100000 Smokes(a) //1.0   \n';

        expect(parseLearnedWeights(output, relations, 2).ruleWeights).toEqual([0.1, 0]);
    });

    test('rejects malformed lines', () => {
        const output = 'WEIGHT OF LAST ITERATION\n0.500000 Smokes(a) => Cancer(a)\n';

        const error = catchError(() => parseLearnedWeights(output, relations, 1));

        expect(error.code).toBe('FORMAT_ERROR');
        expect(error.message).toBe(
            "Could not parse learned Tuffy weight from output rule: '0.500000 Smokes(a) => Cancer(a)'."
        );
        expect(error.error.context).toBe('0.500000 Smokes(a) => Cancer(a)');
    });

    test('rejects priors on unknown relations', () => {
        const output = 'WEIGHT OF LAST ITERATION\n-1.000000 !Unknown(a) //2.0\n';

        const error = catchError(() => parseLearnedWeights(output, relations, 1));

        expect(error.code).toBe('LOOKUP_ERROR');
        expect(error.message).toBe("Could not find relation (UNKNOWN) found in prior: '-1.000000 !Unknown(a) //2.0'.");
    });

    test('rejects rule indexes past the rule count', () => {
        const output = 'WEIGHT OF LAST ITERATION\n1.000000 Smokes(a) //9.0\n';

        const error = catchError(() => parseLearnedWeights(output, relations, 3));

        expect(error.code).toBe('FORMAT_ERROR');
        expect(error.error.details).toEqual({ index: 9, ruleCount: 3 });
    });
});

describe('parseInferenceResults', () => {
    const smokes = new Relation({ name: 'Smokes', arity: 1, variableTypes: ['person'] });
    const friends = new Relation({ name: 'Friends', arity: 2, variableTypes: ['person', 'person'] });
    const relations = [smokes, friends];

    test('marks listed atoms true without probabilities', () => {
        const results = parseInferenceResults('Smokes(bob)\nFriends("alice", "bob")\n', relations);

        expect(results.get(smokes)?.get(tupleKey(['bob']))).toBe(1);
        expect(results.get(friends)?.get(tupleKey(['alice', 'bob']))).toBe(1);
    });

    test('reads probabilities and matches predicates case-insensitively', () => {
        const results = parseInferenceResults('SMOKES(bob)\t0.73\nfriends(alice, carol)\t0.1\n', relations, true);

        expect(results.get(smokes)?.get(tupleKey(['bob']))).toBe(0.73);
        expect(results.get(friends)?.get(tupleKey(['alice', 'carol']))).toBe(0.1);
    });

    test('skips atoms of unknown predicates', () => {
        const results = parseInferenceResults('Unknown(x)\nSmokes(carol)\n', relations);

        expect(results.size).toBe(1);
        expect(Array.from(results.get(smokes)?.keys() ?? [])).toEqual([tupleKey(['carol'])]);
    });

    test('rejects probabilities outside [0, 1]', () => {
        const error = catchError(() => parseInferenceResults('Smokes(bob)\t1.5\n', relations, true));

        expect(error.code).toBe('FORMAT_ERROR');
        expect(error.message).toBe("Probability outside [0, 1] in Tuffy result: 'Smokes(bob)\t1.5'.");
        expect(() => parseInferenceResults('Smokes(bob)\t-0.1\n', relations, true)).toThrow(/outside \[0, 1\]/);
    });

    test('accepts the bounds of [0, 1]', () => {
        const results = parseInferenceResults('Smokes(bob)\t0\nSmokes(carol)\t1\n', relations, true);

        expect(results.get(smokes)?.get(tupleKey(['bob']))).toBe(0);
        expect(results.get(smokes)?.get(tupleKey(['carol']))).toBe(1);
    });

    test('rejects unreadable probabilities', () => {
        expect(() => parseInferenceResults('Smokes(bob)\tlikely\n', relations, true)).toThrow(MlnException);
        expect(() => parseInferenceResults('Smokes(bob)\n', relations, true)).toThrow(/probability/);
    });
});
