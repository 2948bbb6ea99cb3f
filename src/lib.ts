/**
 * mln-bridge - Library Entry Point
 *
 * Relations and rules in, Tuffy runs in a container, weights and
 * inferred values back out.
 */

// Model
export { Relation, findRelation } from './model/relation.js';
export type { RelationOptions, RowValue } from './model/relation.js';
export { Rule } from './model/rule.js';
export { checkVariableTypes, inferVariableTypes } from './model/typeInference.js';
export type { TypeCheckResult } from './model/typeInference.js';

// Engines
export { BaseEngine } from './engines/interface.js';
export type { InferenceEngine, SolveOptions, SolveResults } from './engines/interface.js';
export { TuffyEngine, createTuffyEngine } from './engines/tuffy/index.js';
export { DockerRuntime } from './engines/tuffy/runtime.js';
export type { ContainerRuntime, ContainerRunSpec } from './engines/tuffy/runtime.js';

// Tuffy file formats
export {
    writeProgram,
    writeEvidence,
    writeQuery,
    normalizeRuleText,
    normalizeArgument,
    tupleKey,
} from './engines/tuffy/translator.js';
export {
    parseLearnedWeights,
    parseInferenceResults,
    classifyWeightLine,
    WEIGHTS_HEADER,
} from './engines/tuffy/parser.js';
export type { LearnedWeights, InferenceResults } from './engines/tuffy/parser.js';

// Types and Interfaces
export * from './types/index.js';
