import { z } from 'zod';
import { createConfigError } from './errors.js';

/**
 * Receives engine and container log output as it arrives.
 */
export type LogSink = (chunk: string) => void;

export const DEFAULTS = {
    image: 'mln-bridge.tuffy',
    containerName: 'mln-bridge.tuffy',
    mountPath: '/tuffy/io',
    tempDirPrefix: 'mln-bridge.tuffy.',
    programFilename: 'prog.mln',
    evidenceFilename: 'evidence.db',
    queryFilename: 'query.db',
    outputFilename: 'out.txt',
    cleanupFiles: true,
    learnFlag: '-learnwt',
    marginalFlag: '-marginal',
} as const;

/**
 * Environment variables read by resolveTuffyOptions().
 */
export const ENV_KEYS = {
    image: 'MLN_BRIDGE_TUFFY_IMAGE',
    containerName: 'MLN_BRIDGE_TUFFY_CONTAINER',
    buildContext: 'MLN_BRIDGE_TUFFY_BUILD_CONTEXT',
    keepFiles: 'MLN_BRIDGE_KEEP_FILES',
} as const;

export const TuffyOptionsSchema = z.object({
    /** Image to run. Built from buildContext first when that is set. */
    image: z.string().min(1).optional(),
    /** Name given to the container; a stale container with it is removed first. */
    containerName: z.string().min(1).optional(),
    /** Directory holding a Dockerfile for the image. */
    buildContext: z.string().min(1).optional(),
    /** Path the working directory is bound to inside the container. */
    mountPath: z.string().startsWith('/').optional(),
    tempDirPrefix: z.string().min(1).optional(),
    /** Remove the staged working directory after each run (default: true). */
    cleanupFiles: z.boolean().optional(),
});

export type TuffyOptions = z.infer<typeof TuffyOptionsSchema> & {
    /** Where container output goes (default: process.stdout). */
    onLog?: LogSink;
};

export interface ResolvedTuffyOptions {
    image: string;
    containerName: string;
    buildContext?: string;
    mountPath: string;
    tempDirPrefix: string;
    cleanupFiles: boolean;
    onLog: LogSink;
}

function envFlag(value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Validate caller options and fill the gaps from the environment, then DEFAULTS.
 */
export function resolveTuffyOptions(
    options: TuffyOptions = {},
    env: NodeJS.ProcessEnv = process.env
): ResolvedTuffyOptions {
    const { onLog, ...rest } = options;
    const parsed = TuffyOptionsSchema.safeParse(rest);
    if (!parsed.success) {
        throw createConfigError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '),
            { issues: parsed.error.issues }
        );
    }
    const given = parsed.data;
    const keepFiles = envFlag(env[ENV_KEYS.keepFiles]);

    return {
        image: given.image ?? (env[ENV_KEYS.image] || DEFAULTS.image),
        containerName: given.containerName ?? (env[ENV_KEYS.containerName] || DEFAULTS.containerName),
        buildContext: given.buildContext ?? (env[ENV_KEYS.buildContext] || undefined),
        mountPath: given.mountPath ?? DEFAULTS.mountPath,
        tempDirPrefix: given.tempDirPrefix ?? DEFAULTS.tempDirPrefix,
        cleanupFiles: given.cleanupFiles ?? (keepFiles === undefined ? DEFAULTS.cleanupFiles : !keepFiles),
        onLog: onLog ?? (chunk => { process.stdout.write(chunk); }),
    };
}
