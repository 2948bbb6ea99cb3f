/**
 * Container Runtime
 *
 * Runs the Tuffy image against a staged working directory and streams its log.
 */

import Docker from 'dockerode';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { MlnException, createCollaboratorFailure } from '../../types/errors.js';
import type { LogSink } from '../../types/options.js';

export interface ContainerRunSpec {
    image: string;
    /** Fixed container name. A stale container with this name is replaced. */
    name: string;
    /** Directory holding a Dockerfile; when set the image is (re)built first. */
    buildContext?: string;
    /** Host directory bound read-write into the container. */
    hostDir: string;
    mountPath: string;
    args: string[];
}

/**
 * Anything able to run a container to completion.
 */
export interface ContainerRuntime {
    /**
     * Run the container, streaming its output to onLog as it arrives.
     * @returns the container's exit status
     */
    run(spec: ContainerRunSpec, onLog: LogSink): Promise<number>;
}

/**
 * The container calls DockerRuntime makes. dockerode's Container satisfies it.
 */
export interface DockerContainerHandle {
    start(): Promise<unknown>;
    logs(options: { follow: true; stdout: boolean; stderr: boolean }): Promise<NodeJS.ReadableStream>;
    wait(): Promise<unknown>;
    remove(options: { force: boolean }): Promise<unknown>;
}

/**
 * The daemon calls DockerRuntime makes. dockerode's Docker satisfies it.
 */
export interface DockerClient {
    createContainer(options: Docker.ContainerCreateOptions): Promise<DockerContainerHandle>;
    getContainer(id: string): Pick<DockerContainerHandle, 'remove'>;
    buildImage(context: Docker.ImageBuildContext, options: Docker.ImageBuildOptions): Promise<NodeJS.ReadableStream>;
}

const BuildEventSchema = z.object({
    stream: z.string().optional(),
    error: z.string().optional(),
}).passthrough();

const WaitResultSchema = z.object({
    StatusCode: z.number(),
});

function isNotFound(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'statusCode' in e && e.statusCode === 404;
}

async function listFiles(root: string, dir: string = root): Promise<string[]> {
    const files: string[] = [];
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            files.push(...await listFiles(root, full));
        } else {
            files.push(path.relative(root, full));
        }
    }
    return files;
}

function streamToSink(stream: NodeJS.ReadableStream, onChunk: (chunk: string) => void): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        stream.on('data', (chunk: Buffer | string) => onChunk(chunk.toString()));
        stream.on('end', () => resolve());
        stream.on('error', (e: Error) => reject(e));
    });
}

/**
 * ContainerRuntime backed by a Docker daemon via dockerode.
 *
 * The container name is a single shared identity: a second run removes the
 * first one's container, so overlapping runs are not supported.
 */
export class DockerRuntime implements ContainerRuntime {
    private readonly docker: DockerClient;

    constructor(docker: DockerClient = new Docker()) {
        this.docker = docker;
    }

    async run(spec: ContainerRunSpec, onLog: LogSink): Promise<number> {
        try {
            if (spec.buildContext) {
                await this.buildImage(spec.image, spec.buildContext, onLog);
            }

            await this.removeStale(spec.name);

            const container = await this.docker.createContainer({
                Image: spec.image,
                name: spec.name,
                Cmd: spec.args,
                Tty: true,
                HostConfig: {
                    Binds: [`${spec.hostDir}:${spec.mountPath}:rw`],
                },
            });

            try {
                await container.start();
                const logs = await container.logs({ follow: true, stdout: true, stderr: true });
                await streamToSink(logs, onLog);
                onLog('\n');

                const waited = WaitResultSchema.safeParse(await container.wait());
                if (!waited.success) {
                    throw createCollaboratorFailure('Docker returned no exit status for the container');
                }
                return waited.data.StatusCode;
            } finally {
                await this.removeFinished(container, spec.name);
            }
        } catch (e) {
            if (e instanceof MlnException) throw e;
            const message = e instanceof Error ? e.message : String(e);
            throw createCollaboratorFailure(`Docker error: ${message}`, { image: spec.image });
        }
    }

    private async buildImage(tag: string, context: string, onLog: LogSink): Promise<void> {
        const src = await listFiles(context);
        const stream = await this.docker.buildImage({ context, src }, { t: tag, rm: true });

        let pending = '';
        let buildError: string | undefined;
        const handleLine = (line: string) => {
            if (line.trim() === '') return;
            let raw: unknown;
            try {
                raw = JSON.parse(line);
            } catch {
                onLog(line + '\n');
                return;
            }
            const event = BuildEventSchema.safeParse(raw);
            if (!event.success) return;
            if (event.data.stream) onLog(event.data.stream);
            if (event.data.error) buildError = event.data.error;
        };

        await streamToSink(stream, chunk => {
            pending += chunk;
            const lines = pending.split('\n');
            pending = lines.pop() ?? '';
            lines.forEach(handleLine);
        });
        handleLine(pending);

        if (buildError !== undefined) {
            throw createCollaboratorFailure(`image build failed: ${buildError.trim()}`, { image: tag, context });
        }
    }

    /**
     * Remove the run's container. Failure is reported and otherwise ignored;
     * the next run replaces a leftover container by name.
     */
    private async removeFinished(container: DockerContainerHandle, name: string): Promise<void> {
        try {
            await container.remove({ force: true });
        } catch (e) {
            console.warn(`Error removing Tuffy container ${name}:`, e);
        }
    }

    private async removeStale(name: string): Promise<void> {
        try {
            await this.docker.getContainer(name).remove({ force: true });
        } catch (e) {
            if (!isNotFound(e)) throw e;
        }
    }
}
