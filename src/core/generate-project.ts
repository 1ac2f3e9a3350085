// src/core/generate-project.ts

import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import { DEFAULT_ALLOWED_ENTRIES, type ProjectConfig } from '../schema';
import { resolveProjectPath, toPosixPath, writeFileEnsuringDirSync } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';
import { DestinationExistsError, DestinationNotEmptyError, FilesystemError } from './errors';
import { expandOutputPath, FILE_GROUPS, selectFileGroups, type FileGroup } from './file-groups';
import { buildTemplateContext } from './template-context';
import { getTemplateEnvironment, type TemplateEnvironment } from './template-env';

export interface PlannedFile {
    /** Root-relative POSIX path. */
    path: string;
    template: string;
    group: string;
    content: string;
}

export interface GenerateOptions {
    /**
     * Directory the destination is resolved against.
     * Default: process.cwd()
     */
    cwd?: string;

    /**
     * Template environment override; defaults to the bundled templates.
     */
    templates?: TemplateEnvironment;

    /**
     * Glob patterns for entries tolerated in `cwd` when scaffolding in place.
     * Default: [".git"]
     */
    allowedEntries?: readonly string[];

    /**
     * File group table override; defaults to FILE_GROUPS.
     */
    groups?: readonly FileGroup[];

    /**
     * Optional logger; defaults to defaultLogger.child('[generate]').
     */
    logger?: Logger;
}

/**
 * Work out the destination root and check it can be used.
 *
 * - In-place mode: `cwd` itself, which must hold nothing but allowed entries.
 * - Otherwise: `cwd/<name>`, which must not exist at all.
 *
 * The check and the later writes are not atomic; a concurrent change to the
 * directory between the two is not detected.
 */
export function resolveDestination(
    config: ProjectConfig,
    cwd: string,
    allowedEntries: readonly string[] = DEFAULT_ALLOWED_ENTRIES,
): string {
    const absCwd = path.resolve(cwd);

    if (config.useCurrentDirectory) {
        const blocking = fs
            .readdirSync(absCwd)
            .filter((entry) => !allowedEntries.some((pattern) => minimatch(entry, pattern, { dot: true })))
            .sort();

        if (blocking.length > 0) {
            throw new DestinationNotEmptyError(absCwd, blocking);
        }
        return absCwd;
    }

    const root = path.join(absCwd, config.name);
    if (fs.existsSync(root)) {
        throw new DestinationExistsError(root, config.name);
    }
    return root;
}

/**
 * Render every file the configuration asks for, in emission order.
 * Pure: nothing touches the filesystem.
 */
export function planProject(
    config: ProjectConfig,
    templates: TemplateEnvironment,
    groups: readonly FileGroup[] = FILE_GROUPS,
): PlannedFile[] {
    const context = buildTemplateContext(config);
    const planned: PlannedFile[] = [];

    for (const group of selectFileGroups(config, groups)) {
        for (const file of group.files) {
            planned.push({
                path: toPosixPath(expandOutputPath(file.path, config)),
                template: file.template,
                group: group.name,
                content: templates.render(file.template, context),
            });
        }
    }

    return planned;
}

/**
 * Write planned files under `root` in order. Returns root-relative paths
 * of everything written. On failure, files already written stay on disk.
 */
export function writePlannedFiles(
    root: string,
    files: readonly PlannedFile[],
    logger: Logger = defaultLogger.child('[generate]'),
): string[] {
    const written: string[] = [];

    for (const file of files) {
        const absFile = resolveProjectPath(root, file.path);

        try {
            writeFileEnsuringDirSync(absFile, file.content);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new FilesystemError(
                `Failed to write "${file.path}" in "${root}": ${message}`,
                absFile,
                [...written],
                error,
            );
        }

        written.push(file.path);
        logger.debug(`created ${file.path}`);
    }

    return written;
}

/**
 * Generate a complete project tree from a validated configuration.
 * Returns root-relative POSIX paths of all files created, in write order.
 */
export function generateProject(config: ProjectConfig, options: GenerateOptions = {}): string[] {
    const logger = options.logger ?? defaultLogger.child('[generate]');
    const cwd = options.cwd ?? process.cwd();

    const root = resolveDestination(config, cwd, options.allowedEntries);
    logger.debug(`Destination: ${root} (in place: ${config.useCurrentDirectory ? 'yes' : 'no'})`);

    const templates = options.templates ?? getTemplateEnvironment();
    const planned = planProject(config, templates, options.groups);

    return writePlannedFiles(root, planned, logger);
}
