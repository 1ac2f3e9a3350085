// src/core/template-env.ts

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import ejs, { type TemplateFunction } from 'ejs';
import { listFilesRecursiveSync } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';
import { TemplateError } from './errors';
import type { TemplateContext } from './template-context';

const logger = defaultLogger.child('[templates]');

const TEMPLATE_EXTENSION = '.ejs';

/**
 * Read-only lookup of compiled templates by identifier
 * (POSIX path relative to the templates directory, e.g. "base/README.md.ejs").
 */
export interface TemplateEnvironment {
    readonly templatesDir: string;
    has(templateId: string): boolean;
    ids(): string[];
    render(templateId: string, context: TemplateContext): string;
}

class EjsTemplateEnvironment implements TemplateEnvironment {
    constructor(
        readonly templatesDir: string,
        private readonly compiled: ReadonlyMap<string, TemplateFunction>,
    ) { }

    has(templateId: string): boolean {
        return this.compiled.has(templateId);
    }

    ids(): string[] {
        return [...this.compiled.keys()].sort();
    }

    render(templateId: string, context: TemplateContext): string {
        const template = this.compiled.get(templateId);
        if (!template) {
            throw new TemplateError(`Template not found: "${templateId}"`, templateId);
        }

        try {
            // ejs reads locals through `with`; hand it a copy so the shared context stays untouched
            return template({ ...context });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new TemplateError(
                `Failed to render template "${templateId}": ${message}`,
                templateId,
                error,
            );
        }
    }
}

/**
 * Compile every *.ejs file under `templatesDir` up front.
 * The returned environment never changes afterwards.
 */
export function createTemplateEnvironment(templatesDir: string): TemplateEnvironment {
    const absDir = path.resolve(templatesDir);
    const compiled = new Map<string, TemplateFunction>();

    for (const id of listFilesRecursiveSync(absDir)) {
        if (!id.endsWith(TEMPLATE_EXTENSION)) continue;

        const filename = path.join(absDir, id);
        const source = fs.readFileSync(filename, 'utf8');
        try {
            compiled.set(id, ejs.compile(source, { filename }));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new TemplateError(
                `Failed to compile template "${id}": ${message}`,
                id,
                error,
            );
        }
    }

    logger.debug(`Compiled ${compiled.size} templates from ${absDir}`);

    return new EjsTemplateEnvironment(absDir, compiled);
}

/**
 * Locate the bundled templates directory. Works both from sources
 * (src/core) and from the tsup bundle (dist).
 */
export function findBundledTemplatesDir(fromDir: string): string {
    let dir = fromDir;
    for (let depth = 0; depth < 4; depth++) {
        const candidate = path.join(dir, 'templates');
        if (fs.existsSync(path.join(candidate, 'base'))) {
            return candidate;
        }
        const parent = path.dirname(dir);
        if (parent === dir) break;
        dir = parent;
    }

    throw new Error(`Could not locate bundled templates directory above ${fromDir}`);
}

let sharedEnvironment: TemplateEnvironment | undefined;

/**
 * Process-wide environment over the bundled templates, compiled on first use.
 */
export function getTemplateEnvironment(): TemplateEnvironment {
    if (!sharedEnvironment) {
        const moduleDir = path.dirname(fileURLToPath(import.meta.url));
        sharedEnvironment = createTemplateEnvironment(findBundledTemplatesDir(moduleDir));
    }
    return sharedEnvironment;
}
