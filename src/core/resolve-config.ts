// src/core/resolve-config.ts

import reservedNames from '../../data/reserved-names.json';
import {
    CURRENT_DIRECTORY_SENTINEL,
    DEFAULT_AUTHOR,
    DEFAULT_DESCRIPTION,
    DEFAULT_PROJECT_NAME,
    DEFAULT_RUNTIME_VERSION,
    FEATURE_FLAGS,
    type FeatureFlags,
    type ProjectConfig,
    type ProjectConfigInput,
} from '../schema';
import { ProjectNameError, RuntimeVersionError } from './errors';

const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RUNTIME_VERSION_REGEX = /^\d+\.\d+$/;
const NON_IDENTIFIER_CHARS = /[^A-Za-z0-9_]/g;

const KEYWORDS: ReadonlySet<string> = new Set(reservedNames.keywords);
const RESERVED_MODULE_NAMES: ReadonlySet<string> = new Set([
    ...reservedNames.stdlibModules,
    ...reservedNames.denylist,
]);

export interface ResolvedName {
    name: string | undefined;
    useCurrentDirectory: boolean;
}

/**
 * Turn the raw name argument into a project name.
 *
 * "." means "scaffold here": the name is derived from the directory's
 * basename, with anything outside [A-Za-z0-9_] replaced by "_".
 */
export function resolveName(
    rawName: string | undefined,
    currentDirectoryName: string,
): ResolvedName {
    if (rawName !== CURRENT_DIRECTORY_SENTINEL) {
        return { name: rawName, useCurrentDirectory: false };
    }

    let converted = currentDirectoryName.replace(NON_IDENTIFIER_CHARS, '_');
    if (!converted) {
        converted = DEFAULT_PROJECT_NAME;
    } else if (/^\d/.test(converted)) {
        converted = `_${converted}`;
    }

    return { name: converted, useCurrentDirectory: true };
}

/**
 * Fill every missing value with its built-in default; feature flags default to on.
 * Values already present are kept, so applying this twice changes nothing.
 */
export function applyDefaults(input: ProjectConfigInput): ProjectConfig {
    const flags: FeatureFlags = {
        continuousIntegration: input.continuousIntegration ?? true,
        devcontainer: input.devcontainer ?? true,
        preCommitHooks: input.preCommitHooks ?? true,
        containerization: input.containerization ?? true,
        diagrams: input.diagrams ?? true,
        localAiAssistant: input.localAiAssistant ?? true,
    };

    return {
        ...flags,
        name: input.name || DEFAULT_PROJECT_NAME,
        description: input.description || DEFAULT_DESCRIPTION,
        author: input.author || DEFAULT_AUTHOR,
        runtimeVersion: input.runtimeVersion || DEFAULT_RUNTIME_VERSION,
        useCurrentDirectory: input.useCurrentDirectory,
    };
}

/**
 * True when nothing is left for prompts or defaults to fill in.
 */
export function isCompleteConfig(
    input: ProjectConfigInput,
): input is ProjectConfigInput & ProjectConfig {
    return (
        Boolean(input.name) &&
        Boolean(input.description) &&
        Boolean(input.author) &&
        Boolean(input.runtimeVersion) &&
        FEATURE_FLAGS.every((flag) => input[flag] !== undefined)
    );
}

export function validateProjectName(name: string): void {
    if (!IDENTIFIER_REGEX.test(name)) {
        const suggestion = name.replace(NON_IDENTIFIER_CHARS, '_');
        throw new ProjectNameError(
            `Invalid project name '${name}'. Only letters, digits, and underscores are allowed ` +
            `(cannot start with a digit). Hint: try '${suggestion}'.`,
            'NameInvalid',
            name,
        );
    }

    if (KEYWORDS.has(name)) {
        throw new ProjectNameError(
            `Invalid project name '${name}'. Python keywords are not allowed.`,
            'NameReserved',
            name,
        );
    }

    if (name.startsWith('__') && name.endsWith('__')) {
        throw new ProjectNameError(
            `Invalid project name '${name}'. Dunder names are reserved by Python.`,
            'NameReserved',
            name,
        );
    }

    if (RESERVED_MODULE_NAMES.has(name)) {
        throw new ProjectNameError(
            `Invalid project name '${name}'. This name conflicts with a Python ` +
            `standard library module or reserved name.`,
            'NameReserved',
            name,
        );
    }
}

export function validateRuntimeVersion(version: string): void {
    if (!RUNTIME_VERSION_REGEX.test(version)) {
        throw new RuntimeVersionError(
            `Invalid Python version '${version}'. Expected format: X.Y (e.g. 3.14).`,
            version,
        );
    }
}

/**
 * Validate name, then version. The first failure is thrown.
 */
export function validateConfig(config: ProjectConfig): void {
    validateProjectName(config.name);
    validateRuntimeVersion(config.runtimeVersion);
}
