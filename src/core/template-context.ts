// src/core/template-context.ts

import type { FeatureFlags, ProjectConfig } from '../schema';

/**
 * Values available to every template in a run.
 */
export type TemplateContext = Readonly<FeatureFlags> & {
    readonly projectName: string;
    /** TOML-escaped, safe inside a double-quoted basic string. */
    readonly description: string;
    /** TOML-escaped, safe inside a double-quoted basic string. */
    readonly author: string;
    readonly pythonVersion: string;
    /** ruff target, e.g. "py314" for "3.14". */
    readonly pythonTarget: string;
};

/**
 * Escape a value for a TOML basic string: backslashes first, then double quotes.
 */
export function escapeTomlString(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function buildTemplateContext(config: ProjectConfig): TemplateContext {
    return Object.freeze({
        projectName: config.name,
        description: escapeTomlString(config.description),
        author: escapeTomlString(config.author),
        pythonVersion: config.runtimeVersion,
        pythonTarget: `py${config.runtimeVersion.replace('.', '')}`,
        continuousIntegration: config.continuousIntegration,
        devcontainer: config.devcontainer,
        preCommitHooks: config.preCommitHooks,
        containerization: config.containerization,
        diagrams: config.diagrams,
        localAiAssistant: config.localAiAssistant,
    });
}
