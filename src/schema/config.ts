// src/schema/config.ts

/**
 * Feature toggles, in the order they are asked for and reported.
 * Each one gates exactly one file group.
 */
export const FEATURE_FLAGS = [
    'continuousIntegration',
    'devcontainer',
    'preCommitHooks',
    'containerization',
    'diagrams',
    'localAiAssistant',
] as const;

export type FeatureFlag = (typeof FEATURE_FLAGS)[number];

export type FeatureFlags = Record<FeatureFlag, boolean>;

/**
 * Fully resolved project configuration. Produced once by the resolver
 * and consumed once by the generator; never mutated in between.
 */
export interface ProjectConfig extends Readonly<FeatureFlags> {
    /**
     * Python package name, also used as the destination directory name
     * unless `useCurrentDirectory` is set.
     */
    readonly name: string;

    readonly description: string;

    readonly author: string;

    /**
     * Target Python version in "X.Y" form (e.g. "3.14").
     */
    readonly runtimeVersion: string;

    /**
     * Scaffold into the working directory itself instead of `<cwd>/<name>`.
     * Set by name resolution when the raw name is ".".
     */
    readonly useCurrentDirectory: boolean;
}

/**
 * Partially filled configuration as collected from CLI flags and prompts.
 */
export interface ProjectConfigInput extends Partial<FeatureFlags> {
    name?: string;
    description?: string;
    author?: string;
    runtimeVersion?: string;
    useCurrentDirectory: boolean;
}
