// src/core/file-groups.ts

import type { FeatureFlag, ProjectConfig } from '../schema';

/**
 * One output file: where it goes (relative to the project root, POSIX)
 * and which template renders it. `{name}` in the path expands to the
 * project name.
 */
export interface FileSpec {
    path: string;
    template: string;
}

/**
 * Files emitted together under a single condition.
 * `gate: null` means the group is always emitted.
 */
export interface FileGroup {
    name: string;
    gate: FeatureFlag | null;
    files: readonly FileSpec[];
}

/**
 * Declarative file-set table. Groups are emitted in this order.
 */
export const FILE_GROUPS: readonly FileGroup[] = [
    {
        name: 'source',
        gate: null,
        files: [
            { path: 'src/{name}/__init__.py', template: 'base/init.py.ejs' },
            { path: 'src/{name}/__main__.py', template: 'base/__main__.py.ejs' },
            { path: 'src/{name}/main.py', template: 'base/main.py.ejs' },
        ],
    },
    {
        name: 'tests',
        gate: null,
        files: [
            { path: 'tests/__init__.py', template: 'base/empty.ejs' },
            { path: 'tests/conftest.py', template: 'base/conftest.py.ejs' },
            { path: 'tests/test_main.py', template: 'base/test_main.py.ejs' },
        ],
    },
    {
        name: 'root',
        gate: null,
        files: [
            { path: 'pyproject.toml', template: 'base/pyproject.toml.ejs' },
            { path: 'README.md', template: 'base/README.md.ejs' },
            { path: '.gitignore', template: 'base/gitignore.ejs' },
            { path: 'Makefile', template: 'base/Makefile.ejs' },
            { path: '.env', template: 'base/env.ejs' },
        ],
    },
    {
        name: 'editor',
        gate: null,
        files: [
            { path: '.vscode/launch.json', template: 'base/vscode_launch.json.ejs' },
            { path: '.vscode/settings.json', template: 'base/vscode_settings.json.ejs' },
        ],
    },
    {
        name: 'assistant',
        gate: 'localAiAssistant',
        files: [
            { path: '.continue/config.yaml', template: 'base/continue_config.yaml.ejs' },
        ],
    },
    {
        name: 'container',
        gate: 'containerization',
        files: [
            { path: 'docker/Dockerfile', template: 'docker/Dockerfile.ejs' },
            { path: 'docker/docker-compose.yml', template: 'docker/docker-compose.yml.ejs' },
            { path: '.dockerignore', template: 'docker/dockerignore.ejs' },
        ],
    },
    {
        name: 'ci',
        gate: 'continuousIntegration',
        files: [
            { path: '.github/workflows/ci.yml', template: 'ci/ci.yml.ejs' },
        ],
    },
    {
        name: 'devcontainer',
        gate: 'devcontainer',
        files: [
            { path: '.devcontainer/devcontainer.json', template: 'devcontainer/devcontainer.json.ejs' },
        ],
    },
    {
        name: 'pre-commit',
        gate: 'preCommitHooks',
        files: [
            { path: '.pre-commit-config.yaml', template: 'precommit/pre-commit-config.yaml.ejs' },
        ],
    },
    {
        name: 'diagrams',
        gate: 'diagrams',
        files: [
            { path: 'docs/diagrams/class_diagram.puml', template: 'diagrams/class_diagram.puml.ejs' },
        ],
    },
];

/**
 * Groups that apply to this configuration, in emission order.
 */
export function selectFileGroups(
    config: ProjectConfig,
    groups: readonly FileGroup[] = FILE_GROUPS,
): FileGroup[] {
    return groups.filter((group) => group.gate === null || config[group.gate]);
}

export function expandOutputPath(pathPattern: string, config: ProjectConfig): string {
    return pathPattern.replace(/\{name\}/g, config.name);
}
