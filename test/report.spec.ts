// test/report.spec.ts

import {describe, it, expect} from 'vitest';
import {buildFileTree, formatConfigSummary, formatNextSteps, renderFileTree} from '../src/cli/report';
import {fullConfig, minimalConfig} from './helpers';

describe('formatConfigSummary', () => {
    it('lists metadata then features with aligned labels', () => {
        expect(formatConfigSummary(fullConfig({diagrams: false, containerization: false}))).toEqual([
            '  Project       testproject',
            '  Description   A test project',
            '  Author        Test Author',
            '  Python        3.14',
            '  CI            yes',
            '  Devcontainer  yes',
            '  Pre-commit    yes',
            '  Docker        no',
            '  Diagrams      no',
            '  Continue      yes',
        ]);
    });
});

describe('buildFileTree', () => {
    it('nests paths and sorts directories before files', () => {
        const tree = buildFileTree(['z.txt', 'a/b.txt', 'a.txt']);
        expect(tree.map((node) => node.name)).toEqual(['a', 'a.txt', 'z.txt']);
        expect(tree[0]).toEqual({
            name: 'a',
            isFile: false,
            children: [{name: 'b.txt', isFile: true, children: []}],
        });
    });
});

describe('renderFileTree', () => {
    it('draws a box tree under the root label', () => {
        expect(
            renderFileTree('demo', [
                'b.txt',
                'src/demo/main.py',
                'src/demo/__init__.py',
                '.env',
                '.github/workflows/ci.yml',
            ]),
        ).toEqual([
            'demo/',
            '├── .github/',
            '│   └── workflows/',
            '│       └── ci.yml',
            '├── src/',
            '│   └── demo/',
            '│       ├── __init__.py',
            '│       └── main.py',
            '├── .env',
            '└── b.txt',
        ]);
    });

    it('renders only the root for no files', () => {
        expect(renderFileTree('empty', [])).toEqual(['empty/']);
    });
});

describe('formatNextSteps', () => {
    it('starts with changing into the new directory', () => {
        expect(formatNextSteps(minimalConfig({name: 'demo'}))).toEqual([
            'cd demo',
            'make setup',
            'uv run python -m demo',
        ]);
    });

    it('omits the directory change when scaffolding in place', () => {
        expect(formatNextSteps(minimalConfig({name: 'demo', useCurrentDirectory: true}))).toEqual([
            'make setup',
            'uv run python -m demo',
        ]);
    });
});
