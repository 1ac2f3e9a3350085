// test/file-groups.spec.ts

import {describe, it, expect} from 'vitest';
import {expandOutputPath, FILE_GROUPS, selectFileGroups, type FileGroup} from '../src/core/file-groups';
import {FEATURE_FLAGS} from '../src/schema';
import {fullConfig, minimalConfig} from './helpers';

describe('FILE_GROUPS', () => {
    it('gates each feature flag exactly once', () => {
        const gates = FILE_GROUPS.map((group) => group.gate).filter((gate) => gate !== null);
        expect([...gates].sort()).toEqual([...FEATURE_FLAGS].sort());
    });

    it('never emits the same path twice', () => {
        const paths = FILE_GROUPS.flatMap((group) => group.files.map((file) => file.path));
        expect(new Set(paths).size).toBe(paths.length);
    });

    it('keeps output paths relative and POSIX', () => {
        for (const group of FILE_GROUPS) {
            for (const file of group.files) {
                expect(file.path.startsWith('/'), file.path).toBe(false);
                expect(file.path.includes('\\'), file.path).toBe(false);
                expect(file.path.split('/').includes('..'), file.path).toBe(false);
            }
        }
    });
});

describe('selectFileGroups', () => {
    it('returns the always-on groups for a minimal config', () => {
        expect(selectFileGroups(minimalConfig()).map((group) => group.name)).toEqual([
            'source',
            'tests',
            'root',
            'editor',
        ]);
    });

    it('returns every group in table order for a full config', () => {
        expect(selectFileGroups(fullConfig()).map((group) => group.name)).toEqual([
            'source',
            'tests',
            'root',
            'editor',
            'assistant',
            'container',
            'ci',
            'devcontainer',
            'pre-commit',
            'diagrams',
        ]);
    });

    it('filters a custom table', () => {
        const groups: FileGroup[] = [
            {name: 'a', gate: 'diagrams', files: []},
            {name: 'b', gate: null, files: []},
            {name: 'c', gate: 'containerization', files: []},
        ];
        const selected = selectFileGroups(minimalConfig({containerization: true}), groups);
        expect(selected.map((group) => group.name)).toEqual(['b', 'c']);
    });
});

describe('expandOutputPath', () => {
    it('substitutes every {name} token', () => {
        expect(expandOutputPath('src/{name}/{name}.py', fullConfig({name: 'demo'}))).toBe('src/demo/demo.py');
    });

    it('leaves token-free paths alone', () => {
        expect(expandOutputPath('.github/workflows/ci.yml', fullConfig())).toBe('.github/workflows/ci.yml');
    });
});
