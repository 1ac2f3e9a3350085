// test/fs-utils.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {
    listFilesRecursiveSync,
    resolveProjectPath,
    toPosixPath,
    toProjectRelativePath,
    writeFileEnsuringDirSync,
} from '../src/util/fs-utils';
import {makeTempDir, removeDir} from './helpers';

describe('fs-utils', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('normalises separators', () => {
        expect(toPosixPath('a\\b\\c.txt')).toBe('a/b/c.txt');
    });

    it('creates parent directories when writing', () => {
        const target = path.join(dir, 'a', 'b', 'c.txt');
        writeFileEnsuringDirSync(target, 'hello');
        expect(fs.readFileSync(target, 'utf8')).toBe('hello');
    });

    it('refuses paths that escape the root', () => {
        expect(resolveProjectPath(dir, 'src/x.py')).toBe(path.join(path.resolve(dir), 'src', 'x.py'));
        expect(() => resolveProjectPath(dir, '../outside.txt')).toThrow('outside project root');
    });

    it('converts absolute paths back to root-relative POSIX paths', () => {
        expect(toProjectRelativePath(dir, path.join(dir, 'a', 'b.txt'))).toBe('a/b.txt');
        expect(() => toProjectRelativePath(dir, path.dirname(dir))).toThrow('is not inside project root');
    });

    it('lists files recursively in sorted order', () => {
        writeFileEnsuringDirSync(path.join(dir, 'z.txt'), '');
        writeFileEnsuringDirSync(path.join(dir, '.hidden', 'x'), '');
        writeFileEnsuringDirSync(path.join(dir, 'src', 'pkg', 'main.py'), '');
        fs.mkdirSync(path.join(dir, 'empty'));

        expect(listFilesRecursiveSync(dir)).toEqual(['.hidden/x', 'src/pkg/main.py', 'z.txt']);
    });
});
