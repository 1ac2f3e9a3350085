// test/helpers.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Asker } from '../src/cli/prompts';
import type { ProjectConfig } from '../src/schema';
import { Logger } from '../src/util/logger';

export const silentLogger = new Logger({ level: 'silent' });

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'pyseed-test-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function fullConfig(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
    return {
        name: 'testproject',
        description: 'A test project',
        author: 'Test Author',
        runtimeVersion: '3.14',
        continuousIntegration: true,
        devcontainer: true,
        preCommitHooks: true,
        containerization: true,
        diagrams: true,
        localAiAssistant: true,
        useCurrentDirectory: false,
        ...overrides,
    };
}

export function minimalConfig(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
    return fullConfig({
        continuousIntegration: false,
        devcontainer: false,
        preCommitHooks: false,
        containerization: false,
        diagrams: false,
        localAiAssistant: false,
        ...overrides,
    });
}

/**
 * Scripted prompt backend that records every question asked.
 */
export class FakeAsker implements Asker {
    readonly questions: string[] = [];
    closed = false;
    private readonly answers: string[];

    constructor(answers: readonly string[]) {
        this.answers = [...answers];
    }

    async question(query: string): Promise<string> {
        this.questions.push(query);
        const answer = this.answers.shift();
        if (answer === undefined) {
            throw new Error(`No scripted answer for: ${query}`);
        }
        return answer;
    }

    close(): void {
        this.closed = true;
    }
}
