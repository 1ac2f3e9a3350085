// test/template-context.spec.ts

import {describe, it, expect} from 'vitest';
import {parse} from 'smol-toml';
import {buildTemplateContext, escapeTomlString} from '../src/core/template-context';
import {fullConfig} from './helpers';

describe('escapeTomlString', () => {
    it('escapes double quotes', () => {
        expect(escapeTomlString('A "cool" project')).toBe('A \\"cool\\" project');
    });

    it('doubles backslashes before escaping quotes', () => {
        expect(escapeTomlString('C:\\dir\\"x"')).toBe('C:\\\\dir\\\\\\"x\\"');
    });

    it('leaves apostrophes alone', () => {
        expect(escapeTomlString("O'Brien")).toBe("O'Brien");
    });

    it.each([
        'A "cool" project',
        'O\'Brien "Bob"',
        'back\\slash',
        'trailing backslash \\',
        '\\"already escaped\\"',
    ])('round-trips %j through a TOML basic string', (value) => {
        const parsed = parse(`value = "${escapeTomlString(value)}"`);
        expect(parsed.value).toBe(value);
    });
});

describe('buildTemplateContext', () => {
    it('maps the config and escapes free-text fields', () => {
        const context = buildTemplateContext(
            fullConfig({description: 'Say "hi"', author: 'O\'Brien "Bob"', diagrams: false}),
        );

        expect(context).toEqual({
            projectName: 'testproject',
            description: 'Say \\"hi\\"',
            author: 'O\'Brien \\"Bob\\"',
            pythonVersion: '3.14',
            pythonTarget: 'py314',
            continuousIntegration: true,
            devcontainer: true,
            preCommitHooks: true,
            containerization: true,
            diagrams: false,
            localAiAssistant: true,
        });
    });

    it('derives the ruff target from the version', () => {
        expect(buildTemplateContext(fullConfig({runtimeVersion: '3.13'})).pythonTarget).toBe('py313');
    });

    it('is frozen', () => {
        expect(Object.isFrozen(buildTemplateContext(fullConfig()))).toBe(true);
    });
});
