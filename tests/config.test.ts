import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig, loadConfig } from '../src/config.js';
import { ConfigError } from '../src/types.js';

function configIssues(load: () => unknown): readonly string[] {
    try {
        load();
    } catch (error) {
        if (error instanceof ConfigError) return error.issues;
        throw error;
    }
    throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
    it('falls back to the defaults', () => {
        expect(loadConfig({ env: {} })).toEqual({
            locale: 'en',
            timezone: 'UTC',
            maxPasses: 32,
            logLevel: 'warn',
            tieBreak: 'rule-order',
            overlap: 'per-dimension',
            withLatent: true,
        });
        expect(loadConfig({ env: {} })).toEqual(defaultConfig());
    });

    it('reads SPANWISE_* variables', () => {
        const config = loadConfig({
            env: {
                SPANWISE_LOCALE: 'en_GB',
                SPANWISE_TIMEZONE: 'Europe/London',
                SPANWISE_MAX_PASSES: '8',
                SPANWISE_MAX_INVOCATIONS: '5000',
                SPANWISE_LOG_LEVEL: 'debug',
                SPANWISE_TIE_BREAK: 'keep-all',
                SPANWISE_OVERLAP_POLICY: 'strict',
                SPANWISE_WITH_LATENT: 'false',
            },
        });

        expect(config).toEqual({
            locale: 'en_GB',
            timezone: 'Europe/London',
            maxPasses: 8,
            maxInvocations: 5000,
            logLevel: 'debug',
            tieBreak: 'keep-all',
            overlap: 'strict',
            withLatent: false,
        });
    });

    it('treats blank values as unset and trims the rest', () => {
        const config = loadConfig({ env: { SPANWISE_LOCALE: '   ', SPANWISE_TIMEZONE: ' Europe/Oslo ' } });
        expect(config.locale).toBe('en');
        expect(config.timezone).toBe('Europe/Oslo');
    });

    it('reports every invalid variable', () => {
        const issues = configIssues(() =>
            loadConfig({
                env: {
                    SPANWISE_TIMEZONE: 'Mars/Base',
                    SPANWISE_MAX_PASSES: '0',
                    SPANWISE_WITH_LATENT: 'maybe',
                },
            })
        );

        expect(issues).toHaveLength(3);
        expect(issues[0]).toBe('SPANWISE_TIMEZONE: unknown time zone');
        expect(issues[1]).toMatch(/^SPANWISE_MAX_PASSES: /);
        expect(issues[2]).toMatch(/^SPANWISE_WITH_LATENT: /);
    });

    it('rejects malformed locales', () => {
        expect(configIssues(() => loadConfig({ env: { SPANWISE_LOCALE: 'english' } }))).toEqual([
            'SPANWISE_LOCALE: expected a locale like "en" or "en_GB"',
        ]);
    });
});

describe('loadConfig with a .env file', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'spanwise-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('lets explicit variables win over the file', () => {
        const dotenvPath = join(dir, '.env');
        writeFileSync(dotenvPath, 'SPANWISE_LOCALE=nl\nSPANWISE_LOG_LEVEL=debug\n');

        const config = loadConfig({ env: { SPANWISE_LOG_LEVEL: 'error' }, dotenvPath });
        expect(config.locale).toBe('nl');
        expect(config.logLevel).toBe('error');
    });

    it('fails on a file it cannot read', () => {
        const issues = configIssues(() => loadConfig({ env: {}, dotenvPath: join(dir, 'missing.env') }));
        expect(issues).toHaveLength(1);
        expect(issues[0]).toMatch(/^dotenvPath: ENOENT/);
    });
});
