import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { logSystemCommand, logThought, scrubSensitiveText, setDebugLogging } from '../../src/utils/logger.js';

describe('logger', () => {
    let dir: string;
    const previousLogDir = process.env.VAULTLINE_LOG_DIR;
    const previousSecret = process.env.API_SECRET;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'vaultline-log-'));
        process.env.VAULTLINE_LOG_DIR = dir;
        process.env.API_SECRET = 'test-secret-value';
    });

    afterEach(async () => {
        if (previousLogDir === undefined) delete process.env.VAULTLINE_LOG_DIR;
        else process.env.VAULTLINE_LOG_DIR = previousLogDir;
        if (previousSecret === undefined) delete process.env.API_SECRET;
        else process.env.API_SECRET = previousSecret;
        setDebugLogging(false);
        await rm(dir, { recursive: true, force: true });
    });

    async function readLog(): Promise<string> {
        const files = await readdir(dir);
        expect(files).toHaveLength(1);
        return readFile(path.join(dir, files[0] ?? ''), 'utf8');
    }

    it('redacts inline secrets and configured secret values', () => {
        expect(scrubSensitiveText('password=hunter22 next')).toBe('password=[REDACTED] next');
        expect(scrubSensitiveText('header carried test-secret-value')).toBe('header carried [REDACTED]');
    });

    it('appends a titled section to the daily log', async () => {
        await logThought('[Relay] Received message from +15550001.', 'notice');
        const content = await readLog();
        expect(content).toMatch(/^\n## NOTICE @ \d{4}-\d{2}-\d{2}T[\d:.]+Z\n\n\[Relay\] Received message from \+15550001\.\n$/);
    });

    it('drops debug entries unless debug logging is on', async () => {
        await logThought('hidden', 'debug');
        expect(await readdir(dir)).toEqual([]);

        setDebugLogging(true);
        await logThought('shown', 'debug');
        expect(await readLog()).toContain('## DEBUG @');
    });

    it('records commands with their exit code', async () => {
        await logSystemCommand('cryptsetup luksClose vaultline', '', 0);
        expect(await readLog()).toContain('Command: cryptsetup luksClose vaultline\nExit code: 0\nOutput: (none)\n');
    });
});
