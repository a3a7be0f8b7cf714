import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    clearConfigCacheForTests,
    DEFAULT_CONFIG,
    getConfigValue,
    getGatewayConfig,
    mergeWithDefaults,
} from '../../src/config/json-config.js';

const ENV_KEYS = ['VAULTLINE_CONFIG_PATH', 'API_SECRET', 'API_PORT', 'VAULTLINE_MOUNT_POINT', 'VAULTLINE_TEST_MODE', 'VAULTLINE_DEBUG', 'SIGNAL_REST_URL'];

describe('json config', () => {
    let dir: string;
    const saved = new Map<string, string | undefined>();

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'vaultline-config-'));
        for (const key of ENV_KEYS) {
            saved.set(key, process.env[key]);
            delete process.env[key];
        }
        process.env.VAULTLINE_CONFIG_PATH = path.join(dir, 'vaultline.json');
        clearConfigCacheForTests();
    });

    afterEach(async () => {
        for (const [key, value] of saved) {
            if (value === undefined) delete process.env[key];
            else process.env[key] = value;
        }
        clearConfigCacheForTests();
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('uses the defaults without a config file', () => {
        expect(getGatewayConfig()).toEqual(DEFAULT_CONFIG);
        expect(getConfigValue('API_SECRET')).toBeUndefined();
    });

    it('merges known keys of the right type only', () => {
        const config = mergeWithDefaults({
            storage: { mountPoint: '/srv/vault', historySizeBytes: '4096', unknown: true },
            listener: { maxConsecutiveFailures: 5 },
            transport: 'nope',
        });
        expect(config.storage.mountPoint).toBe('/srv/vault');
        expect(config.storage.historySizeBytes).toBe(10 * 1024);
        expect(config.listener.maxConsecutiveFailures).toBe(5);
        expect(config.transport).toEqual(DEFAULT_CONFIG.transport);
        expect(config.storage).not.toHaveProperty('unknown');
    });

    it('keeps the defaults for sizes, ports and delays that are not positive integers', () => {
        const config = mergeWithDefaults({
            runtime: { apiPort: -1 },
            storage: { historySizeBytes: -10 },
            transport: { receiveTimeoutSec: 0 },
            listener: { baseDelayMs: 2.5, maxDelayMs: Number.NaN },
            notifications: { ttlMs: 1.5 },
        });
        expect(config.runtime.apiPort).toBe(DEFAULT_CONFIG.runtime.apiPort);
        expect(config.storage.historySizeBytes).toBe(10 * 1024);
        expect(config.transport.receiveTimeoutSec).toBe(DEFAULT_CONFIG.transport.receiveTimeoutSec);
        expect(config.listener.baseDelayMs).toBe(DEFAULT_CONFIG.listener.baseDelayMs);
        expect(config.listener.maxDelayMs).toBe(DEFAULT_CONFIG.listener.maxDelayMs);
        expect(config.notifications.ttlMs).toBe(DEFAULT_CONFIG.notifications.ttlMs);
        expect(mergeWithDefaults({ storage: { historySizeBytes: 2048 } }).storage.historySizeBytes).toBe(2048);
    });

    it('ignores a port override that is not a positive integer', () => {
        process.env.API_PORT = '-80';
        expect(getGatewayConfig().runtime.apiPort).toBe(DEFAULT_CONFIG.runtime.apiPort);
    });

    it('treats a blank API secret as unset', async () => {
        await writeFile(path.join(dir, 'vaultline.json'), JSON.stringify({ runtime: { apiSecret: '   ' } }));
        expect(getConfigValue('API_SECRET')).toBeUndefined();
    });

    it('falls back to sms for an unknown verification type', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        expect(mergeWithDefaults({ transport: { verificationType: 'fax' } }).transport.verificationType).toBe('sms');
        expect(mergeWithDefaults({ transport: { verificationType: 'voice' } }).transport.verificationType).toBe('voice');
    });

    it('reads the config file and applies environment overrides on top', async () => {
        await writeFile(
            path.join(dir, 'vaultline.json'),
            JSON.stringify({ runtime: { apiPort: 5000, apiSecret: 'file-secret' }, storage: { mountPoint: '/srv/a' } }),
        );
        process.env.API_SECRET = 'test-secret';
        process.env.VAULTLINE_TEST_MODE = 'yes';
        process.env.API_PORT = 'not-a-port';

        const config = getGatewayConfig();
        expect(config.runtime).toEqual({ apiSecret: 'test-secret', apiPort: 5000, debug: false, testMode: true });
        expect(config.storage.mountPoint).toBe('/srv/a');
        expect(getConfigValue('API_SECRET')).toBe('test-secret');
    });

    it('survives a malformed config file', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        await writeFile(path.join(dir, 'vaultline.json'), '{ not json');
        expect(getGatewayConfig()).toEqual(DEFAULT_CONFIG);
    });
});
