import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import type { VerificationType } from '../types/messaging.js';

export interface VaultlineConfig {
    runtime: {
        apiSecret: string;
        apiPort: number;
        debug: boolean;
        /** Skip volume unlock/lock; the storage is assumed to be mounted. */
        testMode: boolean;
    };
    storage: {
        /** Mount point of the decrypted volume. */
        mountPoint: string;
        /** Key storage directory, relative to the mount point. */
        keyPath: string;
        serviceDir: string;
        contactExtension: string;
        historySizeBytes: number;
    };
    volume: {
        volumeGroup: string;
        mapperName: string;
    };
    transport: {
        baseUrl: string;
        verificationType: VerificationType;
        receiveTimeoutSec: number;
    };
    listener: {
        baseDelayMs: number;
        maxDelayMs: number;
        backoffFactor: number;
        /** Give up after this many failed runs in a row; 0 keeps retrying. */
        maxConsecutiveFailures: number;
    };
    notifications: {
        ttlMs: number;
    };
}

export const DEFAULT_CONFIG: VaultlineConfig = {
    runtime: {
        apiSecret: '',
        apiPort: 4430,
        debug: false,
        testMode: false,
    },
    storage: {
        mountPoint: '/mnt/vaultline',
        keyPath: 'keys',
        serviceDir: 'textsecure',
        contactExtension: 'textsecure',
        historySizeBytes: 10 * 1024,
    },
    volume: {
        volumeGroup: 'lvmvolume',
        mapperName: 'vaultline',
    },
    transport: {
        baseUrl: 'http://127.0.0.1:8080',
        verificationType: 'sms',
        receiveTimeoutSec: 30,
    },
    listener: {
        baseDelayMs: 1000,
        maxDelayMs: 60_000,
        backoffFactor: 2,
        maxConsecutiveFailures: 0,
    },
    notifications: {
        ttlMs: 30_000,
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.VAULTLINE_CONFIG_PATH) {
        return path.resolve(process.env.VAULTLINE_CONFIG_PATH);
    }
    return path.resolve('vaultline.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

// Values of the wrong type are ignored and the default is kept.
function readString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readPositiveInteger(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isSafeInteger(value) && value > 0 ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

function readVerificationType(source: Record<string, unknown>, fallback: VerificationType): VerificationType {
    const value = source.verificationType;
    if (value === undefined) return fallback;
    if (value === 'sms' || value === 'voice') return value;
    console.warn(`[Vaultline Config] Unknown verificationType '${String(value)}', using 'sms'.`);
    return 'sms';
}

export function mergeWithDefaults(loaded: unknown): VaultlineConfig {
    const record = asRecord(loaded);
    const runtime = asRecord(record.runtime);
    const storage = asRecord(record.storage);
    const volume = asRecord(record.volume);
    const transport = asRecord(record.transport);
    const listener = asRecord(record.listener);
    const notifications = asRecord(record.notifications);
    const defaults = DEFAULT_CONFIG;

    return {
        runtime: {
            apiSecret: readString(runtime, 'apiSecret', defaults.runtime.apiSecret),
            apiPort: readPositiveInteger(runtime, 'apiPort', defaults.runtime.apiPort),
            debug: readBoolean(runtime, 'debug', defaults.runtime.debug),
            testMode: readBoolean(runtime, 'testMode', defaults.runtime.testMode),
        },
        storage: {
            mountPoint: readString(storage, 'mountPoint', defaults.storage.mountPoint),
            keyPath: readString(storage, 'keyPath', defaults.storage.keyPath),
            serviceDir: readString(storage, 'serviceDir', defaults.storage.serviceDir),
            contactExtension: readString(storage, 'contactExtension', defaults.storage.contactExtension),
            historySizeBytes: readPositiveInteger(storage, 'historySizeBytes', defaults.storage.historySizeBytes),
        },
        volume: {
            volumeGroup: readString(volume, 'volumeGroup', defaults.volume.volumeGroup),
            mapperName: readString(volume, 'mapperName', defaults.volume.mapperName),
        },
        transport: {
            baseUrl: readString(transport, 'baseUrl', defaults.transport.baseUrl),
            verificationType: readVerificationType(transport, defaults.transport.verificationType),
            receiveTimeoutSec: readPositiveInteger(transport, 'receiveTimeoutSec', defaults.transport.receiveTimeoutSec),
        },
        listener: {
            baseDelayMs: readPositiveInteger(listener, 'baseDelayMs', defaults.listener.baseDelayMs),
            maxDelayMs: readPositiveInteger(listener, 'maxDelayMs', defaults.listener.maxDelayMs),
            backoffFactor: readNumber(listener, 'backoffFactor', defaults.listener.backoffFactor),
            maxConsecutiveFailures: readNumber(listener, 'maxConsecutiveFailures', defaults.listener.maxConsecutiveFailures),
        },
        notifications: {
            ttlMs: readPositiveInteger(notifications, 'ttlMs', defaults.notifications.ttlMs),
        },
    };
}

// ── Cached View ─────────────────────────────────────────────────────────────

let cachedConfig: VaultlineConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

function parseBoolean(value: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function readEnv(key: string): string | undefined {
    const value = process.env[key];
    return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function applyEnvOverrides(config: VaultlineConfig): VaultlineConfig {
    const apiSecret = readEnv('API_SECRET');
    const apiPort = readEnv('API_PORT');
    const mountPoint = readEnv('VAULTLINE_MOUNT_POINT');
    const testMode = readEnv('VAULTLINE_TEST_MODE');
    const debug = readEnv('VAULTLINE_DEBUG');
    const restUrl = readEnv('SIGNAL_REST_URL');

    if (apiSecret) config.runtime.apiSecret = apiSecret;
    if (apiPort && Number.isSafeInteger(Number(apiPort)) && Number(apiPort) > 0) config.runtime.apiPort = Number(apiPort);
    if (mountPoint) config.storage.mountPoint = mountPoint;
    if (testMode) config.runtime.testMode = parseBoolean(testMode);
    if (debug) config.runtime.debug = parseBoolean(debug);
    if (restUrl) config.transport.baseUrl = restUrl;
    return config;
}

export function reloadConfigSync(): VaultlineConfig {
    const configPath = getConfigPath();
    let loaded: unknown = {};
    try {
        if (existsSync(configPath)) {
            loaded = JSON.parse(readFileSync(configPath, 'utf8'));
        }
    } catch (error) {
        console.error(`[Vaultline Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = applyEnvOverrides(mergeWithDefaults(loaded));
    return cachedConfig;
}

/** Typed configuration: `vaultline.json` merged over defaults, then env overrides. */
export function getGatewayConfig(): VaultlineConfig {
    return cachedConfig ?? reloadConfigSync();
}

const CONFIG_VALUES = {
    API_SECRET: (config: VaultlineConfig) => config.runtime.apiSecret,
} satisfies Record<string, (config: VaultlineConfig) => string>;

export type ConfigValueKey = keyof typeof CONFIG_VALUES;

/** String view of a single configuration key; blank values read as unset. */
export function getConfigValue(key: ConfigValueKey): string | undefined {
    const value = CONFIG_VALUES[key](getGatewayConfig()).trim();
    return value === '' ? undefined : value;
}
