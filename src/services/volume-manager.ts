import { spawn } from 'node:child_process';
import path from 'node:path';
import { GatewayError } from '../types/errors.js';
import { logSystemCommand, logThought } from '../utils/logger.js';

export interface VolumeManager {
    /**
     * Unlock and mount `volume`. With `dispose`, the password is removed from
     * the volume's key slots once the volume is open.
     */
    unlock(volume: string, password: string, dispose: boolean): Promise<void>;
    lock(): Promise<void>;
}

export interface LuksVolumeOptions {
    mountPoint: string;
    volumeGroup: string;
    mapperName: string;
}

interface CommandResult {
    exitCode: number | null;
    output: string;
}

const VOLUME_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

function runCommand(executable: string, args: string[], stdin?: string): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
        const child = spawn(executable, args, { stdio: ['pipe', 'pipe', 'pipe'] });
        const chunks: Buffer[] = [];
        child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));
        child.on('error', reject);
        child.on('close', (exitCode) => {
            resolve({ exitCode, output: Buffer.concat(chunks).toString('utf8') });
        });
        child.stdin.end(stdin ?? '');
    });
}

/** Encrypted volume backed by LUKS, driven through `cryptsetup` and `mount`. */
export class LuksVolumeManager implements VolumeManager {
    readonly #options: LuksVolumeOptions;
    #volume: string | null = null;

    constructor(options: LuksVolumeOptions) {
        this.#options = options;
    }

    #device(volume: string): string {
        return path.posix.join('/dev', this.#options.volumeGroup, volume);
    }

    #mapperDevice(): string {
        return path.posix.join('/dev/mapper', this.#options.mapperName);
    }

    async #exec(executable: string, args: string[], stdin?: string): Promise<void> {
        const preview = [executable, ...args].join(' ');
        let result: CommandResult;
        try {
            result = await runCommand(executable, args, stdin);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            await logSystemCommand(preview, message, null);
            throw new GatewayError('VolumeFailure', `${executable} could not be started: ${message}`, { cause: err });
        }

        await logSystemCommand(preview, result.output, result.exitCode);
        if (result.exitCode !== 0) {
            throw new GatewayError('VolumeFailure', `${preview} failed (exit ${result.exitCode ?? 'unknown'}): ${result.output.trim()}`);
        }
    }

    async unlock(volume: string, password: string, dispose: boolean): Promise<void> {
        if (!VOLUME_NAME_PATTERN.test(volume)) {
            throw new GatewayError('VolumeFailure', `invalid volume name: ${volume}`);
        }
        const device = this.#device(volume);

        await this.#exec('cryptsetup', ['luksOpen', '--key-file=-', device, this.#options.mapperName], password);
        this.#volume = volume;
        await this.#exec('mount', [this.#mapperDevice(), this.#options.mountPoint]);

        if (dispose) {
            await this.#exec('cryptsetup', ['luksRemoveKey', '--key-file=-', device], password);
            await logThought(`[Volume] Password disposed for ${device}.`, 'warning');
        }
        await logThought(`[Volume] ${device} unlocked at ${this.#options.mountPoint}.`, 'notice');
    }

    /** Unmount and close. Both steps run even when the first one fails. */
    async lock(): Promise<void> {
        const failures: string[] = [];
        for (const [executable, args] of [
            ['umount', [this.#options.mountPoint]],
            ['cryptsetup', ['luksClose', this.#options.mapperName]],
        ] as const) {
            try {
                await this.#exec(executable, [...args]);
            } catch (err) {
                failures.push(err instanceof Error ? err.message : String(err));
            }
        }

        if (this.#volume) {
            await logThought(`[Volume] ${this.#device(this.#volume)} locked.`, 'notice');
            this.#volume = null;
        }
        if (failures.length > 0) {
            throw new GatewayError('VolumeFailure', failures.join('; '));
        }
    }
}

/** Used in test mode, where the storage is assumed to be mounted already. */
export class NoopVolumeManager implements VolumeManager {
    async unlock(volume: string): Promise<void> {
        await logThought(`[Volume] Test mode: skipping unlock of ${volume}.`, 'debug');
    }

    async lock(): Promise<void> {
        await logThought('[Volume] Test mode: skipping lock.', 'debug');
    }
}
