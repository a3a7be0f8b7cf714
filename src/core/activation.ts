import type { ActivationPrompter } from './prompts.js';
import type { InboundListener } from '../services/inbound-listener.js';
import { isCanonicalNumber } from '../services/contact-naming.js';
import type { RegistrationStateStore } from '../services/registration-state.js';
import type { VolumeManager } from '../services/volume-manager.js';
import { GatewayError, toGatewayError } from '../types/errors.js';
import type { MessagingTransport, TransportHooks, VerificationType } from '../types/messaging.js';
import { logThought } from '../utils/logger.js';

export type ActivationState =
    | 'Idle'
    | 'VolumeUnlocked'
    | 'RegistrationChecked'
    | 'AwaitingNumber'
    | 'AwaitingVerification'
    | 'Ready'
    | 'ListenerRunning'
    | 'Fatal';

export interface ActivationDeps {
    registration: RegistrationStateStore;
    volume: VolumeManager;
    transport: MessagingTransport;
    prompter: ActivationPrompter;
    createListener: (transport: MessagingTransport) => InboundListener;
    verificationType: VerificationType;
    debug: boolean;
    /** Volume is assumed mounted; no password is asked and nothing is unlocked. */
    testMode: boolean;
}

export type ActivationResult =
    | { kind: 'registered'; number: string }
    | { kind: 'running'; number: string; listener: InboundListener };

const MAX_NUMBER_ATTEMPTS = 3;

/**
 * Drives first-run registration (unlock, registration check, number capture,
 * verification, transport setup) and steady-state activation (transport setup,
 * listener start). Errors are thrown to the caller, which decides whether the
 * process ends.
 */
export class ActivationMachine {
    readonly #deps: ActivationDeps;
    #state: ActivationState = 'Idle';
    #number: string | null = null;
    #transport: MessagingTransport | null = null;
    #listener: InboundListener | null = null;
    #volumeUnlocked = false;

    constructor(deps: ActivationDeps) {
        this.#deps = deps;
    }

    get state(): ActivationState {
        return this.#state;
    }

    get number(): string | null {
        return this.#number;
    }

    /** The set-up transport, once activation reached `Ready`. */
    get transport(): MessagingTransport | null {
        return this.#transport;
    }

    get listener(): InboundListener | null {
        return this.#listener;
    }

    #transition(next: ActivationState): void {
        void logThought(`[Activation] ${this.#state} -> ${next}`, 'debug');
        this.#state = next;
    }

    async activate(options: { register: boolean }): Promise<ActivationResult> {
        try {
            return options.register ? await this.#register() : await this.#activateSteadyState();
        } catch (err) {
            this.#transition('Fatal');
            if (this.#volumeUnlocked) {
                await this.#lockVolume();
            }
            throw err;
        }
    }

    async #lockVolume(): Promise<void> {
        try {
            await this.#deps.volume.lock();
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            await logThought(`[Activation] Failed to lock volume: ${message}`, 'error');
        } finally {
            this.#volumeUnlocked = false;
        }
    }

    async #unlockVolume(): Promise<void> {
        const { prompter, volume, testMode } = this.#deps;
        const volumeName = await prompter.promptVolumeName();
        const dispose = await prompter.promptDisposeConfirmation();

        if (!testMode) {
            const password = await prompter.promptPassword();
            try {
                await volume.unlock(volumeName, password, dispose);
            } catch (err) {
                await this.#lockVolume();
                throw toGatewayError(err, 'VolumeFailure', `failed to unlock volume ${volumeName}`);
            }
            this.#volumeUnlocked = true;
        }
        this.#transition('VolumeUnlocked');
    }

    async #captureNumber(): Promise<string> {
        for (let attempt = 1; attempt <= MAX_NUMBER_ATTEMPTS; attempt++) {
            const number = await this.#deps.prompter.promptPhoneNumber();
            if (isCanonicalNumber(number)) {
                return number;
            }
            console.error(`[Vaultline] '${number}' is not a valid number; use +<country><number> or 00<country><number>.`);
        }
        throw new GatewayError('InvalidNumber', `no valid number entered after ${MAX_NUMBER_ATTEMPTS} attempts`);
    }

    async #register(): Promise<ActivationResult> {
        const { registration } = this.#deps;
        await this.#unlockVolume();

        const provisioned = await registration.isProvisioned();
        this.#transition('RegistrationChecked');

        if (provisioned) {
            const existing = await registration.readRegisteredNumber().catch(() => null);
            throw new GatewayError(
                'AlreadyRegistered',
                `registration already present for number ${existing ?? '(unknown)'}, delete ${registration.storageDir} contents to reset.`,
            );
        }

        this.#transition('AwaitingNumber');
        const number = await this.#captureNumber();
        await registration.ensureStorageDir();
        await registration.saveRegisteredNumber(number);

        await this.#setupTransport(number, true);
        await logThought(`[Activation] Registration successful for ${number}; locking volume and shutting down.`, 'notice');
        if (this.#volumeUnlocked) {
            await this.#lockVolume();
        }
        return { kind: 'registered', number };
    }

    async #activateSteadyState(): Promise<ActivationResult> {
        const { registration } = this.#deps;
        await registration.ensureStorageDir();

        const number = await registration.readRegisteredNumber();
        if (number === null) {
            throw new GatewayError(
                'NotRegistered',
                'messaging enabled but not registered, please restart with --register for registration.',
            );
        }

        await this.#setupTransport(number, await registration.needsRegistration());

        const listener = this.#deps.createListener(this.#deps.transport);
        listener.start();
        this.#listener = listener;
        this.#transition('ListenerRunning');
        await logThought(`[Activation] Enabling message listener for ${number}.`, 'notice');
        return { kind: 'running', number, listener };
    }

    async #setupTransport(number: string, register: boolean): Promise<void> {
        const { transport, prompter, registration, verificationType, debug } = this.#deps;
        this.#number = number;

        const hooks: TransportHooks = {
            getConfig: () => ({
                number,
                register,
                verificationType,
                logLevel: debug ? 'debug' : 'error',
            }),
            getVerificationCode: async () => {
                this.#transition('AwaitingVerification');
                return prompter.promptVerificationCode();
            },
            // storage is already protected by the encrypted volume
            getStoragePassword: async () => '',
            registrationDone: async () => {
                await registration.markProvisioned();
                await logThought(`[Activation] Registration complete for ${number}.`, 'notice');
            },
        };

        try {
            await transport.setup(hooks);
        } catch (err) {
            const code = err instanceof GatewayError ? err.code : 'TransportFailure';
            const detail = err instanceof Error ? err.message : String(err);
            throw new GatewayError(code, `failed to enable messaging transport: ${detail}`, { cause: err });
        }
        this.#transport = transport;
        this.#transition('Ready');
    }
}
