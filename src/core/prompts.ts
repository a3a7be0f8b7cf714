import * as readline from 'node:readline';
import { Writable } from 'node:stream';

/**
 * Operator input needed by activation. Kept behind an interface so the state
 * machine can run against scripted answers.
 */
export interface ActivationPrompter {
    promptVolumeName(): Promise<string>;
    /** True when the operator asked for the volume password to be destroyed after use. */
    promptDisposeConfirmation(): Promise<boolean>;
    promptPassword(): Promise<string>;
    promptPhoneNumber(): Promise<string>;
    promptVerificationCode(): Promise<string>;
    close(): void;
}

class MutableStdout extends Writable {
    muted = false;

    override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        if (!this.muted) {
            process.stdout.write(chunk, encoding);
        }
        callback();
    }
}

/** Terminal prompts over stdin/stdout. Passwords are read without echo. */
export class ReadlinePrompter implements ActivationPrompter {
    readonly #output = new MutableStdout();
    readonly #rl = readline.createInterface({
        input: process.stdin,
        output: this.#output,
        terminal: true,
    });

    #ask(question: string): Promise<string> {
        return new Promise((resolve) => {
            this.#rl.question(question, (answer) => resolve(answer.trim()));
        });
    }

    async #askSecret(question: string): Promise<string> {
        process.stdout.write(question);
        this.#output.muted = true;
        try {
            return await this.#ask('');
        } finally {
            this.#output.muted = false;
            process.stdout.write('\n');
        }
    }

    promptVolumeName(): Promise<string> {
        return this.#ask('\nPlease enter encrypted volume name for messaging key storage: ');
    }

    async promptDisposeConfirmation(): Promise<boolean> {
        const answer = await this.#ask('\nIf you would like to have the password disposed of after use enter YES all\nuppercase: ');
        if (answer !== 'YES') {
            return false;
        }
        console.log('\nWARNING: password will be destroyed after its use!\n(quit now if this is undesired)');
        return true;
    }

    promptPassword(): Promise<string> {
        return this.#askSecret('Please enter volume password (will not echo): ');
    }

    promptPhoneNumber(): Promise<string> {
        return this.#ask('\nPlease enter the mobile number to be used for registration (e.g. +15550001): ');
    }

    promptVerificationCode(): Promise<string> {
        return this.#ask('Please enter the verification code received over SMS or voice call: ');
    }

    close(): void {
        this.#rl.close();
    }
}
