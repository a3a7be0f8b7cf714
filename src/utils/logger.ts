import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'notice' | 'warning' | 'error';

const SENSITIVE_ENV_KEY_PATTERN = /(SECRET|TOKEN|PASSWORD|PASSPHRASE|_KEY)$/i;
const MIN_SENSITIVE_VALUE_LENGTH = 8;
const INLINE_SECRET_PATTERN = /\b(api[_-]?secret|api[_-]?key|token|password|passphrase)(\s*[=:]\s*)("[^"]*"|'[^']*'|[^\s,;&]+)/gi;
const REDACTED = '[REDACTED]';

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
    debugEnabled = enabled;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [key, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SENSITIVE_VALUE_LENGTH) continue;
        if (SENSITIVE_ENV_KEY_PATTERN.test(key)) {
            values.push(value);
        }
    }
    // longest first so overlapping values are fully masked
    return values.sort((left, right) => right.length - left.length);
}

/** Redact secrets from free text before it reaches a log file or an API response. */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text.replace(INLINE_SECRET_PATTERN, (_match, key: string, sep: string) => `${key}${sep}${REDACTED}`);
    for (const value of sensitiveEnvValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
    }
    return scrubbed;
}

export function getLogDir(): string {
    return path.resolve(process.env.VAULTLINE_LOG_DIR ?? 'memory');
}

function dailyLogPath(now: Date): string {
    return path.join(getLogDir(), `${now.toISOString().slice(0, 10)}.md`);
}

async function writeSection(title: string, body: string): Promise<void> {
    const now = new Date();
    const section = `\n## ${title} @ ${now.toISOString()}\n\n${scrubSensitiveText(body)}\n`;
    try {
        await mkdir(getLogDir(), { recursive: true });
        await appendFile(dailyLogPath(now), section, 'utf8');
    } catch (err) {
        console.error('[Vaultline Logger] Failed to write log entry:', err instanceof Error ? err.message : String(err));
    }
}

/**
 * Append a narrative entry to today's log file.
 * `debug` entries are dropped unless debug logging is on.
 */
export async function logThought(message: string, level: LogLevel = 'info'): Promise<void> {
    if (level === 'debug' && !debugEnabled) {
        return;
    }
    await writeSection(level.toUpperCase(), message);
}

/** Record an external command and its outcome. */
export async function logSystemCommand(command: string, output: string, exitCode: number | null): Promise<void> {
    const body = [
        `Command: ${command}`,
        `Exit code: ${exitCode ?? 'unknown'}`,
        output.trim() ? `Output:\n${output.trim()}` : 'Output: (none)',
    ].join('\n');
    await writeSection('COMMAND', body);
}
