#!/usr/bin/env node
import 'dotenv/config';
import { handleHelpCli, handleUnknownCommand, parseCliArgs } from './core/cli.js';
import { ActivationMachine, type ActivationResult } from './core/activation.js';
import { ReadlinePrompter } from './core/prompts.js';
import { getGatewayConfig } from './config/json-config.js';
import { startApiServer } from './api/router.js';
import { SignalRestTransport } from './interfaces/signal_transport.js';
import { AttachmentStore } from './services/attachment-store.js';
import { ContactDirectory } from './services/contact-directory.js';
import { ConversationLog } from './services/conversation-log.js';
import { InboundListener } from './services/inbound-listener.js';
import { MessageRelay } from './services/message-relay.js';
import { NotificationCenter } from './services/notification-center.js';
import { RegistrationStateStore } from './services/registration-state.js';
import { StoragePaths } from './services/storage-paths.js';
import { LuksVolumeManager, NoopVolumeManager } from './services/volume-manager.js';
import { logThought, setDebugLogging } from './utils/logger.js';

// ── Early one-shot CLI handling ──────────────────────────────────────────────

const argv = process.argv.slice(2);

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

const options = parseCliArgs(argv);
const config = getGatewayConfig();
setDebugLogging(config.runtime.debug);

// ── Storage & Services ───────────────────────────────────────────────────────

const paths = new StoragePaths(config.storage);
const registration = new RegistrationStateStore(paths);
const directory = new ContactDirectory(paths);
const conversationLog = new ConversationLog();
const attachments = new AttachmentStore(paths);
const notifications = new NotificationCenter({ defaultTtlMs: config.notifications.ttlMs });

const transport = new SignalRestTransport({
    baseUrl: config.transport.baseUrl,
    receiveTimeoutSec: config.transport.receiveTimeoutSec,
});

const volume = config.runtime.testMode
    ? new NoopVolumeManager()
    : new LuksVolumeManager({
        mountPoint: paths.mountPoint,
        volumeGroup: config.volume.volumeGroup,
        mapperName: config.volume.mapperName,
    });

const relay: MessageRelay = new MessageRelay({
    paths,
    directory,
    log: conversationLog,
    attachments,
    notifications,
    getTransport: () => activation.transport,
    historySizeBytes: config.storage.historySizeBytes,
    notificationTtlMs: config.notifications.ttlMs,
});

const prompter = new ReadlinePrompter();

const activation: ActivationMachine = new ActivationMachine({
    registration,
    volume,
    transport,
    prompter,
    createListener: (activeTransport) => new InboundListener(
        activeTransport,
        (message) => relay.handleInbound(message),
        { ...config.listener, label: 'signal receive loop' },
    ),
    verificationType: config.transport.verificationType,
    debug: config.runtime.debug,
    testMode: config.runtime.testMode,
});

// ── Activation & API ─────────────────────────────────────────────────────────

async function main(): Promise<void> {
    let result: ActivationResult;
    try {
        result = await activation.activate(options);
    } finally {
        prompter.close();
    }

    if (result.kind === 'registered') {
        console.log(`[Vaultline] Registration successful for ${result.number}. Volume locked; restart without --register to apply it.`);
        process.exit(0);
    }

    const { listener } = result;
    console.log(`[Vaultline] Message listener enabled for ${result.number}.`);
    const server = startApiServer({ relay, attachments, activation, notifications }, config.runtime.apiPort);

    const shutdown = (signal: NodeJS.Signals): void => {
        void logThought(`[Vaultline] Received ${signal}; shutting down.`, 'notice');
        notifications.dispose();
        server.close();
        listener.stop().then(
            () => process.exit(0),
            (err: unknown) => {
                console.error('[Vaultline] Listener did not stop cleanly:', err);
                process.exit(1);
            },
        );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch(async (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Vaultline] ${message}`);
    await logThought(`[Vaultline] Startup failed: ${message}`, 'error');
    process.exit(1);
});
