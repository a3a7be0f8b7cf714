import type { Readable } from 'node:stream';

export type VerificationType = 'sms' | 'voice';

/** Settings handed to the transport when it is set up. */
export interface TransportConfig {
  /** Number the transport acts for. */
  number: string;
  /** True while the one-shot registration is still pending. */
  register: boolean;
  verificationType: VerificationType;
  logLevel: 'debug' | 'error';
}

/**
 * Callbacks the transport calls back into during setup. Interactive input stays
 * behind these hooks so the activation flow can be driven without a terminal.
 */
export interface TransportHooks {
  getConfig(): TransportConfig;
  getVerificationCode(): Promise<string>;
  getStoragePassword(): Promise<string>;
  registrationDone(): Promise<void>;
}

/** A binary attachment carried by an inbound message. */
export interface InboundAttachment {
  contentType?: string;
  fileName?: string;
  /** Opens the attachment content. Each call starts a fresh download. */
  open(): Promise<Readable>;
}

/** A normalized inbound message delivered by the transport. */
export interface InboundMessage {
  /** Sender number as reported by the transport. */
  source: string;
  /** Message text; empty when the message only carries attachments. */
  text: string;
  timestamp: Date;
  attachments: InboundAttachment[];
}

export type InboundMessageHandler = (message: InboundMessage) => Promise<void>;

/**
 * Contract of the secure messaging transport. Protocol work (key agreement,
 * ratcheting, envelope encryption) happens behind it.
 */
export interface MessagingTransport {
  setup(hooks: TransportHooks): Promise<void>;
  sendMessage(number: string, text: string): Promise<void>;
  sendAttachment(number: string, text: string, attachment: Readable, fileName: string): Promise<void>;
  /**
   * Deliver inbound messages to `onMessage` until `signal` aborts (resolves) or
   * the connection fails (rejects).
   */
  listen(onMessage: InboundMessageHandler, signal: AbortSignal): Promise<void>;
}
