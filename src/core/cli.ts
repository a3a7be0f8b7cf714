// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: vaultline [options]

Options:
  --register, -r      Run the one-shot registration workflow, then exit
  --help, -h          Show this help message

Environment:
  VAULTLINE_CONFIG_PATH   Path to vaultline.json (default ./vaultline.json)
  VAULTLINE_MOUNT_POINT   Mount point of the decrypted volume
  VAULTLINE_TEST_MODE     Skip volume unlock/lock (storage already mounted)
  VAULTLINE_DEBUG         Verbose logging
  VAULTLINE_LOG_DIR       Directory of the daily log files (default ./memory)
  SIGNAL_REST_URL         Base URL of the signal-cli REST daemon
  API_SECRET              HMAC secret for signed API requests
  API_PORT                Port of the HTTP API

Examples:
  vaultline --register
  VAULTLINE_TEST_MODE=true vaultline
`.trim();

export interface CliOptions {
  register: boolean;
}

const KNOWN_FLAGS = new Set(['--register', '-r', '--help', '-h']);

/** Read the run mode from the process arguments. */
export function parseCliArgs(argv: string[]): CliOptions {
  return { register: argv.includes('--register') || argv.includes('-r') };
}

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped arguments.
 * Returns `true` and sets a non-zero exit code when one is found.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const unknown = argv.find((arg) => !KNOWN_FLAGS.has(arg));
  if (unknown === undefined) return false;

  console.error(`[Vaultline] Unknown argument: '${unknown}'`);
  console.error(`Run 'vaultline --help' to see available options.`);
  process.exitCode = 1;
  return true;
}
