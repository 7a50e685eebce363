/**
 * codedrop CLI: the `receive` command
 *
 * Wires configuration, logging, the consent prompter and progress output
 * around a {@link receive} call. The wormhole and transit implementations
 * are supplied by the embedding program through {@link ReceiveCommandDeps}.
 *
 * Usage:
 *   codedrop receive [code] [--accept-file] [--output-file <name>] ...
 *
 * @module cli
 */

import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { buildReceiveConfig, loadConfig } from './config-loader.js';
import type { ReceiveOverrides } from './config-loader.js';
import { LOG_LEVELS } from './constants.js';
import { createLogger } from './logger.js';
import { createReadlinePrompter } from './permission.js';
import { receive } from './receive-session.js';
import type {
  LogLevel,
  OutputStream,
  ProgressCallback,
  SessionOutcome,
  TransitFactory,
  WormholeChannel,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WormholeOpenOptions {
  appId: string;
  relayUrl: string;
  logger: Logger;
}

/** Channel implementations and streams the command runs against */
export interface ReceiveCommandDeps {
  openWormhole: (options: WormholeOpenOptions) => WormholeChannel;
  createTransit: TransitFactory;
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Replaces the default pino logger (tests pass a silent one) */
  createLogger?: (level: LogLevel) => Logger;
}

/** Options as parsed by commander */
export interface ReceiveCommandOptions {
  verify?: boolean;
  hideProgress?: boolean;
  acceptFile?: boolean;
  outputFile?: string;
  codeLength?: number;
  zeromode?: boolean;
  relayUrl?: string;
  transitHelper?: string;
  /** false when --no-listen was given */
  listen?: boolean;
  config?: string;
  cwd?: string;
  logLevel?: LogLevel;
  pretty?: boolean;
}

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new InvalidArgumentError(`Must be one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

/**
 * Translate commander options into config overrides. Flags that were not
 * given stay undefined so file and default values apply.
 */
export function toOverrides(code: string | undefined, opts: ReceiveCommandOptions): ReceiveOverrides {
  const overrides: ReceiveOverrides = {};
  if (code !== undefined) overrides.code = code;
  if (opts.verify) overrides.verify = true;
  if (opts.hideProgress) overrides.hideProgress = true;
  if (opts.acceptFile) overrides.acceptFile = true;
  if (opts.outputFile !== undefined) overrides.outputFile = opts.outputFile;
  if (opts.codeLength !== undefined) overrides.codeLength = opts.codeLength;
  if (opts.zeromode) overrides.zeroMode = true;
  if (opts.relayUrl !== undefined) overrides.relayUrl = opts.relayUrl;
  if (opts.transitHelper !== undefined) overrides.transitHelper = opts.transitHelper;
  if (opts.listen === false) overrides.noListen = true;
  if (opts.cwd !== undefined) overrides.cwd = opts.cwd;
  if (opts.logLevel !== undefined) overrides.logLevel = opts.logLevel;
  return overrides;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/**
 * Progress callback that rewrites a single status line.
 */
export function createProgressPrinter(out: OutputStream): ProgressCallback {
  let lastPercent = -1;
  return (received, total) => {
    const percent = total === 0 ? 100 : Math.floor((received / total) * 100);
    if (percent === lastPercent) return;
    lastPercent = percent;
    out.write(`\r${percent}% (${received}/${total} bytes)`);
    if (received >= total) {
      out.write('\n');
    }
  };
}

/** Print a non-success outcome; returns the process exit code */
export function reportOutcome(outcome: SessionOutcome, stderr: OutputStream): number {
  switch (outcome.status) {
    case 'success':
      return 0;
    case 'rejected':
      stderr.write(chalk.red('Transfer rejected: ') + outcome.reason + '\n');
      return 1;
    case 'aborted':
      stderr.write(chalk.red(`ERROR (${outcome.kind}): `) + outcome.message + '\n');
      return 1;
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

/**
 * Register `receive [code]` (alias `rx`) on a commander program.
 */
export function registerReceiveCommand(program: Command, deps: ReceiveCommandDeps): void {
  program
    .command('receive')
    .alias('rx')
    .description('Receive a text message, file or directory')
    .argument('[code]', 'code supplied by the sender; prompts when omitted')
    .option('--verify', 'display the verification string')
    .option('--hide-progress', 'suppress progress output')
    .option('--accept-file', 'accept the offer without asking')
    .option('-o, --output-file <name>', 'name to save as, instead of the sender\'s proposal')
    .option('-c, --code-length <words>', 'length of the code to enter', parsePositiveInt)
    .option('-0, --zeromode', 'use the fixed "0-" code (no real secret)')
    .option('--relay-url <url>', 'rendezvous relay to use')
    .option('--transit-helper <hint>', 'transit relay to offer, e.g. tcp:host:4001')
    .option('--no-listen', 'do not accept inbound direct connections')
    .option('--config <path>', 'YAML config file')
    .option('--cwd <dir>', 'directory to write into')
    .option('--log-level <level>', 'diagnostic log level', parseLogLevel)
    .option('--pretty', 'human-readable diagnostic logs')
    .action(async (code: string | undefined, opts: ReceiveCommandOptions) => {
      const stdout = deps.stdout ?? process.stdout;
      const stderr = deps.stderr ?? process.stderr;

      const loaded = loadConfig(opts.config);
      if (!loaded.success) {
        stderr.write(chalk.red('Invalid config file:') + '\n');
        for (const error of loaded.errors) {
          stderr.write(`  ${error.field}: ${error.message}\n`);
        }
        process.exitCode = 1;
        return;
      }

      const config = buildReceiveConfig(loaded.config, toOverrides(code, opts));
      const logger = deps.createLogger
        ? deps.createLogger(config.logLevel)
        : createLogger({ level: config.logLevel, pretty: opts.pretty });

      const wormhole = deps.openWormhole({ appId: config.appId, relayUrl: config.relayUrl, logger });
      const prompt = createReadlinePrompter(deps.stdin ?? process.stdin, stdout);
      let outcome: SessionOutcome;
      try {
        outcome = await receive(config, wormhole, {
          createTransit: deps.createTransit,
          stdout,
          stderr,
          prompt,
          logger,
          onProgress: config.hideProgress ? undefined : createProgressPrinter(stdout),
        });
      } finally {
        prompt.close();
      }

      const exitCode = reportOutcome(outcome, stderr);
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });
}

function readPackageVersion(): string {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  } catch {
    // Compiled output has no package.json next to it
    return '0.0.0';
  }
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

/**
 * Build the `codedrop` program with the receive command registered.
 *
 * @example
 * ```ts
 * await createProgram({ openWormhole, createTransit }).parseAsync(process.argv);
 * ```
 */
export function createProgram(deps: ReceiveCommandDeps): Command {
  const program = new Command();
  program
    .name('codedrop')
    .description('Receive files and messages sent with a one-time code')
    .version(readPackageVersion());
  registerReceiveCommand(program, deps);
  return program;
}
