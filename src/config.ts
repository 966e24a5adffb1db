// Runtime configuration for a chat session
// Sources, lowest precedence first: defaults, environment, command-line flags

import { homedir } from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_CHAT_FILE = '/home/chat/chat_history.log';
export const DEFAULT_DEBUG_LOG = path.join(homedir(), '.ledgerchat', 'debug.log');

// Longest delay a Node.js timer accepts, in seconds
export const MAX_POLL_INTERVAL_SECONDS = 2_147_483;

const ConfigSchema = z.object({
  chatFile: z.string().min(1).default(DEFAULT_CHAT_FILE),
  lockPath: z.string().min(1).optional(),
  pollIntervalSeconds: z.coerce.number().positive().max(MAX_POLL_INTERVAL_SECONDS).default(0.5),
  maxHistoryLines: z.coerce.number().int().positive().default(100),
  maxNicknameBytes: z.coerce.number().int().positive().default(60),
  nickname: z.string().optional(),
  debugLogPath: z.string().min(1).default(DEFAULT_DEBUG_LOG),
});

export type ChatConfig = z.infer<typeof ConfigSchema> & { lockPath: string };

type ConfigKey = keyof z.input<typeof ConfigSchema>;

/** Environment variable for each option */
export const ENV_VARS: Record<ConfigKey, string> = {
  chatFile: 'LEDGERCHAT_FILE',
  lockPath: 'LEDGERCHAT_LOCK',
  pollIntervalSeconds: 'LEDGERCHAT_POLL_INTERVAL',
  maxHistoryLines: 'LEDGERCHAT_HISTORY',
  maxNicknameBytes: 'LEDGERCHAT_NICK_BYTES',
  nickname: 'LEDGERCHAT_NAME',
  debugLogPath: 'LEDGERCHAT_DEBUG_LOG',
};

/** Command-line flag for each option */
export const FLAGS: Record<string, ConfigKey> = {
  '--file': 'chatFile',
  '--lock': 'lockPath',
  '--poll': 'pollIntervalSeconds',
  '--history': 'maxHistoryLines',
  '--nick-bytes': 'maxNicknameBytes',
  '--name': 'nickname',
  '--debug-log': 'debugLogPath',
};

/**
 * Invalid configuration, reported before the UI starts
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Parsing
// ============================================================================

function isConfigKey(key: string): key is ConfigKey {
  return key in ENV_VARS;
}

/**
 * Reads option values from the environment
 */
export function readEnv(env: NodeJS.ProcessEnv): Partial<Record<ConfigKey, string>> {
  const values: Partial<Record<ConfigKey, string>> = {};
  for (const [key, name] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '' && isConfigKey(key)) {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Reads option values from `--flag value` and `--flag=value` arguments.
 * Unknown arguments are left for the caller.
 */
export function readFlags(args: readonly string[]): Partial<Record<ConfigKey, string>> {
  const values: Partial<Record<ConfigKey, string>> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!Object.hasOwn(FLAGS, flag)) continue;
    const key = FLAGS[flag];

    if (eq !== -1) {
      values[key] = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      values[key] = args[i + 1];
      i++;
    } else {
      throw new ConfigError([`${flag} requires a value`]);
    }
  }

  return values;
}

/**
 * Builds the session configuration.
 *
 * @throws ConfigError listing every invalid option
 */
export function loadConfig(args: readonly string[] = [], env: NodeJS.ProcessEnv = {}): ChatConfig {
  // Numbers arrive as strings from both sources; the schema coerces them
  const input = { ...readEnv(env), ...readFlags(args) };
  const result = ConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }

  const config = result.data;
  return {
    ...config,
    lockPath: config.lockPath ?? `${config.chatFile}.lock`,
  };
}
