#!/usr/bin/env node

// Main entry point for ledgerchat
// Bootstraps the shared log, asks for a nickname and runs one chat session

import fs from 'node:fs';
import { ConfigError, type ChatConfig, DEFAULT_CHAT_FILE, loadConfig } from './config.js';
import { createDebugLogger, type DebugLogger, startDebugLog } from './debug-log.js';
import { createLogWatcher } from './log-watcher.js';
import { resolveNickname } from './nickname.js';
import { runChatSession } from './session.js';
import { createLogWriter, ensureSharedLog, SharedLogPermissionError, verifyLockAccess } from './shared-log.js';
import { createDisplaySurface } from './tui/display-surface.js';
import { promptNickname } from './tui/nickname-prompt.js';
import { cleanupTerminal } from './tui/terminal-cleanup.js';
import { createTerminalScreen, type TerminalScreen } from './tui/terminal.js';

/**
 * Get package.json version
 */
function getVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
ledgerchat - Terminal chat over a shared log file

  Everyone who runs ledgerchat against the same file is in the same
  room. There is no server: messages are appended to the file under
  an exclusive lock and each client polls it for changes.

USAGE
  ledgerchat [options]

OPTIONS
  --file <path>        Shared chat log (default: ${DEFAULT_CHAT_FILE})
  --lock <path>        Lock location shared by all clients (default: <file>.lock)
  --poll <seconds>     Poll interval (default: 0.5)
  --history <lines>    Lines of history kept on screen (default: 100)
  --nick-bytes <n>     Maximum nickname length in bytes (default: 60)
  --name <nickname>    Skip the nickname prompt
  --debug-log <path>   Diagnostics file (default: ~/.ledgerchat/debug.log)
  -h, --help           Show this help message
  -v, --version        Show version number

  Every option can also be set through the environment, e.g.
  LEDGERCHAT_FILE, LEDGERCHAT_POLL_INTERVAL, LEDGERCHAT_HISTORY.

KEYS
  Enter      Send the current line
  Backspace  Delete the last character
  Ctrl+C     Leave the room
`);
}

/**
 * Runs the chat screen until the user interrupts
 */
async function runInteractive(config: ChatConfig, debugLog: DebugLogger): Promise<void> {
  let screen: TerminalScreen | null = null;

  // SIGINT arrives as CTRL_C through terminal-kit; SIGTERM needs its own exit
  process.on('SIGTERM', () => {
    if (screen) screen.stop();
    process.exit(0);
  });

  try {
    const author =
      config.nickname !== undefined
        ? resolveNickname(config.nickname, config.maxNicknameBytes)
        : await promptNickname(config.maxNicknameBytes, debugLog);
    if (author === null) {
      // Ctrl+C at the prompt: leave without joining
      return;
    }

    screen = createTerminalScreen();
    screen.start();
    screen.clear();

    const surface = createDisplaySurface(screen, debugLog);
    const writer = createLogWriter(config.chatFile, { lockPath: config.lockPath, debugLog });
    const watcher = createLogWatcher({
      filePath: config.chatFile,
      maxLines: config.maxHistoryLines,
      pollIntervalMs: config.pollIntervalSeconds * 1000,
      onChange: (lines) => surface.repaintHistory(lines),
      debugLog,
    });

    debugLog({ type: 'info', source: 'session', text: `Joined ${config.chatFile} as ${author}` });
    await runChatSession({ author, writer, watcher, surface, reader: screen.reader });
  } finally {
    if (screen) {
      screen.stop();
    } else {
      cleanupTerminal();
    }
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    process.exit(0);
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(getVersion());
    process.exit(0);
  }

  try {
    const config = loadConfig(args, process.env);

    // The log and its lock must be usable before the UI takes over the terminal
    ensureSharedLog(config.chatFile);
    await verifyLockAccess(config.chatFile, config.lockPath);

    startDebugLog(config.debugLogPath);
    const debugLog = createDebugLogger(config.debugLogPath);

    await runInteractive(config, debugLog);
    process.exit(0);
  } catch (error) {
    if (error instanceof SharedLogPermissionError) {
      process.stderr.write(`Error: ${error.message}\n${error.hint}\n`);
      process.exit(1);
    }
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\nRun ledgerchat --help for usage.\n`);
      process.exit(2);
    }

    process.stderr.write(`System error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
}

// Self-executing entry point
void main();
