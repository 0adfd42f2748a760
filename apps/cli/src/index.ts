#!/usr/bin/env node

/**
 * narrator -- put a line-oriented text engine on the network.
 *
 * Entry point: parses process.argv manually and dispatches to the
 * appropriate command module.
 *
 * Commands:
 *   serve       Start the gateway and host the engine
 *   help        Show usage
 *   version     Show version
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { AMBER, RESET, BOLD, DIM, GREEN, RED } from './ui.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Walk up from dist/ or src/ to find package.json.
  for (const p of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, 'utf8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      // Try next path.
    }
  }
  return '0.1.0';
}

// ---------------------------------------------------------------------------
// Help text
// ---------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
  ${AMBER}${BOLD}narrator${RESET} ${DIM}v${getVersion()}${RESET} -- text engine to WebSocket bridge

  ${BOLD}Usage${RESET}
    ${GREEN}narrator serve${RESET} ${DIM}[options] [-- <engine command> [args...]]${RESET}

  ${BOLD}Commands${RESET}
    ${GREEN}serve${RESET}        Start the gateway and host the engine
    ${GREEN}help${RESET}         Show this help
    ${GREEN}version${RESET}      Show version

  ${BOLD}Serve Options${RESET}
    ${GREEN}-p, --port${RESET} N            Listen port (default 8357, or $PORT)
    ${GREEN}--host${RESET} H                Bind address (default 127.0.0.1)

  ${BOLD}Examples${RESET}
    ${DIM}$${RESET} narrator serve -- ./dungeon --seed 7     ${DIM}# Host an engine binary${RESET}
    ${DIM}$${RESET} PORT=9000 narrator serve                 ${DIM}# Engine from ~/.narrator/config.json${RESET}
`);
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseArgs(argv: string[]): { command: string; rest: string[] } {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args.
  const args = argv.slice(2);

  // Global flags only count before `--`; anything after belongs to the engine.
  const sep = args.indexOf('--');
  const own = sep === -1 ? args : args.slice(0, sep);
  if (own.includes('--help') || own.includes('-h')) {
    return { command: 'help', rest: [] };
  }
  if (own.includes('--version') || own.includes('-V')) {
    return { command: 'version', rest: [] };
  }

  if (args.length === 0) {
    return { command: 'help', rest: [] };
  }

  return { command: args[0] ?? 'help', rest: args.slice(1) };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { command, rest } = parseArgs(process.argv);

  switch (command) {
    case 'serve': {
      const { serve } = await import('./commands/serve.js');
      await serve(rest);
      break;
    }

    case 'version': {
      console.log(`narrator v${getVersion()}`);
      break;
    }

    case 'help': {
      printHelp();
      break;
    }

    default: {
      console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
      console.error(`  ${DIM}Run ${AMBER}narrator --help${DIM} for available commands.${RESET}\n`);
      process.exitCode = 1;
      break;
    }
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`\n  ${RED}${BOLD}Fatal error:${RESET} ${message}`);
  if (err instanceof Error && err.stack) {
    const stackLines = err.stack.split('\n').slice(1).map((l) => `  ${l.trim()}`).join('\n');
    console.error(`${DIM}${stackLines}${RESET}`);
  }
  process.exitCode = 1;
});
