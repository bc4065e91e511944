#!/usr/bin/env node
import { TimeMcpServer } from './server.js';
import { parseArgs } from './config/ServerConfig.js';
import { VERSION } from './version.js';

// --- Main Application Logic ---
async function main() {
  try {
    // Parse command line arguments, environment and config file
    const config = parseArgs(process.argv.slice(2));

    // Create and initialize the server
    const server = new TimeMcpServer(config);
    await server.initialize();

    // Start the server with the appropriate transport
    await server.start();

  } catch (error: unknown) {
    process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : error}\n`);
    process.exit(1);
  }
}

function showHelp(): void {
  process.stdout.write(`
MCP Time Server v${VERSION}

Usage:
  mcp-time-server [command] [options]

Commands:
  start    Start the MCP server (default)
  version  Show version information
  help     Show this help message

Options:
  --transport <type>       Transport type: http (default) | stdio
  --host <string>          Host for HTTP transport (default: 0.0.0.0)
  --port <number>          Port for HTTP transport (default: 8080)
  --config <path>          JSON config file (default: ./config.json when present)
  --log-level <level>      trace | debug | info | warn | error | fatal | silent
  --log-format <format>    json (default) | console
  --debug                  Enable debug logging
  --enable-tools <list>    Comma-separated list of tools to enable (whitelist)
  --disable-tools <list>   Comma-separated list of tools to disable (blacklist)

HTTP endpoints:
  /sse                     MCP over server-sent events
  /streamable, /mcp        MCP over stateless streamable HTTP
  /health                  Health check
  /metrics                 Prometheus metrics (path and port configurable)

Environment Variables:
  CONFIG_FILE              Path to the JSON config file
  TRANSPORT                Transport type: http | stdio
  SERVER_NAME, SERVER_HOST, SERVER_PORT, SERVER_SHUTDOWN_TIMEOUT
  TIME_DEFAULT_TIMEZONE, TIME_DEFAULT_FORMAT, TIME_SUPPORTED_FORMATS
  LOG_LEVEL, LOG_FORMAT
  METRICS_ENABLED, METRICS_PORT, METRICS_PATH
  ENABLED_TOOLS, DISABLED_TOOLS

Examples:
  mcp-time-server
  mcp-time-server --port 3000 --log-format console
  TIME_DEFAULT_TIMEZONE=Europe/London mcp-time-server start
`);
}

function showVersion(): void {
  process.stdout.write(`MCP Time Server v${VERSION}\n`);
}

// --- Exports & Execution Guard ---
export { main };

// Parse CLI arguments
function parseCliArgs(): { command: string | undefined } {
  const args = process.argv.slice(2);
  let command: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--version' || arg === '-v' || arg === '--help' || arg === '-h') {
      command = arg;
      continue;
    }

    const takesValue = [
      '--transport', '--port', '--host', '--config',
      '--log-level', '--log-format', '--enable-tools', '--disable-tools'
    ];
    if (takesValue.includes(arg)) {
      i++;
      continue;
    }

    if (arg === '--debug') {
      continue;
    }

    if (!command && !arg.startsWith('--')) {
      command = arg;
      continue;
    }
  }

  return { command };
}

// --- CLI logic ---
const { command } = parseCliArgs();

switch (command) {
  case "start":
  case void 0:
    main().catch((error) => {
      process.stderr.write(`Failed to start server: ${error}\n`);
      process.exit(1);
    });
    break;
  case "version":
  case "--version":
  case "-v":
    showVersion();
    break;
  case "help":
  case "--help":
  case "-h":
    showHelp();
    break;
  default:
    process.stderr.write(`Unknown command: ${command}\n`);
    showHelp();
    process.exit(1);
}
