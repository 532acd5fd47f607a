import pc from "picocolors";
import {
  DEFAULT_CERT_FILE,
  DEFAULT_KEY_FILE,
  DEFAULT_PORT,
  resolveConfig,
  type ServerOptions,
} from "./config.js";
import { isStartupError } from "./errors.js";
import { createLogger } from "./log.js";
import { startServer } from "./server/index.js";

export interface CliArgs {
  options: ServerOptions;
  help?: boolean;
  /** First flag that was not recognised or is missing its value. */
  invalid?: string;
}

const VALUE_FLAGS = new Map<string, "port" | "cert" | "key" | "root">([
  ["-p", "port"],
  ["--port", "port"],
  ["--cert", "cert"],
  ["--key", "key"],
  ["-d", "root"],
  ["--root", "root"],
]);

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { options: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const field = VALUE_FLAGS.get(arg);
    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--no-listing") {
      result.options.directoryListing = false;
    } else if (field && i + 1 < args.length) {
      result.options[field] = args[++i];
    } else {
      result.invalid = arg;
      break;
    }
  }

  return result;
}

export function usage(): string {
  return `
${pc.bold("coi-serve")} - HTTPS static file server with cross-origin isolation headers

${pc.bold("Usage:")}
  coi-serve [options]

${pc.bold("Options:")}
  -p, --port <n>     Port to listen on (default: ${DEFAULT_PORT})
      --cert <file>  PEM certificate chain (default: ${DEFAULT_CERT_FILE})
      --key <file>   PEM private key (default: ${DEFAULT_KEY_FILE})
  -d, --root <dir>   Directory to serve (default: current directory)
      --no-listing   Answer 404 instead of listing directories
  -h, --help         Show this help message
`;
}

/**
 * Parse arguments and start serving. Resolves with the exit code for runs
 * that end immediately (help, bad usage, startup failure); after a
 * successful start the open server keeps the process alive until a signal.
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const log = createLogger("coi-serve");
  const parsed = parseArgs(args);

  if (parsed.invalid !== undefined) {
    console.error(`Unknown or incomplete option: ${parsed.invalid}`);
    console.error(usage());
    return 1;
  }
  if (parsed.help) {
    console.log(usage());
    return 0;
  }

  try {
    const config = resolveConfig(parsed.options);
    const running = await startServer(config);
    log.info(`HTTPS server serving at ${pc.cyan(running.url)}`);
    log.info(`Root: ${config.root}`);

    const shutdown = () => {
      log.info("Shutting down...");
      running.close().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error("Error while closing:", error);
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    return 0;
  } catch (error) {
    if (isStartupError(error)) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }
}
