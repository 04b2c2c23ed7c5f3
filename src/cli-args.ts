/**
 * Command-line flag parsing for the proxy binary.
 * @packageDocumentation
 */

export interface CliOptions {
  port?: number;
  host?: string;
  configPath?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '-v' || arg === '--verbose') {
      options.verbose = true;
    } else if (arg === '--port') {
      const value = requireValue(args, i, arg);
      const port = Number(value);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new CliUsageError(`Invalid port number: ${value}`);
      }
      options.port = port;
      i++;
    } else if (arg === '--host') {
      options.host = requireValue(args, i, arg);
      i++;
    } else if (arg === '--config') {
      options.configPath = requireValue(args, i, arg);
      i++;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}
