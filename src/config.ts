import { LogLevel, isLogLevel } from './util/logger';

export interface ShellConfig {
  dataDir: string,
  logLevel: LogLevel,
  help: boolean,
}

export const USAGE = `
Usage: ndsql [options]

Options:
  --data-dir <dir>     Directory source paths resolve against
                       (env NDSQL_DATA_DIR, default: working directory)
  --log-level <level>  debug, info, warn, error or silent
                       (env NDSQL_LOG_LEVEL, default: warn)
  --help, -h           Show this help message

Example:
  ndsql --data-dir ./data
  ndsql> SELECT name, age FROM people.jsonl WHERE city = 'Oslo';
`;

function toLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) throw new Error(`Unknown log level: ${value}`);
  return value;
}

// Flags win over environment variables.
export function parseArgs(
  argv: readonly string[], env: NodeJS.ProcessEnv = {},
): ShellConfig {
  let config: ShellConfig = {
    dataDir: env.NDSQL_DATA_DIR || process.cwd(),
    logLevel: toLogLevel(env.NDSQL_LOG_LEVEL || 'warn'),
    help: false,
  };
  for (let i = 0; i < argv.length; i++) {
    let arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      config.help = true;
    } else if (arg === '--data-dir' || arg === '--log-level') {
      let value = argv[i + 1];
      if (value === undefined) throw new Error(`Missing value for ${arg}`);
      i++;
      if (arg === '--data-dir') config.dataDir = value;
      else config.logLevel = toLogLevel(value);
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }
  return config;
}
