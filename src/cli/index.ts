/**
 * CLI mode for agentmesh.
 *
 * `--prompt <text>` processes one message and exits; `chat` (the default)
 * reads messages line by line until `/quit` or end of input.
 */

import { createInterface } from 'readline';
import { createAgentMesh, type AgentMesh, type AgentMeshOptions } from '../system.js';
import { loadConfig, toLoggerConfig, CLI, type LoadConfigOptions, type LoadedConfig } from '../config/index.js';
import { createLogger, initLogger } from '../utils/logger.js';
import { handleError, ErrorCategory } from '../utils/error-handler.js';

const logger = createLogger('CLI');

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

/**
 * Display colored text.
 */
export function color(text: string, colorName: keyof typeof colors): string {
  return `${colors[colorName]}${text}${colors.reset}`;
}

export type CliCommand = 'chat' | 'prompt' | 'help';

export interface CliArguments {
  command: CliCommand;
  prompt?: string;
  userId: string;
  configPath?: string;
}

/**
 * Parse command line arguments.
 *
 * @throws Error for unknown commands, unknown options and options missing a value
 */
export function parseCliArgs(args: string[]): CliArguments {
  const parsed: CliArguments = { command: 'chat', userId: CLI.DEFAULT_USER_ID };

  const valueOf = (index: number, option: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Option ${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { ...parsed, command: 'help' };
      case '--prompt':
        parsed.command = 'prompt';
        parsed.prompt = valueOf(i, arg);
        i++;
        break;
      case '--user':
        parsed.userId = valueOf(i, arg);
        i++;
        break;
      case '--config':
        parsed.configPath = valueOf(i, arg);
        i++;
        break;
      case 'chat':
        break;
      default:
        throw new Error(arg.startsWith('-') ? `Unknown option "${arg}"` : `Unknown command "${arg}"`);
    }
  }

  return parsed;
}

export function formatHelp(version: string): string {
  return [
    '',
    color('  agentmesh - capability-routed multi-agent sessions', 'bold'),
    `  Version: ${version}`,
    '',
    color('Usage:', 'bold'),
    `  agentmesh [chat]                 Interactive conversation (default)`,
    `  agentmesh --prompt ${color('"<text>"', 'yellow')}      Process one message and exit`,
    '',
    color('Options:', 'bold'),
    `  --user <id>                      User id for the session (default: ${CLI.DEFAULT_USER_ID})`,
    '  --config <path>                  Configuration file (default: search for agentmesh.config.yaml)',
    '  --help, -h                       Show this help',
    '',
    color('Chat commands:', 'bold'),
    '  /history                         Show recent conversation history',
    '  /stats                           Show session and agent statistics',
    '  /agents                          List agents in the directory',
    '  /context key=value               Add a fact to the conversation context',
    '  /quit                            Leave the chat',
    '',
  ].join('\n');
}

export interface ChatReply {
  output: string;
  quit?: boolean;
}

function describeAgents(mesh: AgentMesh): string {
  const records = mesh.directory.list();
  if (records.length === 0) {
    return 'No agents registered';
  }
  return records
    .map((record) => `${record.id} (${record.name}): ${record.capabilities.join(', ')}`)
    .join('\n');
}

/**
 * Handle one line of chat input: a slash command or a message.
 */
export async function handleChatLine(mesh: AgentMesh, userId: string, line: string): Promise<ChatReply> {
  const input = line.trim();

  if (!input.startsWith('/')) {
    return { output: await mesh.sessions.process(userId, input) };
  }

  const [command] = input.split(/\s+/, 1);
  const rest = input.slice(command.length).trim();

  switch (command) {
    case '/quit':
    case '/exit':
      return { output: 'Goodbye!', quit: true };

    case '/history':
      return { output: mesh.sessions.formatHistory(userId, CLI.HISTORY_LIMIT) };

    case '/stats':
      return { output: JSON.stringify(mesh.sessions.stats(), null, 2) };

    case '/agents':
      return { output: describeAgents(mesh) };

    case '/context': {
      const separator = rest.indexOf('=');
      if (separator <= 0) {
        return { output: 'Usage: /context key=value' };
      }
      const key = rest.slice(0, separator).trim();
      const value = rest.slice(separator + 1).trim();
      if (!mesh.sessions.getState(userId)) {
        return { output: 'Send a message before setting context' };
      }
      mesh.sessions.updateContext(userId, { [key]: value });
      return { output: `Context updated: ${key}=${value}` };
    }

    default:
      return { output: `Unknown command: ${command}` };
  }
}

export interface CliStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Interactive loop over `input` until `/quit` or end of input.
 */
export async function runChat(mesh: AgentMesh, userId: string, streams: CliStreams): Promise<void> {
  const rl = createInterface({ input: streams.input, terminal: false });
  const write = (text: string): void => {
    streams.output.write(`${text}\n`);
  };

  write(color(`Chatting as ${userId}. Type /quit to leave.`, 'dim'));

  try {
    for await (const line of rl) {
      if (!line.trim()) {
        continue;
      }
      const reply = await handleChatLine(mesh, userId, line);
      write(reply.output);
      if (reply.quit) {
        break;
      }
    }
  } finally {
    rl.close();
  }
}

export interface RunCliOptions extends Partial<CliStreams> {
  /** Version shown in --help */
  version?: string;
  /** Error stream (default: stderr) */
  errorOutput?: NodeJS.WritableStream;
  /** Replaceable configuration loader */
  loadConfig?: (options: LoadConfigOptions) => LoadedConfig;
  /** Passed to createAgentMesh */
  meshOptions?: AgentMeshOptions;
}

/**
 * Run the CLI.
 *
 * @returns Process exit code
 */
export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const reportError = (message: string): void => {
    errorOutput.write(`${color(`Error: ${message}`, 'red')}\n`);
  };

  let cliArgs: CliArguments;
  try {
    cliArgs = parseCliArgs(args);
  } catch (error) {
    handleError(error, {
      category: ErrorCategory.VALIDATION,
      userMessage: error instanceof Error ? error.message : String(error),
    }, {
      customLogger: logger,
      userNotifier: reportError,
    });
    output.write(formatHelp(options.version ?? 'unknown'));
    return 1;
  }

  if (cliArgs.command === 'help') {
    output.write(formatHelp(options.version ?? 'unknown'));
    return 0;
  }

  let mesh: AgentMesh;
  try {
    const { config, source } = (options.loadConfig ?? loadConfig)({ path: cliArgs.configPath });
    await initLogger(toLoggerConfig(config.logging));
    logger.info({ source: source ?? 'defaults', command: cliArgs.command }, 'Configuration loaded');
    mesh = createAgentMesh(config, options.meshOptions);
  } catch (error) {
    handleError(error, {
      category: ErrorCategory.CONFIGURATION,
      userMessage: `Configuration error: ${error instanceof Error ? error.message : String(error)}`,
    }, {
      customLogger: logger,
      userNotifier: reportError,
    });
    return 1;
  }

  try {
    await mesh.start();
    if (cliArgs.command === 'prompt') {
      const reply = await mesh.sessions.process(cliArgs.userId, cliArgs.prompt ?? '');
      output.write(`${reply}\n`);
    } else {
      await runChat(mesh, cliArgs.userId, { input: options.input ?? process.stdin, output });
    }
    return 0;
  } catch (error) {
    handleError(error, { category: ErrorCategory.UNKNOWN }, {
      customLogger: logger,
      userNotifier: reportError,
    });
    return 1;
  } finally {
    await mesh.stop();
  }
}
