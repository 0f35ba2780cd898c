import * as readline from 'readline';
import { Command, CommanderError } from 'commander';
import { loadConfig } from './config';
import { describeError, TreeViewError } from './errors';
import { FileSource, FileTreeHost, TextPane } from './fileHost';
import { locateLine } from './navigationBridge';
import { OutputChannel } from './outputChannel';
import { TreeViewDebugger } from './treeDebugger';
import { formatDisplayLine } from './treeRenderer';
import { ViewSession } from './viewSession';

export const USAGE = 'Usage: parse-tree-inspector <file.json> [--navigation] [--highlight] [--config <path>] [--no-watch]';

const COMMANDS = [
  '<n>            jump to the source span of display line n',
  'at <offset>    show the display line covering a source offset',
  'render         print the tree view again',
  'help           show this list',
  'quit           close the tree view and exit'
];

export interface CliArguments {
  file: string;
  configPath?: string;
  navigation?: boolean;
  highlight?: boolean;
  watch: boolean;
}

export type CommandOutcome = 'continue' | 'quit';

export interface CommandContext {
  host: FileTreeHost;
  debugger: TreeViewDebugger<FileSource, TextPane>;
  session: ViewSession<FileSource, TextPane>;
  write(line: string): void;
}

export function parseCliArguments(argv: string[]): CliArguments | 'help' {
  const program = new Command()
    .name('parse-tree-inspector')
    .description('Mirror the parse tree of a JSON/JSONC file and jump from tree lines to source spans.')
    .argument('<file>', 'JSON or JSONC file to inspect')
    .option('--navigation', 'render source spans and allow jumping to them')
    .option('--highlight', 'underline the focused span when navigating')
    .option('--config <path>', 'read options from this configuration file')
    .option('--no-watch', 'ignore changes made to the file on disk')
    .allowExcessArguments(false)
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    .exitOverride();

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (error.code === 'commander.helpDisplayed') {
      return 'help';
    }
    throw new Error(`${error.message.replace(/^error: /, '')}\n${USAGE}`);
  }

  const options = program.opts<{ navigation?: boolean; highlight?: boolean; config?: string; watch: boolean }>();
  return {
    file: program.args[0],
    configPath: options.config,
    navigation: options.navigation,
    highlight: options.highlight,
    watch: options.watch
  };
}

export function runCommand(context: CommandContext, input: string): CommandOutcome {
  const command = input.trim();
  if (!command) {
    return 'continue';
  }

  if (command === 'q' || command === 'quit') {
    if (context.session.state === 'active') {
      context.debugger.disableDebugging(context.session);
    }
    return 'quit';
  }

  if (command === 'help') {
    COMMANDS.forEach((line) => context.write(line));
    return 'continue';
  }

  if (command === 'render') {
    const view = context.session.view;
    if (view) {
      context.host.printPane(view);
    } else {
      context.write('The tree view is closed.');
    }
    return 'continue';
  }

  const at = /^at\s+(\d+)$/.exec(command);
  if (at) {
    describeOffset(context, Number(at[1]));
    return 'continue';
  }

  if (/^\d+$/.test(command)) {
    try {
      context.debugger.navigate(context.session, Number(command));
    } catch (error) {
      if (!(error instanceof TreeViewError)) {
        throw error;
      }
      context.write(`Error: ${error.message}`);
    }
    return 'continue';
  }

  context.write(`Unknown command "${command}". Type "help" for a list of commands.`);
  return 'continue';
}

function describeOffset(context: CommandContext, offset: number) {
  if (!context.session.options.enableNavigation) {
    context.write('Spans are not rendered; restart with --navigation to locate offsets.');
    return;
  }
  const index = locateLine(context.session, offset);
  if (index === undefined) {
    context.write(`No rendered node covers offset ${offset}.`);
    return;
  }
  context.write(`${index} | ${formatDisplayLine(context.session.lines[index])}`);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArguments | 'help';
  try {
    args = parseCliArguments(argv);
  } catch (error) {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    return 1;
  }
  if (args === 'help') {
    process.stdout.write(`${USAGE}\n\nCommands:\n${COMMANDS.map((line) => `  ${line}`).join('\n')}\n`);
    return 0;
  }

  const logger = new OutputChannel('Parse Tree Inspector');
  let context: CommandContext;
  try {
    context = startInspector(args, logger);
  } catch (error) {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    return 1;
  }
  const { host, session } = context;

  return new Promise<number>((resolve) => {
    let exitCode = 0;
    const rl = readline.createInterface({ input: process.stdin, terminal: false });
    const destroyed = host.onDestroy(session.source, () => {
      context.write(`${session.title} is no longer available.`);
      rl.close();
    });

    rl.on('line', (input) => {
      try {
        if (runCommand(context, input) === 'quit') {
          rl.close();
        }
      } catch (error) {
        process.stderr.write(`Error: ${describeError(error)}\n`);
        exitCode = 1;
        rl.close();
      }
    });
    rl.on('SIGINT', () => rl.close());
    rl.on('close', () => {
      destroyed.dispose();
      context.debugger.dispose();
      host.close(session.source);
      resolve(exitCode);
    });
  });
}

function startInspector(args: CliArguments, logger: OutputChannel): CommandContext {
  const config = loadConfig({
    configPath: args.configPath,
    overrides: { enableNavigation: args.navigation, highlightOnNavigate: args.highlight }
  });
  if (config.source) {
    logger.log(`Loaded configuration from ${config.source}.`);
  }

  const host = new FileTreeHost({ logger, watch: args.watch });
  const source = host.open(args.file);
  const treeDebugger = new TreeViewDebugger(host, logger);
  try {
    return {
      host,
      debugger: treeDebugger,
      session: treeDebugger.enableDebugging(source, config.options),
      write: (line) => process.stdout.write(`${line}\n`)
    };
  } catch (error) {
    host.close(source);
    throw error;
  }
}
