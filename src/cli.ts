#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';

import type { Runtime } from './runtime.js';
import type { LogFormat, LogSink } from './types.js';
import type { CommanderError } from 'commander';

import { describeFailure } from './chat-command-router.js';
import { loadConfiguration, platformPrompt } from './config.js';
import { seedTranscript } from './conversation-loop.js';
import { makeTTYLogCallbacks } from './log-sink-tty.js';
import { DEFAULT_SYSTEM_PROMPT, NEWS_SYSTEM_PROMPT, NEWS_USER_PROMPT } from './prompts.js';
import { createRuntime } from './runtime.js';
import { updateAiSdkWarningPreference } from './setup-ai-sdk.js';
import { installHttpDispatcher } from './setup-undici.js';
import { errorMessage, setWarningSink } from './utils.js';
import { VERSION } from './version.js';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  trace?: boolean;
  logFormat?: LogFormat;
}

// Single exit path so every termination leaves one reasoned line on stderr
let hasExited = false;
function exitWith(code: number, reason: string, tag = 'EXIT-CLI'): never {
  try {
    process.stderr.write(`[${code === 0 ? 'VRB' : 'ERR'}] tool-engine ${tag}: ${reason} (exit=${String(code)})\n`);
  } catch { /* stderr gone */ }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const defaultWarningSink = (message: string): void => {
  const prefix = '[warn] ';
  const colored = process.stderr.isTTY ? `\x1b[33m${prefix}${message}\x1b[0m` : `${prefix}${message}`;
  try { process.stderr.write(`${colored}\n`); } catch { /* stderr gone */ }
};

setWarningSink(defaultWarningSink);
installHttpDispatcher();

const stdout = (s: string): void => { process.stdout.write(s); };

const parsePositiveInt = (value: string): number => {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('expected a positive integer');
  return n;
};

const program = new Command();
program
  .name('tool-engine')
  .description('Conversation engine that lets a language model call MCP tool servers')
  .version(VERSION)
  .option('-c, --config <file>', 'configuration file (.json or .yaml)')
  .option('--verbose', 'log connection and iteration details')
  .option('--trace', 'log transport and discovery traffic')
  .addOption(new Option('--log-format <format>', 'log output format').choices(['logfmt', 'json', 'console']));

program.exitOverride((err: CommanderError) => {
  if (err.exitCode === 0) exitWith(0, err.message, 'EXIT-COMMANDER');
  exitWith(err.exitCode, `commander: ${err.message}`, 'EXIT-COMMANDER');
});

function makeLogSink(opts: GlobalOptions, command: string, verboseFromConfig: boolean, configFormat?: LogFormat): LogSink {
  const verbose = opts.verbose === true || opts.trace === true || verboseFromConfig;
  updateAiSdkWarningPreference(opts.trace === true);
  return makeTTYLogCallbacks({
    verbose,
    trace: opts.trace === true,
    explicitFormat: opts.logFormat ?? configFormat,
    labels: { command },
  }).onLog;
}

async function withRuntime(
  command: string,
  work: (rt: Runtime, onLog: LogSink) => Promise<number>,
  opts: { connect?: boolean } = {}
): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  let runtime: Runtime;
  let onLog: LogSink;
  try {
    const config = loadConfiguration(globals.config);
    onLog = makeLogSink(globals, command, config.logging.verbose, config.logging.format);
    runtime = createRuntime(config, onLog, { write: stdout });
  } catch (e) {
    exitWith(4, errorMessage(e), 'EXIT-CONFIG');
  }

  const handleSignal = (signal: NodeJS.Signals): void => {
    if (runtime.shutdown.isStopping()) exitWith(1, `forced exit after ${signal}`, 'EXIT-FORCE');
    onLog({ timestamp: Date.now(), severity: 'WRN', type: 'engine', remoteIdentifier: 'engine:cli', fatal: false, message: `received ${signal}, shutting down` });
    void runtime.shutdown.shutdown({ onLog }).then(
      () => { exitWith(130, `stopped by ${signal}`, 'EXIT-SIGNAL'); },
      (err: unknown) => { exitWith(1, `shutdown failed: ${errorMessage(err)}`, 'EXIT-SIGNAL'); }
    );
  };
  process.once('SIGINT', handleSignal);
  process.once('SIGTERM', handleSignal);

  let code: number;
  try {
    if (opts.connect !== false) {
      const summary = await runtime.registry.connectAll(runtime.config.mcpServers);
      Object.entries(summary.failed).forEach(([name, message]) => {
        process.stderr.write(`[warn] provider '${name}' unavailable: ${message}\n`);
      });
    }
    code = await work(runtime, onLog);
  } catch (e) {
    await runtime.shutdown.shutdown({ onLog });
    exitWith(1, errorMessage(e), 'EXIT-RUN');
  }
  await runtime.shutdown.shutdown({ onLog });
  exitWith(code, 'done', 'EXIT-OK');
}

program
  .command('ask')
  .description('run one conversation and print the final answer')
  .argument('<message...>', 'user message')
  .option('-s, --system <prompt>', 'system prompt (defaults to ai.defaultPrompt)')
  .option('-p, --platform <name>', 'apply this platform\'s formatting instruction')
  .option('-n, --max-iterations <n>', 'iteration bound', parsePositiveInt)
  .action(async (message: string[], cmdOpts: { system?: string; platform?: string; maxIterations?: number }) => {
    await withRuntime('ask', async (rt) => {
      const systemPrompt = cmdOpts.system ?? rt.config.ai.defaultPrompt ?? DEFAULT_SYSTEM_PROMPT;
      try {
        const result = await rt.engine.run(seedTranscript(systemPrompt, message.join(' ')), {
          modelConfig: rt.config.ai,
          maxIterations: cmdOpts.maxIterations,
          formattingInstruction: cmdOpts.platform !== undefined ? platformPrompt(rt.config, cmdOpts.platform) : undefined,
          label: 'cli',
        });
        stdout(`${result.text}\n`);
        return 0;
      } catch (e) {
        process.stderr.write(`${describeFailure(e, 'Error generating reply')}\n`);
        return 2;
      }
    });
  });

program
  .command('chat')
  .description('route one chat message through the command router (allow-list, /commands, personas)')
  .argument('<message...>', 'message text, e.g. "/news" or "/s weather in Paris"')
  .option('-p, --platform <name>', 'platform the message comes from', 'console')
  .requiredOption('-u, --user <id>', 'sender id')
  .action(async (message: string[], cmdOpts: { platform: string; user: string }) => {
    await withRuntime('chat', async (rt) => {
      const reply = await rt.router.handle({ platform: cmdOpts.platform, userId: cmdOpts.user, text: message.join(' ') });
      if (reply === undefined) {
        process.stderr.write('message ignored\n');
        return 3;
      }
      stdout(`${reply.text}\n`);
      return reply.kind === 'error' ? 2 : 0;
    }, { connect: !isLocalCommand(message) });
  });

program
  .command('news')
  .description('summarise today\'s news using the configured tools')
  .action(async () => {
    await withRuntime('news', async (rt) => {
      try {
        const result = await rt.engine.run(seedTranscript(NEWS_SYSTEM_PROMPT, NEWS_USER_PROMPT), { modelConfig: rt.config.ai, label: 'news' });
        stdout(`${result.text}\n`);
        return 0;
      } catch (e) {
        process.stderr.write(`${describeFailure(e, 'Error fetching news')}\n`);
        return 2;
      }
    });
  });

program
  .command('tools')
  .description('connect every provider and list the merged tool catalog')
  .option('--json', 'print the catalog as JSON')
  .action(async (cmdOpts: { json?: boolean }) => {
    await withRuntime('tools', (rt) => {
      const tools = rt.registry.listTools();
      if (cmdOpts.json === true) {
        stdout(`${JSON.stringify(tools, null, 2)}\n`);
      } else {
        tools.forEach((t) => { stdout(`${t.name}\t${t.description.split('\n')[0] ?? ''}\n`); });
        stdout(`${String(tools.length)} tools\n`);
      }
      return Promise.resolve(Object.keys(rt.registry.connectFailures()).length > 0 ? 3 : 0);
    });
  });

program
  .command('health')
  .description('connect every provider and report its health')
  .action(async () => {
    await withRuntime('health', async (rt) => {
      const report = await rt.registry.healthCheck();
      const names = Object.keys(report).sort();
      names.forEach((name) => { stdout(`${name}: ${report[name] === true ? 'healthy' : 'unhealthy'}\n`); });
      return names.every((name) => report[name] === true) ? 0 : 3;
    });
  });

program
  .command('broadcast')
  .description('fire the scheduled broadcast once, now')
  .action(async () => {
    await withRuntime('broadcast', async (rt) => {
      if (rt.broadcast === undefined) {
        process.stderr.write('no broadcast section in configuration\n');
        return 4;
      }
      const outcome = await rt.broadcast.runOnce();
      Object.entries(outcome.failed).forEach(([target, message]) => { process.stderr.write(`${target}: ${message}\n`); });
      return Object.keys(outcome.failed).length > 0 ? 2 : 0;
    });
  });

program
  .command('serve')
  .description('run the daily broadcast driver until interrupted')
  .action(async () => {
    await withRuntime('serve', async (rt, onLog) => {
      const driver = rt.broadcast;
      if (driver === undefined || rt.config.broadcast?.enabled !== true) {
        process.stderr.write('broadcast is not enabled in configuration\n');
        return 4;
      }
      onLog({ timestamp: Date.now(), severity: 'VRB', type: 'broadcast', remoteIdentifier: 'engine:cli', fatal: false, message: `serving ${String(rt.registry.listTools().length)} tools` });
      await driver.start();
      return 0;
    });
  });

// Commands that never need a tool catalog
function isLocalCommand(message: string[]): boolean {
  const first = (message[0] ?? '').toLowerCase();
  return ['/set_ai', '/reset_ai', '/help', '/start', '/ping'].includes(first);
}

program.parseAsync(process.argv).catch((e: unknown) => {
  exitWith(1, errorMessage(e), 'EXIT-CLI');
});
