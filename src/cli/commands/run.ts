/**
 * Run command - Replay a scripted model against the built-in tools
 */

import { Command, InvalidArgumentError } from 'commander';
import { OrchestrationLoop, type RunResult } from '../../agent/orchestration-loop.js';
import { isOrchestrationError } from '../../agent/errors.js';
import {
  systemMessage,
  toolResultMessage,
  userMessage,
  type AssistantMessage,
  type Message,
} from '../../agent/messages.js';
import { ScriptedModelClient } from '../../agent/scripted-model-client.js';
import type { LoopEventListener } from '../../agent/events.js';
import type { Logger } from '../../logging/logger.js';
import { createBuiltinRegistry } from '../../tools/builtin-tools.js';
import { RegistryToolExecutor } from '../../tools/tool-executor.js';
import { loadCliContext, reportConfigErrors } from '../utils/context.js';
import { loadScript, type ScriptFile } from '../utils/script-file.js';
import { formatMessage, saveTranscript } from '../utils/transcript.js';

interface RunOptions {
  maxRounds?: number;
  timeout?: number;
  toolTimeout?: number;
  save?: boolean;
  json?: boolean;
}

export interface ScriptRunOptions {
  maxToolRounds?: number;
  timeoutMs?: number;
  toolTimeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  onEvent?: LoopEventListener;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Creates the run command
 */
export function runCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a scripted conversation through the tool loop')
    .argument('<script>', 'Path to a JSON script file')
    .option('-r, --max-rounds <n>', 'Maximum number of tool rounds', parsePositiveInt)
    .option('-t, --timeout <ms>', 'Timeout for the whole run', parsePositiveInt)
    .option('--tool-timeout <ms>', 'Timeout for each tool call', parsePositiveInt)
    .option('-s, --save', 'Save the transcript under the workspace')
    .option('--json', 'Print the conversation as JSON')
    .action(async (scriptPath: string, options: RunOptions) => {
      await runScriptFile(scriptPath, options);
    });

  return cmd;
}

/**
 * Builds a loop around the script's responses and the built-in tools, then
 * runs the script's input through it
 */
export async function runScript(script: ScriptFile, options: ScriptRunOptions = {}): Promise<RunResult> {
  const registry = createBuiltinRegistry();
  const executor = new RegistryToolExecutor(registry, { toolTimeoutMs: options.toolTimeoutMs }, options.logger);
  const loop = new OrchestrationLoop(
    new ScriptedModelClient(script.responses),
    executor,
    { maxToolRounds: options.maxToolRounds, timeoutMs: options.timeoutMs },
    options.logger,
  );

  if (options.onEvent) {
    loop.subscribe(options.onEvent);
  }

  return loop.run({
    input: userMessage(script.input),
    systemMessages: script.system.map(systemMessage),
    tools: registry.schemas(),
    signal: options.signal,
  });
}

async function runScriptFile(scriptPath: string, options: RunOptions): Promise<void> {
  const loaded = await loadScript(scriptPath);
  if (!loaded.success) {
    console.error('Invalid script:');
    for (const error of loaded.errors) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }
  const { script } = loaded;

  const ctx = await loadCliContext();
  reportConfigErrors(ctx.configErrors);

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const print = (message: Message): void => {
    if (!options.json) console.log(formatMessage(message));
  };
  for (const message of [...script.system.map(systemMessage), userMessage(script.input)]) {
    print(message);
  }

  // Tool-call turns are printed once dispatched; a turn refused by the round
  // limit never joins the conversation
  let pendingTurn: AssistantMessage | undefined;
  const onEvent: LoopEventListener = (event) => {
    switch (event.type) {
      case 'model_responded':
        pendingTurn = event.message;
        break;
      case 'tool_batch_dispatched':
        if (pendingTurn) print(pendingTurn);
        break;
      case 'tool_batch_completed':
        for (const result of event.results) print(toolResultMessage(result));
        break;
      case 'run_completed':
        print(event.result.finalMessage);
        break;
    }
  };

  try {
    const result = await runScript(script, {
      maxToolRounds: options.maxRounds ?? ctx.config.orchestrator.maxToolRounds,
      timeoutMs: options.timeout ?? ctx.config.orchestrator.timeoutMs,
      toolTimeoutMs: options.toolTimeout ?? ctx.config.tools.timeoutMs,
      signal: controller.signal,
      logger: ctx.logger,
      onEvent,
    });

    if (options.json) {
      console.log(JSON.stringify({ runId: result.runId, toolRounds: result.toolRounds, conversation: result.conversation }, null, 2));
    }

    if (options.save) {
      const path = ctx.workspace.transcriptPath(result.runId);
      await saveTranscript(path, result.runId, result.conversation);
      console.error(`Transcript saved to ${path}`);
    }
  } catch (error) {
    if (!isOrchestrationError(error)) {
      throw error;
    }

    if (options.json) {
      console.log(JSON.stringify({
        runId: error.runId,
        error: { kind: error.kind, phase: error.phase, message: error.message },
        toolRounds: error.toolRounds,
        conversation: error.conversation,
      }, null, 2));
    }

    if (options.save) {
      await saveTranscript(ctx.workspace.transcriptPath(error.runId), error.runId, error.conversation);
    }

    console.error(`Run failed (${error.kind} during ${error.phase}): ${error.message}`);
    process.exit(1);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
