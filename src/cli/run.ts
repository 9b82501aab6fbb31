import path from 'node:path';

import type { Command } from 'commander';

import type { AgentHistory, FileConfig } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { launchSession } from '../browser/runner.js';
import { runAgent } from '../core/agent.js';
import { isSuccessful } from '../core/history.js';
import { runReplayScript } from '../core/replay.js';
import { runReplayInSubprocess } from '../core/subprocess.js';
import {
  generateReplayScript,
  readReplayScript,
  writeReplayScript,
} from '../core/scriptGenerator.js';
import {
  describeOutcome,
  formatHistorySummary,
  generateJSON,
  serializeJSON,
} from '../report/reporter.js';
import { DEFAULT_CONFIG_PATH } from '../config/defaults.js';
import { loadConfigFileOrDefaults } from '../config/loader.js';
import { loadSensitiveData } from '../utils/secrets.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_USAGE = 4;

// ── Option shapes ────────────────────────────────────────────

interface RunOptions {
  config: string;
  task?: string;
  url?: string;
  maxSteps?: string;
  maxActions?: string;
  headless?: true;
  vision?: true;
  script?: string;
  conversation?: string;
  replay: boolean;
  verbose?: true;
  json?: true;
}

interface ReplayOptions {
  headless?: true;
}

// ── Config merging ───────────────────────────────────────────

function parsePositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** CLI flags take precedence over the config file. */
export function mergeRunOptions(file: FileConfig, opts: RunOptions): FileConfig {
  return {
    ...file,
    task: opts.task ?? file.task,
    startUrl: opts.url ?? file.startUrl,
    maxSteps: parsePositiveInt(opts.maxSteps, '--max-steps') ?? file.maxSteps,
    maxActionsPerStep:
      parsePositiveInt(opts.maxActions, '--max-actions') ?? file.maxActionsPerStep,
    headless: opts.headless ?? file.headless,
    useVision: opts.vision ?? file.useVision,
    scriptPath: opts.script ?? file.scriptPath,
    conversationPath: opts.conversation ?? file.conversationPath,
  };
}

function buildClient(config: FileConfig): LLMClient {
  // Config file provider/model override the environment.
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (config.provider) env['LLM_PROVIDER'] = config.provider;
  if (config.model) env['LLM_MODEL'] = config.model;
  return createLLMClient(loadLLMConfig(env));
}

// ── Agent phase ──────────────────────────────────────────────

async function runAgentPhase(
  client: LLMClient,
  config: FileConfig,
  sensitiveData: Record<string, string>,
): Promise<AgentHistory> {
  const session = await launchSession({ headless: config.headless });
  try {
    return await runAgent(client, session, {
      task: config.task,
      startUrl: config.startUrl,
      allowedDomains: config.allowedDomains,
      maxSteps: config.maxSteps,
      maxActionsPerStep: config.maxActionsPerStep,
      useVision: config.useVision,
      conversationPath: config.conversationPath,
      sensitiveData,
    });
  } finally {
    await session.close().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Could not close the agent's browser: ${message}`);
    });
    log.info("Agent's browser closed.");
  }
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Let the agent perform the task, save a replay script, then replay it')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--task <text>', 'Task for the agent')
    .option('--url <url>', 'Page to open before the agent starts')
    .option('--max-steps <n>', 'Maximum agent steps')
    .option('--max-actions <n>', 'Maximum actions per agent step')
    .option('--headless', 'Run browsers headless')
    .option('--vision', 'Send screenshots to the model')
    .option('--script <path>', 'Where to write the replay script')
    .option('--conversation <path>', 'Where to append the model conversation')
    .option('--no-replay', 'Do not replay the generated script')
    .option('--verbose', 'Print the full agent history')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: RunOptions) => {
      let config: FileConfig;
      let client: LLMClient;
      try {
        config = mergeRunOptions(await loadConfigFileOrDefaults(opts.config), opts);
        client = buildClient(config);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Config error: ${message}\n`);
        process.exitCode = EXIT_USAGE;
        return;
      }

      try {
        const sensitiveData = loadSensitiveData(config.sensitiveData);
        const history = await runAgentPhase(client, config, sensitiveData);

        log.section('Agent finished');
        log.info(describeOutcome(history));
        if (opts.verbose) {
          for (const line of formatHistorySummary(history)) log.detail(line);
        }

        let scriptPath: string | null = null;
        let replayExitCode: number | null = null;

        if (history.steps.length > 0) {
          scriptPath = path.resolve(config.scriptPath);
          const script = generateReplayScript(history, {
            sensitiveDataKeys: config.sensitiveData,
          });
          await writeReplayScript(scriptPath, script);
          log.info(`Replay script with ${String(script.actions.length)} action(s) saved to ${scriptPath}`);
        } else {
          log.warn('No steps recorded — replay script not generated');
        }

        if (opts.replay && scriptPath !== null) {
          log.section('Replay script execution');
          replayExitCode = await runReplayInSubprocess(scriptPath, {
            headless: config.headless,
            // Keep stdout clean for the JSON document.
            ...(opts.json ? { sink: (line: string) => process.stderr.write(line + '\n') } : {}),
          });
          if (replayExitCode === EXIT_OK) {
            log.success('Replay script executed successfully!');
          } else {
            log.warn(`Replay script finished with exit code ${String(replayExitCode)}.`);
          }
        }

        // A replay decides the outcome; otherwise the agent's own verdict does.
        const succeeded =
          replayExitCode !== null ? replayExitCode === EXIT_OK : isSuccessful(history) === true;
        const exitCode = succeeded ? EXIT_OK : EXIT_FAILED;

        if (opts.json) {
          const json = generateJSON(history, { scriptPath, replayExitCode, exitCode });
          process.stdout.write(serializeJSON(json) + '\n');
        }

        process.exitCode = exitCode;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = EXIT_FAILED;
      }
    });
}

// ── Replay command ───────────────────────────────────────────

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description('Run a replay script with XPath fallback')
    .argument('<script>', 'Path to a replay script (JSON)')
    .option('--headless', 'Run browser headless')
    .action(async (scriptPath: string, opts: ReplayOptions) => {
      try {
        const script = await readReplayScript(scriptPath);
        process.exitCode = await runReplayScript(script, {
          headless: opts.headless ?? false,
          sensitiveData: loadSensitiveData(script.sensitiveDataKeys),
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = EXIT_FAILED;
      }
    });
}
