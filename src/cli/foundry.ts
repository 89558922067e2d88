#!/usr/bin/env node
/**
 * Foundry CLI
 *
 * Runs a pipeline with the deterministic providers and prints the stage
 * results, optionally evolving the pipeline for several rounds.
 */

import { Command, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';

import { FoundryRuntime } from '../runtime/FoundryRuntime.js';
import { registerShutdownHooks } from '../utils/shutdown.js';
import { FoundryConfigOverrides } from '../config/foundry.config.js';
import { PipelineExecutionResult } from '../orchestration/types.js';
import { EvolutionStats } from '../services/evolution/types.js';
import { createLogger, errorMessage, setLogLevel } from '../common/logger.js';
import { PIPELINE_STAGES } from '../types/agent.types.js';

dotenv.config();

const logger = createLogger('FoundryCLI');

interface RunCommandOptions {
  requirement: string[];
  constraint: string[];
  language?: string;
  evolveRounds: number;
  maxLoops?: number;
  threshold?: number;
  json: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function parseScore(value: string): number {
  const parsed = Number(value);
  if (!(parsed >= 0 && parsed <= 1)) {
    throw new InvalidArgumentError('Not a number between 0 and 1.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function printResult(result: PipelineExecutionResult): void {
  console.log(`\nPipeline ${result.pipelineId}: ${result.status} (score ${result.overallScore.toFixed(4)})`);
  console.log('Stage      | Status    | Score  | Loops');
  console.log('-----------|-----------|--------|------');

  for (const role of PIPELINE_STAGES) {
    const stage = result.stages[role];
    if (!stage) continue;
    console.log(
      `${role.padEnd(11)}| ${stage.status.padEnd(10)}| ${stage.score.toFixed(4)} | ${stage.loopsExecuted}`
    );
  }

  if (result.evolved) {
    console.log(`Spawned: ${result.spawnedChildIds.join(', ') || 'none'}`);
  }
  for (const failure of result.spawnFailures) {
    console.log(`Spawn failed for ${failure.parentId}: ${failure.error}`);
  }
  if (result.error) {
    console.log(`Error: ${result.error}`);
  }
}

function printTree(stats: EvolutionStats): void {
  console.log('\nEvolution tree');
  console.log('==============');
  console.log(`Nodes: ${stats.totalNodes}  Edges: ${stats.totalEdges}  Generations: ${stats.totalGenerations}`);
  console.log(`Average: ${stats.averagePerformance.toFixed(4)}  Best: ${stats.bestPerformance.toFixed(4)}`);
}

async function runCommand(description: string, options: RunCommandOptions): Promise<void> {
  if (options.json) {
    // Logs go to stderr; keep only warnings and errors
    setLogLevel('warn');
  }

  const overrides: FoundryConfigOverrides = {
    maxReflexionLoops: options.maxLoops,
    performanceThreshold: options.threshold,
    language: options.language
  };

  const runtime = FoundryRuntime.create({ config: overrides });
  const removeHooks = registerShutdownHooks(runtime);
  const results: PipelineExecutionResult[] = [];

  try {
    let result = await runtime.runPipeline(description, options.requirement, {
      constraints: options.constraint
    });
    results.push(result);

    for (let round = 0; round < options.evolveRounds; round++) {
      if (!result.evolved || result.spawnFailures.length > 0) {
        logger.info(`Stopping after ${round} evolution round(s): pipeline ${result.pipelineId} did not evolve`);
        break;
      }
      result = await runtime.runEvolved(result.pipelineId);
      results.push(result);
    }

    if (options.json) {
      console.log(JSON.stringify({ results, tree: runtime.orchestrator.getEvolutionTree() }, null, 2));
    } else {
      results.forEach(printResult);
      printTree(runtime.orchestrator.getTreeStats());
    }

    if (results.some(entry => entry.status === 'failed')) {
      process.exitCode = 1;
    }
  } finally {
    removeHooks();
    await runtime.shutdown();
  }
}

const program = new Command();

program
  .name('foundry')
  .description('Run self-evolving agent pipelines')
  .version('0.1.0');

program
  .command('run')
  .description('Run a pipeline for a task description')
  .argument('<description>', 'What the pipeline should build')
  .option('-r, --requirement <text>', 'Requirement (repeatable)', collect, [])
  .option('-c, --constraint <text>', 'Constraint (repeatable)', collect, [])
  .option('-l, --language <language>', 'Target language')
  .option('-e, --evolve-rounds <n>', 'Evolve and re-run the pipeline up to n times', parseInteger, 0)
  .option('--max-loops <n>', 'Reflexion loop budget per stage', parseInteger)
  .option('--threshold <score>', 'Stage score that ends a reflexion loop early', parseScore)
  .option('--json', 'Print results and the evolution tree as JSON', false)
  .action(async (description: string, options: RunCommandOptions) => {
    try {
      await runCommand(description, options);
    } catch (error) {
      logger.error('Run failed', { error: errorMessage(error) });
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
