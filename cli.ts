#!/usr/bin/env node
/**
 * grounded-rag CLI
 *
 * Ingest documents into a local knowledge base and query it. The knowledge
 * base is restored from and saved back to a snapshot file between runs.
 */

import { InvalidArgumentError, program } from 'commander';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { loadConfig } from './src/config';
import type { RagConfig } from './src/config';
import { createRagEngine } from './src/engine';
import type { RagEngine } from './src/engine';
import { describeError, toErrorPayload } from './src/errors';
import type { MetadataFilter } from './src/knowledge-base/types';
import { readSnapshotFile, writeSnapshotFile } from './src/knowledge-base/snapshot-file';

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}"`);
  }
  return parsed;
}

/**
 * `key=value` into a filter entry; true/false and numbers keep their type
 */
function collectFilter(value: string, previous: MetadataFilter): MetadataFilter {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}"`);
  }

  const key = value.slice(0, separator);
  const raw = value.slice(separator + 1);
  let parsed: string | number | boolean = raw;
  if (raw === 'true' || raw === 'false') {
    parsed = raw === 'true';
  } else if (raw.trim() !== '' && Number.isFinite(Number(raw))) {
    parsed = Number(raw);
  }

  return { ...previous, [key]: parsed };
}

/**
 * Restore the snapshot, run `task`, and save the snapshot back when `persist`
 */
async function withEngine(persist: boolean, task: (engine: RagEngine, config: RagConfig) => Promise<void>) {
  const config = loadConfig();
  const engine = createRagEngine(config);
  const dataPath = resolve(program.opts<{ data?: string }>().data ?? config.dataPath);

  try {
    const snapshot = await readSnapshotFile(dataPath);
    if (snapshot) {
      await engine.knowledgeBase.restore(snapshot, engine.embedder.model, dataPath);
    }

    await task(engine, config);

    if (persist) {
      await writeSnapshotFile(dataPath, engine.knowledgeBase.toSnapshot(engine.embedder.model));
      log(`Saved knowledge base to ${dataPath}`, colors.blue);
    }
  } finally {
    await engine.close();
  }
}

async function run(action: () => Promise<void>) {
  try {
    await action();
  } catch (error) {
    log(`\n❌ ${describeError(error)}\n`, colors.red);
    console.error(JSON.stringify(toErrorPayload(error), null, 2));
    process.exitCode = 1;
  }
}

program
  .name('grounded-rag')
  .description('Retrieval-augmented generation over a local knowledge base')
  .version('0.1.0')
  .option('--data <path>', 'Knowledge base snapshot file (default: $DATA_PATH or ./data/knowledge-base.json)');

// Ingest command
program
  .command('ingest <file>')
  .description('Ingest a JSON array of {title, content, url, metadata?} documents')
  .action((file: string) =>
    run(() =>
      withEngine(true, async ({ orchestrator }) => {
        const documents: unknown = JSON.parse(await readFile(resolve(file), 'utf-8'));
        const result = await orchestrator.ingest(documents);

        log(`\n✅ Ingested ${result.processedCount} documents`, colors.green);
        if (result.skippedCount > 0) {
          log(`   ${result.skippedCount} unchanged`, colors.yellow);
        }
        for (const failure of result.failures) {
          const id = failure.documentId ? ` (${failure.documentId})` : '';
          log(`   ✗ #${failure.index}${id} ${failure.kind}: ${failure.message}`, colors.red);
        }
      })
    )
  );

// Search command
program
  .command('search <query>')
  .description('Find the documents most similar to a query')
  .option('-l, --limit <n>', 'Maximum number of results', parseInteger, 10)
  .option('-f, --filter <key=value>', 'Only documents with this metadata value (repeatable)', collectFilter, {})
  .action((query: string, options: { limit: number; filter: MetadataFilter }) =>
    run(() =>
      withEngine(false, async ({ orchestrator }) => {
        const response = await orchestrator.search(query, options.limit, options.filter);

        log(`\n🔎 ${response.count} results (${response.responseTimeMs}ms)\n`, colors.bright);
        response.results.forEach((result, i) => {
          log(`${i + 1}. ${result.title} [${result.score.toFixed(3)}]`, colors.blue);
          log(`   ${result.url}`);
          log(`   ${result.snippet}\n`);
        });
      })
    )
  );

// Generate command
program
  .command('generate <query>')
  .description('Generate an answer grounded in the knowledge base')
  .option('-m, --max-length <n>', 'Maximum tokens to generate', parseInteger)
  .option('-t, --temperature <t>', 'Sampling temperature (0-2)', parseDecimal)
  .action((query: string, options: { maxLength?: number; temperature?: number }) =>
    run(() =>
      withEngine(false, async ({ orchestrator }, config) => {
        const response = await orchestrator.generate(
          query,
          options.maxLength ?? config.generation.maxTokens,
          options.temperature ?? config.generation.temperature
        );

        log(`\n${response.content}\n`);
        log(`📚 Sources:`, colors.blue);
        response.sources.forEach((source, i) => {
          log(`  [${i + 1}] ${source.title} (${source.url})`);
        });
        log(`\n${response.tokensUsed} tokens, ${response.responseTimeMs}ms`, colors.yellow);
      })
    )
  );

// Stats command
program
  .command('stats')
  .description('Show knowledge base and cache statistics')
  .action(() =>
    run(() =>
      withEngine(false, async ({ orchestrator }) => {
        console.log(JSON.stringify(orchestrator.stats(), null, 2));
      })
    )
  );

// Health command
program
  .command('health')
  .description('Check knowledge base consistency and generation client state')
  .action(() =>
    run(() =>
      withEngine(false, async ({ orchestrator }) => {
        const report = orchestrator.health();
        const color = report.status === 'healthy' ? colors.green : colors.red;
        log(`\n${report.status === 'healthy' ? '✅' : '❌'} ${report.status}`, color);
        console.log(JSON.stringify(report.checks, null, 2));
        if (report.status !== 'healthy') {
          process.exitCode = 1;
        }
      })
    )
  );

// Parse arguments
program.parseAsync().catch((error: unknown) => {
  log(`\n❌ ${describeError(error)}\n`, colors.red);
  process.exitCode = 1;
});
