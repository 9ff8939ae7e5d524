/**
 * pdf-ingest command
 *
 *   pdf-ingest <collection> <path...> [--run-id ID] [--run-name NAME]
 *
 * Prints the finalized run as JSON on stdout. Everything else goes to stderr.
 *
 * Exit codes: 0 no file failed, 1 some file failed, 2 setup failure or bad usage.
 *
 * @module cli
 */

import { parseArgs } from 'util';
import { loadEnvFile, parseConfig } from './config.js';
import type { Run } from './models/ingestion.js';
import { SentenceTransformerEmbedder } from './services/embedding/sentence-transformers.js';
import { SubprocessExtractor } from './services/extraction/subprocess.js';
import { describeError } from './services/ingestion/errors.js';
import { IngestionOrchestrator } from './services/ingestion/orchestrator.js';
import { LedgerService } from './services/storage/ledger/service.js';
import { createVectorStore } from './services/vector-store/index.js';
import type { VectorStore } from './services/vector-store/types.js';

export const EXIT_OK = 0;
export const EXIT_FILE_FAILURES = 1;
export const EXIT_SETUP_FAILURE = 2;

export const USAGE = 'Usage: pdf-ingest <collection> <path...> [--run-id ID] [--run-name NAME]';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliArgs {
  collection: string;
  paths: string[];
  runId?: string;
  runName?: string;
  help: boolean;
}

/**
 * @throws CliUsageError
 */
export function parseCliArgs(argv: string[]): CliArgs {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'run-id': { type: 'string' },
        'run-name': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });

    const help = values.help === true;
    const [collection, ...paths] = positionals;
    if (!help && (collection === undefined || paths.length === 0)) {
      throw new CliUsageError('A collection and at least one path are required');
    }

    return {
      collection: collection ?? '',
      paths,
      runId: values['run-id'],
      runName: values['run-name'],
      help,
    };
  } catch (error) {
    if (error instanceof CliUsageError) throw error;
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Whether any file failed, independent of the run's own status
 */
export function exitCodeFor(run: Run): number {
  return run.failed_files > 0 ? EXIT_FILE_FAILURES : EXIT_OK;
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`${describeError(error)}\n${USAGE}`);
    return EXIT_SETUP_FAILURE;
  }
  if (args.help) {
    console.error(USAGE);
    return EXIT_OK;
  }

  let ledger: LedgerService | undefined;
  let store: VectorStore | undefined;
  const controller = new AbortController();
  let signals = 0;
  const onSignal = (signal: NodeJS.Signals): void => {
    signals++;
    if (signals > 1) {
      console.error(`[Shutdown] Second ${signal}, exiting immediately`);
      process.exit(130);
    }
    console.error(`[Shutdown] Received ${signal}, finishing in-flight files...`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    loadEnvFile(env);
    const config = parseConfig(env);

    ledger = LedgerService.open(config.dbPath);
    store = createVectorStore(config);

    const orchestrator = new IngestionOrchestrator({
      ledger,
      store,
      extractor: new SubprocessExtractor({
        pythonPath: config.pythonPath,
        timeoutMs: config.extractionTimeoutMs,
      }),
      embedder: new SentenceTransformerEmbedder({
        modelName: config.ingestion.embeddingModel,
        dimension: config.embeddingDimension,
        pythonPath: config.pythonPath,
      }),
      config: config.ingestion,
    });

    const run = await orchestrator.run(args.paths, args.collection, {
      runId: args.runId,
      runName: args.runName,
      signal: controller.signal,
    });

    process.stdout.write(JSON.stringify(run, null, 2) + '\n');
    return exitCodeFor(run);
  } catch (error) {
    console.error(`[Error] ${describeError(error)}`);
    return EXIT_SETUP_FAILURE;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    ledger?.close();
    if (store) {
      await store.close().catch((error: unknown) => {
        console.error(`[Shutdown] Error closing vector store: ${describeError(error)}`);
      });
    }
  }
}
