#!/usr/bin/env node

/**
 * Tag a flow log file against a lookup table and write the count report.
 *
 * Usage: flow-log-tagger <flow_log_file> <lookup_csv_file> <output_file>
 */

import dotenv from 'dotenv';

import { getPipelineConfig } from './config/pipeline';
import { FlowLogError, toError } from './errors';
import { FlowLogPipeline } from './pipeline/FlowLogPipeline';
import { PipelineState } from './pipeline/types';

export const USAGE = 'Usage: flow-log-tagger <flow_log_file> <lookup_csv_file> <output_file>';

const STATE_MESSAGES: Partial<Record<PipelineState, string>> = {
  loading_lookup: '📄 Loading lookup table...',
  streaming: '🚀 Streaming flow log chunks...',
  aggregating: '🔄 Waiting for remaining chunks...',
  writing: '💾 Writing report...'
};

/**
 * Run the tagger for the given arguments (without the node and script paths)
 * and return the process exit code.
 */
export async function main(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  if (args.length !== 3) {
    console.error(USAGE);
    return 1;
  }

  const [flowLogPath, lookupPath, outputPath] = args;
  const startTime = Date.now();

  try {
    const config = getPipelineConfig(env);
    const pipeline = new FlowLogPipeline({ config });

    pipeline.on('state', state => {
      const message = STATE_MESSAGES[state];
      if (message) {
        console.log(message);
      }
    });

    pipeline.on('chunk', progress => {
      const interval = config.progressInterval;
      if (interval > 0 && progress.chunksMerged % interval === 0) {
        console.log(`🔄 Merged ${progress.chunksMerged}/${progress.chunksDispatched} chunks (${progress.linesRead.toLocaleString()} lines)`);
      }
    });

    const result = await pipeline.run({ flowLogPath, lookupPath, outputPath });

    console.log(`📊 Lines: ${result.stats.linesRead.toLocaleString()}, counted: ${result.stats.recordsCounted.toLocaleString()}, skipped: ${result.stats.malformedLines.toLocaleString()}, chunks: ${result.stats.chunksProcessed}`);
    const elapsedSeconds = (Date.now() - startTime) / 1000;
    console.log(`✅ Processing complete. Output written to '${outputPath}'. Time taken: ${elapsedSeconds.toFixed(2)} seconds.`);
    return 0;

  } catch (error) {
    const message = error instanceof FlowLogError ? error.message : `Unexpected error: ${toError(error).message}`;
    console.error(`❌ Error: ${message}`);
    return 1;
  }
}

function loadEnvironment(): void {
  // .env.local takes priority over .env
  dotenv.config({ path: './.env.local', override: true });
  dotenv.config({ path: './.env' });
}

if (require.main === module) {
  loadEnvironment();
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Fatal error:', error);
      process.exitCode = 1;
    });
}
