import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { toPersistedReport } from '@pagecite/shared';
import { loadConfig } from '../config';
import { createServices } from '../container';
import { CancelledError } from '../errors';
import { readChunkDirectory } from '../services/chunkFiles';
import { createLogger } from '../utils/logger';
import { parseIngestArgs } from './args';

/**
 * Bulk ingestion from a directory of chunk files.
 *
 * Exit code 1 when any batch failed or the run was interrupted.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, 'pagecite-ingest');
  const args = parseIngestArgs(process.argv.slice(2));

  const absDir = path.isAbsolute(args.dir) ? args.dir : path.resolve(process.cwd(), args.dir);
  logger.info({ directory: absDir }, 'Reading chunk files');

  const { files, chunks } = await readChunkDirectory(absDir);
  logger.info({ files: files.length, chunks: chunks.length }, 'Chunk files loaded');

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('SIGINT received, stopping after in-flight calls');
    controller.abort(new CancelledError('ingestion'));
  });

  const services = await createServices(config, logger);
  try {
    const report = await services.ingestion.ingest(chunks, {
      batchSize: args.batchSize,
      signal: controller.signal,
    });

    if (args.reportPath) {
      const reportPath = path.resolve(process.cwd(), args.reportPath);
      await writeFile(reportPath, `${JSON.stringify(toPersistedReport(report), null, 2)}\n`, 'utf8');
      logger.info({ reportPath }, 'Ingestion report written');
    }

    if (report.failedBatches.length > 0 || report.cancelled) {
      process.exitCode = 1;
    }
  } finally {
    await services.close();
  }
}

main().catch((error: unknown) => {
  console.error('[ingest] failed:', error);
  process.exitCode = 1;
});
