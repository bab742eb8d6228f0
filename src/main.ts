import { runAnalysis } from './app';
import { USAGE, resolveRunConfig } from './config';
import { formatSummary } from './domain/summary';
import { DynoError } from './domain/errors';
import { createLogger } from './logger';

async function main(argv: string[]): Promise<number> {
  let logger = createLogger('dyno');
  try {
    const { config, help } = resolveRunConfig(argv);
    if (help) {
      process.stdout.write(USAGE + '\n');
      return 0;
    }
    if (config.logLevel) logger = createLogger('dyno', { level: config.logLevel });

    const result = await runAnalysis(config, { logger });
    for (const summary of result.summaries) {
      process.stdout.write(formatSummary(summary) + '\n');
    }
    logger.info('simulation complete', { files: result.files.map((f) => f.path) });
    return 0;
  } catch (err) {
    if (err instanceof DynoError) {
      logger.error(err.message, { code: err.code, ...err.context });
    } else {
      logger.errorObj('unexpected failure', err);
    }
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${String(err)}\n`);
    process.exitCode = 1;
  },
);
