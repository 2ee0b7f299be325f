import { ConfigError, loadConfig, usage, type LoadConfigResult } from './config.js';
import { createLogger } from './logger.js';
import { StartupError } from './probe.js';
import { runScenario } from './runner.js';

async function main(): Promise<number> {
  let loaded: LoadConfigResult;
  try {
    loaded = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      console.error();
      console.error(usage());
      return 1;
    }
    throw err;
  }

  if (loaded.help) {
    console.log(usage());
    return 0;
  }

  const logger = createLogger();
  const controller = new AbortController();
  const shutdown = (signal: string) => {
    logger.warn({ signal }, 'Received signal, stopping launches and draining');
    controller.abort();
  };
  const onSigint = () => shutdown('SIGINT');
  const onSigterm = () => shutdown('SIGTERM');
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  try {
    const summary = await runScenario(loaded.config, { logger, signal: controller.signal });
    console.log(summary);
    return 0;
  } catch (err) {
    if (err instanceof StartupError) {
      logger.fatal({ err }, err.message);
      return 1;
    }
    throw err;
  } finally {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  });
