#!/usr/bin/env node
import { ConfigError, describeError } from '../../shared/src/errors';
import { logger } from '../../shared/src/logger';
import { loadOperatorConfig, type OperatorConfig } from './config';
import { Operator } from './operator';

async function main(): Promise<void> {
  let config: OperatorConfig;
  try {
    config = loadOperatorConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('[CONFIG]', err.message);
      process.exit(1);
    }
    throw err;
  }

  const operator = new Operator(config);
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => operator.requestShutdown(`signal ${signal}`));
  }

  logger.info('[OPERATOR]', `Connecting to ${config.serverHost}:${config.serverPort} ...`);
  const { videoPort, viewerPort } = await operator.start();
  logger.info(
    '[OPERATOR]',
    `Ready: video on UDP ${videoPort}, input=${operator.source.name}` +
      (viewerPort === null ? '' : `, viewer on http://127.0.0.1:${viewerPort}/`)
  );

  const outcomes = await operator.waitForExit();
  const stuck = outcomes.filter((o) => o.outcome !== 'stopped').map((o) => o.name);
  if (stuck.length > 0) {
    logger.warn('[OPERATOR]', `Exiting with contexts still winding down: ${stuck.join(', ')}`);
  }
  logger.info('[OPERATOR]', 'Closed connection and cleaned up');
  process.exit(0);
}

main().catch((err: unknown) => {
  logger.error('[OPERATOR]', 'Fatal', describeError(err));
  process.exit(1);
});
