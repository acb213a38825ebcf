#!/usr/bin/env node
import { ConfigError, describeError } from '../../shared/src/errors';
import { logger } from '../../shared/src/logger';
import { loadVehicleConfig, type VehicleConfig } from './config';
import { Vehicle } from './vehicle';

async function main(): Promise<void> {
  let config: VehicleConfig;
  try {
    config = loadVehicleConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('[CONFIG]', err.message);
      process.exit(1);
    }
    throw err;
  }

  const vehicle = new Vehicle(config);
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => vehicle.coordinator.requestShutdown(`signal ${signal}`));
  }

  const { commandPort, httpPort } = await vehicle.start();
  logger.info(
    '[VEHICLE]',
    `Ready: commands on ${config.host}:${commandPort}, ${config.frameRate} fps, actuator=${config.actuator}, capture=${config.capture}` +
      (httpPort === null ? '' : `, diagnostics on :${httpPort}`)
  );

  const outcomes = await vehicle.waitForExit();
  const stuck = outcomes.filter((o) => o.outcome !== 'stopped').map((o) => o.name);
  if (stuck.length > 0) {
    logger.warn('[VEHICLE]', `Exiting with contexts still winding down: ${stuck.join(', ')}`);
  }
  logger.info('[VEHICLE]', 'Bye');
  // A context stuck in I/O must not keep the process alive.
  process.exit(0);
}

main().catch((err: unknown) => {
  logger.error('[VEHICLE]', 'Fatal', describeError(err));
  process.exit(1);
});
