/**
 * Shadebridge - Bridge Process
 * Syncs a shade gateway with the host entity model and serves the control API
 */

import { loadConfig } from './config.js';
import { BridgeController } from './controller/bridge-controller.js';
import { createBridgeContext } from './entities/context.js';
import { OverkizGatewayClient } from './gateway/overkiz-client.js';
import { createLogger, loggerOptions } from './lib/logger.js';
import { buildServer } from './server.js';

async function main(): Promise<void> {
  const loaded = loadConfig();
  if (!loaded.ok) {
    const logger = createLogger(loggerOptions('error', false));
    logger.fatal({ code: 'CONFIG_INVALID', problems: loaded.problems }, 'Invalid configuration');
    process.exit(1);
  }
  const { config } = loaded;

  const logOptions = loggerOptions(config.logLevel, config.prettyLogs);
  const logger = createLogger(logOptions);

  const gateway = new OverkizGatewayClient({
    baseUrl: config.gateway.baseUrl,
    token: config.gateway.token,
    verifySsl: config.gateway.verifySsl,
    logger,
  });
  if (!config.gateway.verifySsl) {
    logger.warn({ code: 'TLS_VERIFY_DISABLED' }, 'Gateway certificate verification is disabled');
  }

  const ctx = createBridgeContext({ gateway, logger });
  const controller = new BridgeController(ctx, {
    onFatal: fatal => logger.error({ code: 'POLLER_FATAL', reason: fatal.reason }, 'Event polling stopped'),
  });
  const server = await buildServer(controller, { logger: logOptions, corsOrigin: config.server.corsOrigin });

  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info({ port: config.server.port }, 'Control API listening');

  const shortPoll = setInterval(() => controller.shortPoll(), config.shortPollMs);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    clearInterval(shortPoll);
    await controller.stop();
    await server.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  const started = await controller.start();
  if (!started) {
    logger.error({ notices: ctx.host.listNotices() }, 'Bridge start-up failed; control API stays up for diagnostics');
  }
}

main().catch(err => {
  console.error('Failed to start bridge:', err);
  process.exit(1);
});
