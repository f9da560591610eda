import 'dotenv/config';
import { getConfig, type AppConfig } from './config.js';
import { ConfigError } from './errors.js';
import { buildServer } from './server.js';

function loadConfig(): AppConfig {
  try {
    return getConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`=== INVALID CONFIGURATION ===\n${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function start() {
  const config = loadConfig();
  const app = await buildServer({ config });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { adapter: config.messaging.adapter, alertChannel: config.alertRouting.channel, mqtt: Boolean(config.mqtt.url) },
    `GasGuard gateway running on ${config.server.host}:${config.server.port}`,
  );
}

start().catch((err: unknown) => {
  console.error('=== STARTUP FAILED ===');
  console.error(err);
  process.exit(1);
});
