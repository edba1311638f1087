import process from 'node:process';

import { createApp } from './app';
import { loadConfig, summarizeConfig } from './config';

const start = async () => {
  const config = loadConfig();
  const { app } = await createApp(config);

  app.addHook('onClose', async () => {
    app.log.info({ comfyuiBaseUrl: config.comfyui.baseUrl }, 'Outpaint gateway stopped');
  });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(summarizeConfig(config), 'Outpaint gateway listening');
  } catch (error) {
    app.log.error({ err: error, comfyuiBaseUrl: config.comfyui.baseUrl }, 'Failed to start outpaint gateway');
    process.exit(1);
  }

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    app.log.info({ signal }, 'Draining in-flight ComfyUI and storage requests');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error while closing gateway resources');
      process.exit(1);
    }
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => void shutdown(signal));
  }
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Outpaint gateway failed to boot', error);
  process.exit(1);
});
