import { createApp, AppContext } from '../../app.js';
import { ConfigManager } from '../../utils/config.js';

/**
 * Load configuration, build the application, run `fn` and close everything afterwards.
 * Command output goes to the console, so service logs are kept to warnings unless
 * LOG_LEVEL asks for more.
 */
export async function withApp<T>(configPath: string | undefined, fn: (app: AppContext) => Promise<T>): Promise<T> {
  const config = await new ConfigManager(configPath).load();
  if (!process.env['LOG_LEVEL']) {
    config.logging.level = 'warn';
  }

  const app = await createApp(config);
  try {
    return await fn(app);
  } finally {
    await app.close();
  }
}
