import { FanpostApp, type FanpostConfig } from "@fanpost/core";

/** Open the app, run `fn`, and always close storage afterwards. */
export async function withApp<T>(config: FanpostConfig, fn: (app: FanpostApp) => Promise<T>): Promise<T> {
  const app = new FanpostApp(config);
  try {
    await app.init();
    return await fn(app);
  } finally {
    await app.shutdown();
  }
}
