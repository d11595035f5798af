import {
  MockContentsApi,
  ScheduleSync,
  createRemoteScheduleStore,
  UnavailableSpeechToText,
  buildStoreConfig,
  loadSchedulerConfig,
  loadStoreCredential,
  serializeCsv,
  type SchedulerConfig,
  type ScheduleStore,
} from "@csv-scheduler/core";
import { createServer } from "./server.js";

/** Placeholder credential accepted by the in-memory demo store */
const MOCK_TOKEN = "local-demo";

function createStore(config: SchedulerConfig): ScheduleStore {
  if (config.store.mode === "mock") {
    const api = new MockContentsApi({
      path: config.store.path,
      branch: config.store.branch,
      token: MOCK_TOKEN,
      initialCsv: serializeCsv([]),
    });
    console.log("Using in-memory demo store (store.mode: mock). Nothing is persisted.");
    return createRemoteScheduleStore(api.storeConfig(), { fetch: api.fetch });
  }

  const token = loadStoreCredential({ configDir: config.configDir });
  const storeConfig = buildStoreConfig(config, token);
  console.log(
    `Schedule store: ${storeConfig.repo}/${storeConfig.path}@${storeConfig.branch}${token ? "" : " (read-only)"}`,
  );
  return createRemoteScheduleStore(storeConfig);
}

async function main() {
  const config = loadSchedulerConfig();
  const store = createStore(config);

  const server = await createServer({
    store,
    mode: config.store.mode,
    sync: new ScheduleSync(store),
    speech: new UnavailableSpeechToText(),
  });

  const { port, host } = config.server;
  try {
    await server.listen({ port, host });
    console.log(`\nScheduler running at http://${host}:${port}`);
    console.log("Press Ctrl+C to stop\n");
  } catch (err) {
    console.error("Failed to start server:", err);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      console.log("Server closed.");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
