import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import {
  ScheduleSync,
  UnavailableSpeechToText,
  type ScheduleStore,
  type SpeechToText,
  type StoreMode,
} from "@csv-scheduler/core";
import { registerScheduleRoutes } from "./routes/schedule.js";

export interface ServerOptions {
  store: ScheduleStore;
  mode: StoreMode;
  /** Defaults to a workflow over `store` */
  sync?: ScheduleSync;
  speech?: SpeechToText;
  /** Defaults to pretty-printed pino at LOG_LEVEL */
  logger?: FastifyServerOptions["logger"];
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    storeMode: StoreMode;
    scheduleStore: ScheduleStore;
    scheduleSync: ScheduleSync;
    speechToText: SpeechToText;
  }
}

const DEFAULT_LOGGER: FastifyServerOptions["logger"] = {
  level: process.env.LOG_LEVEL ?? "info",
  transport: {
    target: "pino-pretty",
    options: {
      translateTime: "HH:MM:ss Z",
      ignore: "pid,hostname",
    },
  },
};

const indexPath = fileURLToPath(new URL("../public/index.html", import.meta.url));

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const { store, mode } = options;

  const fastify = Fastify({
    logger: options.logger ?? DEFAULT_LOGGER,
  });

  // Register CORS (allow all origins, single-user app)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("storeMode", mode);
  fastify.decorate("scheduleStore", store);
  fastify.decorate("scheduleSync", options.sync ?? new ScheduleSync(store));
  fastify.decorate("speechToText", options.speech ?? new UnavailableSpeechToText());

  fastify.get("/", async (_request, reply) => {
    const html = await readFile(indexPath, "utf-8");
    return reply.type("text/html").send(html);
  });

  await registerScheduleRoutes(fastify);

  if (!store.hasCredential) {
    fastify.log.warn("No store credential: schedule is read-only");
  }

  return fastify;
}
