import { fastify, type FastifyInstance, type FastifyServerOptions } from "fastify";
import { registerChannelRoutes } from "./routes/channel.js";
import { registerConfigRoutes } from "./routes/config.js";

export async function buildServer(logger: FastifyServerOptions["logger"] = false): Promise<FastifyInstance> {
  const app = fastify({ logger });

  await registerChannelRoutes(app);
  await registerConfigRoutes(app);

  return app;
}
