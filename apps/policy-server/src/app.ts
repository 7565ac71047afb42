import Fastify from "fastify";
import type { FastifyInstance, FastifyServerOptions } from "fastify";

import { createMessageResolvers } from "@mapsexpr/lookups";
import { readPolicyDir } from "./config/policies";
import { PolicyRegistry } from "./registry";
import { registerPolicyRoutes } from "./routes";

export type BuildAppOptions = {
  policyDir: string;
  logger?: FastifyServerOptions["logger"];
  now?: () => number;
};

/**
 * Loads every policy block under `policyDir` and wires the HTTP routes.
 * Broken blocks are logged and disabled; the app starts regardless.
 */
export function buildApp(opts: BuildAppOptions): { app: FastifyInstance; registry: PolicyRegistry } {
  const app = Fastify({ logger: opts.logger ?? true });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  const resolvers = createMessageResolvers({ baseDir: opts.policyDir });
  const registry = new PolicyRegistry(readPolicyDir(opts.policyDir), resolvers, app.log, opts.now);
  registerPolicyRoutes(app, registry);

  return { app, registry };
}
