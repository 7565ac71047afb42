import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { MessageContextV1Z } from "@mapsexpr/contracts";
import type { PolicyRegistry } from "./registry";
import { PolicyDisabled, PolicyNotFound } from "./registry";

const EvaluateRequestZ = z.object({ context: MessageContextV1Z }).strict();

export function registerPolicyRoutes(app: FastifyInstance, registry: PolicyRegistry): void {
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true, policies_enabled: registry.enabled().length });
  });

  app.get("/api/policies", async (_req, reply) => {
    const policies = registry.list().map((p) =>
      p.enabled
        ? {
            name: p.name,
            origin: p.origin,
            enabled: true,
            description: p.ruleset.description,
            expression: p.ruleset.expression.source,
            rules: [...p.ruleset.rules.values()].map((r) => ({ name: r.name, selector: r.selectorSpec, map_kind: r.mapKind })),
            unused_rules: p.unusedRules
          }
        : { name: p.name, origin: p.origin, enabled: false, reason: p.reason }
    );
    return reply.send({ policies });
  });

  app.post<{ Params: { name: string } }>("/api/policies/:name/evaluate", async (req, reply) => {
    const body = EvaluateRequestZ.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ ok: false, error: "INVALID_CONTEXT", issues: body.error.issues });
    }

    try {
      return reply.send(registry.evaluate(req.params.name, body.data.context));
    } catch (e) {
      if (e instanceof PolicyNotFound || e instanceof PolicyDisabled) {
        return reply.code(e.status).send({ ok: false, error: e.message });
      }
      throw e;
    }
  });

  app.post("/api/evaluate", async (req, reply) => {
    const body = EvaluateRequestZ.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ ok: false, error: "INVALID_CONTEXT", issues: body.error.issues });
    }
    return reply.send({ verdicts: registry.evaluateAll(body.data.context) });
  });
}
