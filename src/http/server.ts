import { timingSafeEqual } from "crypto";
import Fastify, { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { logger } from "../logger";
import { ReconcileInProgressError } from "../reconcile/reconcile-service";
import { ReconcileResult } from "../types/report";
import { healthSchema, profileChangesSchema } from "./schemas";

export interface ServerOptions {
  port: number;
  apiKey: string;
  reconciler: { run(): Promise<ReconcileResult> };
}

export async function buildServer(opts: Omit<ServerOptions, "port">): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    requestTimeout: 600_000,
  });

  // 1. Swagger plugin (must register before routes)
  await app.register(swagger, {
    openapi: {
      info: {
        title: "Breeze Profile Reconciler",
        description: "Reports member-profile changes between Breeze snapshots.",
        version: "1.0.0",
      },
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            description: "Static API key configured via TRIGGER_API_KEY env var",
          },
        },
      },
    },
  });

  // 2. Swagger UI
  await app.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: {
      persistAuthorization: true,
    },
  });

  // 3. Auth hook, skipped for /health and /docs*
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    if (request.url === "/health" || request.url.startsWith("/docs")) return;

    const auth = request.headers.authorization ?? "";
    const expected = `Bearer ${opts.apiKey}`;
    const isValid =
      auth.length === expected.length &&
      timingSafeEqual(Buffer.from(auth), Buffer.from(expected));

    if (!isValid) {
      reply.code(401).send({ error: "Unauthorized" });
      return;
    }
  });

  app.get("/health", { schema: healthSchema }, async () => {
    return { status: "ok" };
  });

  app.post("/reports/profile-changes", { schema: profileChangesSchema }, async (_request, reply) => {
    try {
      const result = await opts.reconciler.run();
      reply.code(200).send(result);
    } catch (err) {
      if (err instanceof ReconcileInProgressError) {
        reply.code(409).send({ error: err.message });
      } else {
        logger.error({ tag: "HTTP", err }, "Reconciliation handler error");
        reply.code(500).send({ error: "Internal server error" });
      }
    }
  });

  return app;
}

export async function startServer(opts: ServerOptions): Promise<FastifyInstance> {
  const app = await buildServer(opts);
  await app.listen({ port: opts.port, host: "0.0.0.0" });
  logger.info({ tag: "HTTP", port: opts.port }, `Trigger server listening on port ${opts.port}`);
  return app;
}
