import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import helmet from "@fastify/helmet";
import { allocateShortCode } from "./allocator.js";
import type { Config } from "./config.js";
import { AppError, GENERIC_ERROR_MESSAGE, NotFoundError, ValidationError } from "./errors.js";
import { fallbackIndexPage } from "./index_page.js";
import { httpRequestDurationSeconds, httpRequestsTotal, redirectsTotal, registry } from "./metrics.js";
import { getOrCreateRequestId } from "./request_id.js";
import { generateShortCode } from "./shortcode.js";
import type { CodeGenerator } from "./shortcode.js";
import type { UrlStore } from "./storage.js";
import { parseShortenBody } from "./validate_url.js";

export const SERVICE_NAME = "URL Shortener";
export const RECENT_LIMIT = 10;

export interface AppDeps {
  config: Config;
  store: UrlStore;
  generate?: CodeGenerator;
  /** Interface document served at GET /; defaults to the usage page. */
  indexHtml?: string;
}

const errorBody = {
  type: "object",
  properties: { error: { type: "string" } }
} as const;

const urlEntry = {
  type: "object",
  properties: {
    short_code: { type: "string" },
    short_url: { type: "string" },
    long_url: { type: "string" },
    created_at: { type: "string" }
  }
} as const;

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { config, store } = deps;
  const generate = deps.generate ?? generateShortCode;
  const indexHtml = deps.indexHtml ?? fallbackIndexPage(config.baseUrl);
  const shortUrlFor = (code: string) => `${config.baseUrl}/${code}`;

  const app = Fastify({
    logger: { level: config.logLevel },
    bodyLimit: config.bodyLimitBytes,
    requestTimeout: config.requestTimeoutMs,
    trustProxy: true,
    requestIdHeader: false,
    genReqId: (req) => getOrCreateRequestId(req.headers)
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("X-Request-Id", req.id);
  });

  app.addHook("onResponse", async (req, reply) => {
    const labels = {
      method: req.method,
      route: req.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode)
    };
    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, reply.elapsedTime / 1000);
  });

  await app.register(helmet, {
    // the bundled interface uses an inline script
    contentSecurityPolicy: false
  });

  app.get("/", async (_req, reply) => {
    return reply.type("text/html; charset=utf-8").send(indexHtml);
  });

  app.get(
    "/health",
    {
      schema: {
        response: {
          200: {
            type: "object",
            properties: { status: { type: "string" }, timestamp: { type: "number" } }
          }
        }
      }
    },
    async () => {
      return { status: "healthy", timestamp: Date.now() / 1000 };
    }
  );

  app.get("/ready", async () => {
    await store.ping();
    return { status: "ready" };
  });

  app.get("/metrics", async (_req, reply) => {
    const metrics = await registry.metrics();
    return reply.header("Content-Type", registry.contentType).code(200).send(metrics);
  });

  app.post(
    "/shorten",
    {
      schema: {
        response: {
          201: {
            type: "object",
            properties: {
              short_code: { type: "string" },
              short_url: { type: "string" },
              long_url: { type: "string" }
            }
          },
          400: errorBody,
          500: errorBody
        }
      }
    },
    async (req, reply) => {
      const parsed = parseShortenBody(req.body, config.maxUrlLength);
      if (!parsed.ok) {
        throw new ValidationError(parsed.error);
      }

      const rec = await allocateShortCode(
        {
          store,
          generate,
          codeLength: config.codeLength,
          maxAttempts: config.maxAttempts,
          log: req.log
        },
        parsed.value
      );
      req.log.info({ shortCode: rec.shortCode, longUrl: rec.longUrl }, "shortened url");

      return reply.code(201).send({
        short_code: rec.shortCode,
        short_url: shortUrlFor(rec.shortCode),
        long_url: rec.longUrl
      });
    }
  );

  app.get(
    "/stats",
    {
      schema: {
        response: {
          200: {
            type: "object",
            properties: {
              total_shortened_urls: { type: "integer" },
              service: { type: "string" },
              version: { type: "string" }
            }
          }
        }
      }
    },
    async () => {
      return {
        total_shortened_urls: await store.count(),
        service: SERVICE_NAME,
        version: config.version
      };
    }
  );

  app.get(
    "/list",
    {
      schema: {
        response: {
          200: {
            type: "object",
            properties: {
              recent_urls: { type: "array", items: urlEntry },
              total_count: { type: "integer" }
            }
          }
        }
      }
    },
    async () => {
      const recs = await store.recent(RECENT_LIMIT);
      return {
        recent_urls: recs.map((rec) => ({
          short_code: rec.shortCode,
          long_url: rec.longUrl,
          created_at: rec.createdAt,
          short_url: shortUrlFor(rec.shortCode)
        })),
        total_count: recs.length
      };
    }
  );

  app.get<{ Params: { code: string } }>("/:code", async (req, reply) => {
    const { code } = req.params;
    const longUrl = await store.lookup(code);
    if (longUrl === null) {
      redirectsTotal.inc({ outcome: "not_found" });
      req.log.warn({ code }, "short code not found");
      throw new NotFoundError();
    }

    redirectsTotal.inc({ outcome: "redirected" });
    // Location must be ASCII; the stored URL is kept as submitted.
    const location = new URL(longUrl).href;
    req.log.debug({ code, longUrl, location }, "redirecting");
    return reply.redirect(location, 302);
  });

  app.setNotFoundHandler(async (_req, reply) => {
    return reply.code(404).send({ error: "Not Found" });
  });

  app.setErrorHandler(async (err: Error, req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) req.log.error({ err }, "request failed");
      return reply.code(err.statusCode).send({ error: err.expose ? err.message : GENERIC_ERROR_MESSAGE });
    }

    // Fastify's own client errors (empty JSON body, unsupported media type, ...)
    const statusCode = "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({ error: err.message });
    }

    req.log.error({ err }, "request failed");
    return reply.code(500).send({ error: GENERIC_ERROR_MESSAGE });
  });

  return app;
}
