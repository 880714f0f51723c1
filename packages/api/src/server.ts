// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/server.ts
// The EduGate REST API server.
//
// Endpoints:
//   GET  /                 ← liveness message
//   GET  /api/health       ← service info
//   POST /api/chat/text    ← classify + answer a question
//   POST /api/chat/file    ← classify + answer the text of an upload
//   POST /api/classify     ← classifier only
//   POST /api/extract      ← text extraction only
//   GET  /docs             ← Swagger UI (if enabled)

import Fastify from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

import {
    VERSION,
    createClassifier,
    createLogger,
    createModelRouter,
    describeError,
} from "@edugate/core";

import type { ApiServerOptions, RouteDeps } from "./types.js";
import { defaultExtractors } from "./extract/index.js";
import authPlugin from "./middleware/auth.js";
import healthRoute from "./routes/health.js";
import chatRoute from "./routes/chat.js";
import classifyRoute from "./routes/classify.js";
import extractRoute from "./routes/extract.js";

// Extra file parts are skipped while looking for the `file` field.
const MAX_FILE_PARTS = 5;

export async function createServer(opts: ApiServerOptions) {
    const { config } = opts;
    const { server } = config;
    const logger = opts.logger ?? createLogger(config.logging.level, config.logging.pretty);
    const enableSwagger = opts.swagger ?? server.swagger;

    // Fatal without a credential: ConfigurationError propagates to the caller.
    const router = opts.router ?? createModelRouter(config, logger);
    const classifier = opts.classifier ?? createClassifier(config, logger);
    const deps: RouteDeps = {
        router,
        classifier,
        extractors: opts.extractors ?? defaultExtractors,
        systemPrompt: server.systemPrompt,
    };

    const fastify = Fastify({ logger });

    // ── CORS ────────────────────────────────────────────────────────────────────
    const allowedOrigins = new Set(server.allowedOrigins);
    await fastify.register(cors, {
        origin: (origin: string | undefined, cb: (err: Error | null, allow: boolean) => void) => {
            // Requests without an Origin header (curl, server-to-server) are not CORS requests.
            cb(null, !origin || allowedOrigins.has(origin));
        },
        credentials: true,
        methods: ["GET", "POST", "OPTIONS"],
        allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With"],
    });

    // ── Uploads ─────────────────────────────────────────────────────────────────
    await fastify.register(multipart, {
        limits: { fileSize: server.maxUploadMb * 1024 * 1024, files: MAX_FILE_PARTS },
    });

    // ── Swagger / OpenAPI docs ──────────────────────────────────────────────────
    if (enableSwagger) {
        await fastify.register(swagger, {
            openapi: {
                openapi: "3.0.0",
                info: {
                    title: "EduGate REST API",
                    description:
                        "Educational question gateway: questions are screened by a content classifier, " +
                        "then answered by a tiered set of chat models.",
                    version: VERSION,
                },
                tags: [
                    { name: "Chat", description: "Question answering" },
                    { name: "Classifier", description: "Educational content check" },
                    { name: "Files", description: "Text extraction from uploads" },
                    { name: "System", description: "Health and status" },
                ],
            },
        });

        await fastify.register(swaggerUi, {
            routePrefix: "/docs",
            uiConfig: { docExpansion: "list" },
        });
    }

    // ── Authentication (optional) ────────────────────────────────────────────────
    await fastify.register(authPlugin, { apiKey: opts.apiKey ?? server.apiKey });

    // ── Errors ───────────────────────────────────────────────────────────────────
    fastify.setNotFoundHandler(async (_request, reply) => {
        return reply.code(404).send({ error: "This API endpoint does not exist." });
    });

    fastify.setErrorHandler(async (error, request, reply) => {
        if (error.statusCode === 413) {
            return reply.code(413).send({ error: `File too large. Maximum size is ${server.maxUploadMb}MB.` });
        }
        if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
            return reply.code(error.statusCode).send({ error: error.message });
        }
        request.log.error({ err: describeError(error) }, "internal server error");
        return reply.code(500).send({ error: "An internal server error occurred." });
    });

    // ── Lifecycle ────────────────────────────────────────────────────────────────
    fastify.addHook("onClose", async () => {
        await classifier.close();
    });

    // ── Register routes ──────────────────────────────────────────────────────────
    await fastify.register(healthRoute, deps);
    await fastify.register(chatRoute, deps);
    await fastify.register(classifyRoute, deps);
    await fastify.register(extractRoute, deps);

    return { fastify, router, classifier };
}

export async function startServer(opts: ApiServerOptions): Promise<void> {
    const { fastify, classifier } = await createServer(opts);
    const { port, host } = opts.config.server;

    try {
        // Load the zero-shot backend before taking traffic; failures only degrade to fail-open.
        await classifier.init().catch((err: unknown) => {
            fastify.log.warn({ err: describeError(err) }, "classifier backend init failed; will retry on demand");
        });
        await fastify.listen({ port, host });
        fastify.log.info(`EduGate API v${VERSION} listening on http://${host}:${port}`);
    } catch (err) {
        fastify.log.error({ err: describeError(err) }, "failed to start");
        await fastify.close();
        throw err;
    }

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            fastify.log.info({ signal }, "shutting down");
            fastify.close().then(
                () => process.exit(0),
                (err: unknown) => {
                    fastify.log.error({ err: describeError(err) }, "shutdown failed");
                    process.exit(1);
                },
            );
        });
    }
}
