// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/health.ts
// GET / and GET /api/health: liveness and service info

import type { FastifyPluginAsync } from "fastify";
import { VERSION, describeError, type BaseProvider } from "@edugate/core";

import { ALLOWED_EXTENSIONS } from "../extract/index.js";
import type { HealthQuery, HealthResponse, ProviderHealth, RouteDeps } from "../types.js";

// uptime start
const startedAt = Date.now();

async function checkProvider(provider: BaseProvider): Promise<ProviderHealth & { error?: string }> {
    const start = Date.now();
    let status: ProviderHealth["status"];
    let error: string | undefined;
    try {
        const ok = await provider.healthCheck();
        status = ok ? "ok" : "degraded";
    } catch (err) {
        status = "unavailable";
        error = describeError(err);
    }
    return { name: provider.name, status, latency_ms: Date.now() - start, error };
}

const healthRoute: FastifyPluginAsync<Pick<RouteDeps, "router" | "classifier">> = async (fastify, opts) => {
    fastify.get("/", async () => {
        return { message: "EduGate API is online and healthy." };
    });

    fastify.get<{ Querystring: HealthQuery }>(
        "/api/health",
        {
            schema: {
                summary: "Health check",
                description:
                    "Service status, supported upload types and configured model tiers. " +
                    "`providers=true` also checks the chat backend.",
                tags: ["System"],
                querystring: {
                    type: "object",
                    properties: { providers: { type: "boolean" } },
                },
            },
        },
        async (request): Promise<HealthResponse> => {
            const response: HealthResponse = {
                status: "healthy",
                version: VERSION,
                uptime: Math.floor((Date.now() - startedAt) / 1000),
                supported_files: ALLOWED_EXTENSIONS,
                classifier: opts.classifier.backendName,
                models: opts.router.models,
            };

            if (request.query.providers) {
                const { error, ...health } = await checkProvider(opts.router.provider);
                if (error) {
                    request.log.warn({ provider: health.name, err: error }, "chat provider health check failed");
                }
                response.chat_provider = health;
            }
            return response;
        },
    );
};

export default healthRoute;
