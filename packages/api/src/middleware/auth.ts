// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/auth.ts
// Optional API key authentication for the EduGate REST API.
// If no API key is configured, all requests are allowed.

import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";

export interface AuthOptions {
    /** Required API key; auth is disabled when unset */
    apiKey?: string;
}

const PUBLIC_PATHS = new Set(["/", "/api/health"]);

const authPlugin: FastifyPluginAsync<AuthOptions> = async (fastify, opts) => {
    if (!opts.apiKey) {
        return;
    }

    fastify.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
        const path = request.url.split("?")[0] ?? request.url;
        if (request.method === "OPTIONS" || PUBLIC_PATHS.has(path) || path.startsWith("/docs")) {
            return;
        }

        const authHeader = request.headers["authorization"];
        const keyHeader = request.headers["x-api-key"];

        const token = authHeader?.startsWith("Bearer ")
            ? authHeader.slice(7)
            : typeof keyHeader === "string"
                ? keyHeader
                : undefined;

        if (token !== opts.apiKey) {
            return reply.code(401).send({
                error: "Invalid API key. Pass your key via 'Authorization: Bearer <key>' or 'x-api-key: <key>'.",
            });
        }
    });
};

export default fp(authPlugin, { name: "edugate-auth" });
