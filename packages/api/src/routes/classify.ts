// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/classify.ts
// POST /api/classify: run the educational classifier only.

import type { FastifyPluginAsync } from "fastify";

import type { ClassifyRequest, ClassifyResponse, RouteDeps } from "../types.js";

const PREVIEW_CHARS = 200;

export function preview(text: string): string {
    return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

const classifyRoute: FastifyPluginAsync<Pick<RouteDeps, "classifier">> = async (fastify, opts) => {
    fastify.post<{ Body: ClassifyRequest }>(
        "/api/classify",
        {
            attachValidation: true,
            schema: {
                summary: "Classify text",
                description: "Returns whether the text is educational. Does NOT call a chat model.",
                tags: ["Classifier"],
                body: {
                    type: "object",
                    properties: { text: { type: "string" } },
                },
            },
        },
        async (request, reply) => {
            const text = request.validationError ? undefined : request.body?.text;
            if (typeof text !== "string") {
                return reply.code(400).send({ error: "Text is required" });
            }

            const response: ClassifyResponse = {
                text: preview(text),
                is_educational: await opts.classifier.isEducational(text),
            };
            return response;
        },
    );
};

export default classifyRoute;
