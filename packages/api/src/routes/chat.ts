// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/chat.ts
// POST /api/chat/text and POST /api/chat/file: classify, then answer through the model router.

import type { FastifyPluginAsync } from "fastify";
import { describeError } from "@edugate/core";

import { extractFileText } from "../extract/index.js";
import type { ChatAnswer, ChatTextRequest, RouteDeps } from "../types.js";
import { readUpload } from "./upload.js";

export const OFF_TOPIC_TEXT = "I specialize in educational content. Please ask about academic subjects.";
export const OFF_TOPIC_FILE = "The content of this file does not appear to be educational.";

const chatRoute: FastifyPluginAsync<RouteDeps> = async (fastify, opts) => {
    const { classifier, router, extractors, systemPrompt } = opts;

    async function answer(question: string, previousResponse: string, offTopic: string): Promise<ChatAnswer> {
        if (!(await classifier.isEducational(question))) {
            return { success: true, ai_response: offTopic, is_educational: false };
        }
        const result = await router.respond(question, { previousResponse, systemPrompt });
        return {
            success: true,
            ai_response: result.content,
            is_educational: true,
            model_tier: result.tier ?? null,
        };
    }

    fastify.post<{ Body: ChatTextRequest }>(
        "/api/chat/text",
        {
            attachValidation: true,
            schema: {
                summary: "Ask a question",
                description:
                    "Answers educational questions. Off-topic questions get a fixed reply; " +
                    "`previous_response` lets a follow-up escalate to a stronger model.",
                tags: ["Chat"],
                body: {
                    type: "object",
                    properties: {
                        message: { type: "string" },
                        previous_response: { type: "string" },
                    },
                },
            },
        },
        async (request, reply) => {
            const message = request.validationError ? undefined : request.body?.message?.trim();
            if (!message) {
                return reply.code(400).send({ error: "Message is required and cannot be empty" });
            }

            try {
                return await answer(message, request.body.previous_response ?? "", OFF_TOPIC_TEXT);
            } catch (err) {
                request.log.error({ route: "chat.text", err: describeError(err) }, "chat request failed");
                return reply.code(500).send({ error: "Failed to generate AI response." });
            }
        },
    );

    fastify.post(
        "/api/chat/file",
        {
            schema: {
                summary: "Ask about an uploaded file",
                description: "Multipart upload (`file`): image (OCR), PDF/DOCX, or audio. The extracted text is the question.",
                tags: ["Chat"],
                consumes: ["multipart/form-data"],
            },
        },
        async (request, reply) => {
            const upload = await readUpload(request);
            if (!upload.ok) {
                return reply.code(400).send({ error: upload.error });
            }

            try {
                const extracted = await extractFileText(upload.kind, upload.file, extractors, request.log);
                if (!extracted.success || !extracted.text) {
                    return reply.code(400).send({ error: `Failed to extract text from the ${upload.kind} file.` });
                }
                return await answer(extracted.text, "", OFF_TOPIC_FILE);
            } catch (err) {
                request.log.error(
                    { route: "chat.file", kind: upload.kind, err: describeError(err) },
                    "file chat request failed",
                );
                return reply.code(500).send({ error: "An unexpected error occurred while processing the file" });
            }
        },
    );
};

export default chatRoute;
