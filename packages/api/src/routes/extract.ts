// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/extract.ts
// POST /api/extract: text extraction only, no classification or model call.

import type { FastifyPluginAsync } from "fastify";

import { extractFileText } from "../extract/index.js";
import type { ErrorBody, ExtractResponse, RouteDeps } from "../types.js";
import { readUpload } from "./upload.js";

const extractRoute: FastifyPluginAsync<Pick<RouteDeps, "extractors">> = async (fastify, opts) => {
    fastify.post(
        "/api/extract",
        {
            schema: {
                summary: "Extract text from a file",
                description: "Multipart upload (`file`). Returns the OCR or document text.",
                tags: ["Files"],
                consumes: ["multipart/form-data"],
            },
        },
        async (request, reply) => {
            const upload = await readUpload(request);
            if (!upload.ok) {
                return reply.code(400).send({ error: upload.error });
            }

            const extracted = await extractFileText(upload.kind, upload.file, opts.extractors, request.log);
            if (!extracted.success || !extracted.text) {
                const failure: ErrorBody = { success: false, error: "Failed to extract text from file" };
                return reply.code(400).send(failure);
            }

            const response: ExtractResponse = { success: true, extracted_text: extracted.text };
            return response;
        },
    );
};

export default extractRoute;
