// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/upload.ts
// Reads the single `file` part of a multipart request and resolves its kind.

import type { FastifyRequest } from "fastify";

import { detectFileKind, secureFilename, type FileKind, type UploadedFile } from "../extract/index.js";

export type UploadOutcome =
    | { ok: true; file: UploadedFile; kind: FileKind }
    | { ok: false; error: string };

export const NO_FILE = "No file provided or selected";
export const UNSUPPORTED = "Unsupported file type";

/**
 * The `file` part wins wherever it sits in the body; other file parts are drained.
 * Throws the multipart plugin's 413 error when the file exceeds the upload limit.
 */
export async function readUpload(request: FastifyRequest): Promise<UploadOutcome> {
    if (!request.isMultipart()) {
        return { ok: false, error: NO_FILE };
    }

    for await (const part of request.files()) {
        if (part.fieldname !== "file") {
            part.file.resume();
            continue;
        }
        if (!part.filename) {
            part.file.resume();
            return { ok: false, error: NO_FILE };
        }

        const filename = secureFilename(part.filename);
        const kind = detectFileKind(filename);
        if (!kind) {
            // Drain the stream so the request can complete.
            part.file.resume();
            return { ok: false, error: UNSUPPORTED };
        }

        const data = await part.toBuffer();
        return { ok: true, file: { filename, data }, kind };
    }

    return { ok: false, error: NO_FILE };
}
