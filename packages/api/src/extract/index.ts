// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describeError, type Logger } from "@edugate/core";

import type { FileKind } from "./files.js";
import { extractTextFromDocument } from "./document.js";
import { extractTextFromImage } from "./image.js";
import type { ExtractionResult, TextExtractors, UploadedFile } from "./types.js";

export { ALLOWED_EXTENSIONS, FILE_KINDS, detectFileKind, secureFilename } from "./files.js";
export type { FileKind } from "./files.js";
export type { ExtractionResult, TextExtractors, UploadedFile } from "./types.js";
export { extractTextFromDocument, extractTextFromImage };

export const defaultExtractors: TextExtractors = {
    image: (file) => extractTextFromImage(file),
    document: extractTextFromDocument,
};

/**
 * Dispatch on file kind. Failures are logged and reported as `success: false`;
 * audio has no extractor.
 */
export async function extractFileText(
    kind: FileKind,
    file: UploadedFile,
    extractors: TextExtractors,
    log: Pick<Logger, "error">,
): Promise<ExtractionResult> {
    try {
        switch (kind) {
            case "image": {
                const text = await extractors.image(file);
                return { text, success: text.length > 0 };
            }
            case "document":
                return await extractors.document(file);
            case "audio":
                return { text: "", success: false };
        }
    } catch (err) {
        log.error({ kind, operation: "extract", err: describeError(err) }, "text extraction failed");
        return { text: "", success: false };
    }
}
