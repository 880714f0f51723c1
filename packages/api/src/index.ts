// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { createServer, startServer } from "./server.js";
export { OFF_TOPIC_FILE, OFF_TOPIC_TEXT } from "./routes/chat.js";
export { NO_FILE, UNSUPPORTED } from "./routes/upload.js";
export {
    ALLOWED_EXTENSIONS,
    FILE_KINDS,
    defaultExtractors,
    detectFileKind,
    extractFileText,
    extractTextFromDocument,
    extractTextFromImage,
    secureFilename,
} from "./extract/index.js";
export type { ExtractionResult, FileKind, TextExtractors, UploadedFile } from "./extract/index.js";
export type {
    ApiServerOptions,
    ChatAnswer,
    ChatTextRequest,
    ClassifyRequest,
    ClassifyResponse,
    ErrorBody,
    ExtractResponse,
    HealthQuery,
    HealthResponse,
    ProviderHealth,
    RouteDeps,
} from "./types.js";
