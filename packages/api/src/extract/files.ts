// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { basename, extname } from "path";

export const FILE_KINDS = ["image", "document", "audio"] as const;

export type FileKind = (typeof FILE_KINDS)[number];

export const ALLOWED_EXTENSIONS: Record<FileKind, readonly string[]> = {
    image: ["png", "jpg", "jpeg", "gif", "bmp", "tiff"],
    document: ["pdf", "docx"],
    audio: ["mp3", "wav", "m4a"],
};

/** Strip directories and anything outside [A-Za-z0-9._-] from a client-supplied name. */
export function secureFilename(name: string): string {
    return basename(name.replace(/\\/g, "/"))
        .normalize("NFKD")
        .replace(/\s+/g, "_")
        .replace(/[^A-Za-z0-9._-]/g, "")
        .replace(/^[._]+/, "");
}

/** Kind of file by extension, or undefined when the extension is not accepted. */
export function detectFileKind(filename: string): FileKind | undefined {
    const ext = extname(filename).slice(1).toLowerCase();
    if (!ext) return undefined;
    return FILE_KINDS.find((kind) => ALLOWED_EXTENSIONS[kind].includes(ext));
}
