// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * OCR through the system `tesseract` binary.
 * The upload is written to a private temp directory which is removed afterwards.
 */

import { execFile } from "child_process";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { promisify } from "util";

import { ExtractionError } from "@edugate/core";

import type { UploadedFile } from "./types.js";

const run = promisify(execFile);

export interface TesseractOptions {
    binary?: string;
    language?: string;
    timeoutMs?: number;
}

export async function extractTextFromImage(
    file: UploadedFile,
    opts: TesseractOptions = {},
): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), "edugate-ocr-"));
    const input = join(dir, file.filename || "upload.png");

    try {
        await writeFile(input, file.data);
        const { stdout } = await run(
            opts.binary ?? "tesseract",
            [input, "stdout", "-l", opts.language ?? "eng"],
            { timeout: opts.timeoutMs ?? 60_000, maxBuffer: 16 * 1024 * 1024 },
        );
        return stdout.trim();
    } catch (err) {
        throw new ExtractionError("image", String(err));
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
}
