// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { extname } from "path";

import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";

import { ExtractionError } from "@edugate/core";

import type { ExtractionResult, UploadedFile } from "./types.js";

async function pdfText(data: Buffer): Promise<string> {
    // pdf.js rejects Node Buffers; hand it a plain Uint8Array copy.
    const parser = new PDFParse({ data: new Uint8Array(data) });
    try {
        const result = await parser.getText();
        return result.text;
    } finally {
        await parser.destroy();
    }
}

async function docxText(data: Buffer): Promise<string> {
    const result = await mammoth.extractRawText({ buffer: data });
    return result.value;
}

/** PDF or DOCX to plain text. `success` is false when nothing readable came out. */
export async function extractTextFromDocument(file: UploadedFile): Promise<ExtractionResult> {
    const ext = extname(file.filename).toLowerCase();

    let text: string;
    try {
        if (ext === ".pdf") {
            text = await pdfText(file.data);
        } else if (ext === ".docx") {
            text = await docxText(file.data);
        } else {
            return { text: "", success: false };
        }
    } catch (err) {
        throw new ExtractionError(ext.slice(1) || "document", String(err));
    }

    const trimmed = text.trim();
    return { text: trimmed, success: trimmed.length > 0 };
}
