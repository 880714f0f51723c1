// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export interface UploadedFile {
    /** Sanitised client file name; the extension decides the extractor. */
    filename: string;
    data: Buffer;
}

export interface ExtractionResult {
    text: string;
    success: boolean;
}

/** OCR and document parsing, injectable so tests can run without tesseract or real files. */
export interface TextExtractors {
    image(file: UploadedFile): Promise<string>;
    document(file: UploadedFile): Promise<ExtractionResult>;
}
