import { ExtractionFailed } from "../errors.js";
import type { ExtractedText, PageTextExtractor } from "./types.js";

const PAGE_SEPARATOR = "\f";

/**
 * Reads already-extracted UTF-8 text where pages are separated by form feeds,
 * the layout `pdftotext` writes. Pages are rejoined with a newline.
 */
export class FormFeedTextExtractor implements PageTextExtractor {
  async extract(bytes: Uint8Array): Promise<ExtractedText> {
    let decoded: string;
    try {
      decoded = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (error) {
      throw new ExtractionFailed("Document bytes are not valid UTF-8 text", { cause: error });
    }

    const pages = decoded.replace(/^\uFEFF/, "").split(PAGE_SEPARATOR);
    if (pages.length > 1 && pages[pages.length - 1].trim().length === 0) {
      pages.pop();
    }
    if (pages.every((page) => page.trim().length === 0)) {
      throw new ExtractionFailed("Document contains no extractable text");
    }

    const pageBreakOffsets: number[] = [];
    let fullText = "";
    pages.forEach((page, index) => {
      if (index > 0) {
        fullText += "\n";
        pageBreakOffsets.push(fullText.length);
      }
      fullText += page;
    });

    return { fullText, pageBreakOffsets };
  }
}
