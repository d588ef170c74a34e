import mammoth from "mammoth";
import { Buffer } from "buffer";
import { createRequire } from "module";
import { ValidationError } from "./utils/errorHandler";

const SUPPORTED_EXTENSIONS = ["txt", "md", "docx", "pdf"] as const;

// pdf-parse is CommonJS only; the lib entry skips its debug self-test
const require = createRequire(import.meta.url);
let pdfParse: typeof import("pdf-parse") | null = null;
function getPdfParse(): typeof import("pdf-parse") {
  if (pdfParse) return pdfParse;
  const loaded: typeof import("pdf-parse") = require("pdf-parse/lib/pdf-parse.js");
  pdfParse = loaded;
  return loaded;
}

export function getExtension(filename: string): string {
  const parts = filename.toLowerCase().split(".");
  return parts.length > 1 ? parts[parts.length - 1] : "";
}

export async function extractTextFromFile(buffer: Buffer, filename: string): Promise<string> {
  const extension = getExtension(filename);

  switch (extension) {
    case "txt":
    case "md":
      return buffer.toString("utf-8");

    case "docx": {
      const result = await mammoth.extractRawText({ buffer });
      return result.value;
    }

    case "pdf": {
      const data = await getPdfParse()(buffer);
      return data.text;
    }

    default:
      throw new ValidationError(
        `Unsupported file type: ${extension || "(none)"} (expected ${SUPPORTED_EXTENSIONS.join(", ")})`,
      );
  }
}
