import { describe, it, expect } from "vitest";
import { Buffer } from "buffer";
import { extractTextFromFile, getExtension } from "../textExtractor";
import { ValidationError } from "../utils/errorHandler";

describe("textExtractor", () => {
  it("lowercases the last extension", () => {
    expect(getExtension("Notes.Final.MD")).toBe("md");
    expect(getExtension("README")).toBe("");
  });

  it("reads plain text and markdown as utf-8", async () => {
    await expect(extractTextFromFile(Buffer.from("Refunds within 30 days", "utf-8"), "refunds.txt"))
      .resolves.toBe("Refunds within 30 days");
    await expect(extractTextFromFile(Buffer.from("# Pricing", "utf-8"), "pricing.md")).resolves.toBe("# Pricing");
  });

  it("rejects an unsupported type and names the supported ones", async () => {
    const pending = extractTextFromFile(Buffer.from("a,b"), "report.xls");
    await expect(pending).rejects.toBeInstanceOf(ValidationError);
    await expect(pending).rejects.toThrow("Unsupported file type: xls (expected txt, md, docx, pdf)");
  });

  it("rejects a file without an extension", async () => {
    await expect(extractTextFromFile(Buffer.from("x"), "README"))
      .rejects.toThrow("Unsupported file type: (none) (expected txt, md, docx, pdf)");
  });
});
