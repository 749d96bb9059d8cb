import { describe, it, expect, vi, beforeEach } from "vitest";
import { ExtractionError } from "../../errors.js";
import { extractPdfPages, pdfExtractor } from "../../extractors/pdf.js";
import { silentLogger } from "../../logger.js";

const { getDocument } = vi.hoisted(() => ({ getDocument: vi.fn() }));

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({ getDocument }));

interface FakeItem {
  str?: string;
  hasEOL?: boolean;
  type?: string;
}

function fakePage(items: FakeItem[]) {
  return {
    getTextContent: vi.fn().mockResolvedValue({ items }),
    cleanup: vi.fn(),
  };
}

function fakePdf(pages: ReturnType<typeof fakePage>[], info: Record<string, unknown> = {}) {
  return {
    numPages: pages.length,
    getPage: vi.fn(async (n: number) => pages[n - 1]),
    getMetadata: vi.fn().mockResolvedValue({ info }),
    destroy: vi.fn().mockResolvedValue(undefined),
  };
}

const input = { sourceId: "manuals/pump.pdf", origin: "manuals/pump.pdf", data: new Uint8Array([37, 80, 68, 70]), name: "pump" };
const context = { logger: silentLogger, jsonlTextKey: "text", stripBoilerplate: true };

describe("extractPdfPages", () => {
  beforeEach(() => {
    getDocument.mockReset();
  });

  it("returns page texts in order and the document title", async () => {
    const pages = [
      fakePage([{ str: "Hello", hasEOL: false }, { str: " world.", hasEOL: true }, { type: "beginMarkedContent" }]),
      fakePage([{ str: "Second page.", hasEOL: false }]),
    ];
    const pdf = fakePdf(pages, { Title: " Pump manual " });
    getDocument.mockReturnValue({ promise: Promise.resolve(pdf) });

    await expect(extractPdfPages(input.data)).resolves.toEqual({
      pages: ["Hello world.\n", "Second page."],
      title: "Pump manual",
    });
    expect(pages[0].cleanup).toHaveBeenCalledTimes(1);
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it("passes a copy of the bytes with eval disabled", async () => {
    getDocument.mockReturnValue({ promise: Promise.resolve(fakePdf([])) });
    await extractPdfPages(input.data);

    const [params] = getDocument.mock.calls[0];
    expect(params.isEvalSupported).toBe(false);
    expect(params.data).toEqual(input.data);
    expect(params.data).not.toBe(input.data);
  });

  it("destroys the document when a page fails", async () => {
    const broken = { getTextContent: vi.fn().mockRejectedValue(new Error("bad page")), cleanup: vi.fn() };
    const pdf = fakePdf([broken]);
    getDocument.mockReturnValue({ promise: Promise.resolve(pdf) });

    await expect(extractPdfPages(input.data)).rejects.toThrow("bad page");
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });
});

describe("pdfExtractor", () => {
  beforeEach(() => {
    getDocument.mockReset();
  });

  it("joins pages into one document", async () => {
    getDocument.mockReturnValue({
      promise: Promise.resolve(fakePdf([fakePage([{ str: "Page one." }]), fakePage([{ str: "Page two." }])])),
    });

    const docs = await pdfExtractor.extract(input, context);
    expect(docs).toEqual([
      {
        sourceId: "manuals/pump.pdf",
        origin: "manuals/pump.pdf",
        format: "pdf",
        rawText: "Page one.\nPage two.",
        title: "pump",
        metadata: {},
      },
    ]);
  });

  it("wraps parser failures in an ExtractionError", async () => {
    getDocument.mockImplementation(() => ({ promise: Promise.reject(new Error("Invalid PDF structure.")) }));

    const promise = pdfExtractor.extract(input, context);
    await expect(promise).rejects.toBeInstanceOf(ExtractionError);
    await expect(promise).rejects.toThrow("Extraction failed for manuals/pump.pdf: unreadable PDF (Invalid PDF structure.)");
  });
});
