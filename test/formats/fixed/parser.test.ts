/**
 * Tests for the fixed-width record reader
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ReadableStream } from "node:stream/web";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { FileError, InsufficientBufferError, ParseError, ValidationError } from "../../../src/errors";
import { LayoutBuilder } from "../../../src/formats/fixed/builder";
import type { Layout } from "../../../src/formats/fixed/layout";
import { FixedWidthParser, parseFixedWidth } from "../../../src/formats/fixed/parser";
import type { FixedRecord } from "../../../src/formats/fixed/types";
import type { ErrorHandler, WarningHandler } from "../../../src/types";

function ledgerLayout(): Layout {
  return new LayoutBuilder()
    .field("code").width(4).append()
    .spacer(4, 5).append()
    .field("amount").width(5).alignment("right").padding("0").append()
    .build();
}

async function collect(records: AsyncIterable<FixedRecord>): Promise<FixedRecord[]> {
  const result: FixedRecord[] = [];
  for await (const record of records) {
    result.push(record);
  }
  return result;
}

function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller): void {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

describe("FixedWidthParser", () => {
  const layout = ledgerLayout();

  describe("parseString", () => {
    test("parses every line into a record", async () => {
      const parser = new FixedWidthParser({ layout });
      const records = await collect(parser.parseString("ABCD 01234\nWXYZ 00007\n"));

      expect(records).toEqual([
        { code: "ABCD", amount: "1234" },
        { code: "WXYZ", amount: "7" },
      ]);
    });

    test("accepts \\r\\n and \\r line endings", async () => {
      const parser = new FixedWidthParser({ layout });
      const records = await collect(
        parser.parseString("ABCD 01234\r\nWXYZ 00007\rQRST 00100")
      );

      expect(records.map((r) => r.code)).toEqual(["ABCD", "WXYZ", "QRST"]);
    });

    test("skips empty lines by default", async () => {
      const onError = vi.fn<ErrorHandler>();
      const parser = new FixedWidthParser({ layout, onError });
      const records = await collect(parser.parseString("ABCD 01234\n\nWXYZ 00007"));

      expect(records).toHaveLength(2);
      expect(onError).not.toHaveBeenCalled();
    });

    test("reports empty lines when asked not to skip them", async () => {
      const onError = vi.fn<ErrorHandler>();
      const parser = new FixedWidthParser({ layout, onError, skipEmptyLines: false });
      const records = await collect(parser.parseString("ABCD 01234\n\nWXYZ 00007"));

      expect(records).toHaveLength(2);
      expect(onError).toHaveBeenCalledWith(
        "Insufficient buffer size, required 10 only 0 available",
        2
      );
    });
  });

  describe("Error recovery", () => {
    test("skips short lines and reports them with their line number", async () => {
      const onError = vi.fn<ErrorHandler>();
      const parser = new FixedWidthParser({ layout, onError });
      const records = await collect(parser.parseString("ABCD 01234\nSHORT\nWXYZ 00007"));

      expect(records).toEqual([
        { code: "ABCD", amount: "1234" },
        { code: "WXYZ", amount: "7" },
      ]);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(
        "Insufficient buffer size, required 10 only 5 available",
        2
      );
    });

    test("forwards errors to onWarning when no onError is given", async () => {
      const onWarning = vi.fn<WarningHandler>();
      const parser = new FixedWidthParser({ layout, onWarning });
      const records = await collect(parser.parseString("SHORT\nABCD 01234"));

      expect(records).toHaveLength(1);
      expect(onWarning).toHaveBeenCalledWith(
        "Skipped record: Insufficient buffer size, required 10 only 5 available",
        1
      );
    });

    test("writes warnings to the console by default", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      try {
        const parser = new FixedWidthParser({ layout });
        await collect(parser.parseString("SHORT"));

        expect(warn).toHaveBeenCalledWith(
          "FIXED Warning (line 1): Skipped record: Insufficient buffer size, required 10 only 5 available"
        );
      } finally {
        warn.mockRestore();
      }
    });

    test("an onError that throws stops parsing", async () => {
      const parser = new FixedWidthParser({
        layout,
        onError: (message, lineNumber) => {
          throw new ParseError(message, "FIXED", lineNumber);
        },
      });

      await expect(collect(parser.parseString("ABCD 01234\nSHORT"))).rejects.toThrow(
        "Insufficient buffer size, required 10 only 5 available"
      );
    });

    test("rejects lines longer than maxLineLength", async () => {
      const onError = vi.fn<ErrorHandler>();
      const parser = new FixedWidthParser({ layout, onError, maxLineLength: 12 });
      const records = await collect(parser.parseString("ABCD 01234EXTRA\nWXYZ 00007"));

      expect(records).toEqual([{ code: "WXYZ", amount: "7" }]);
      expect(onError).toHaveBeenCalledWith("Line length 15 exceeds maximum 12", 1);
    });

    test("stops with a ParseError once the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const parser = new FixedWidthParser({ layout, signal: controller.signal });

      await expect(collect(parser.parseString("ABCD 01234"))).rejects.toThrow(
        "Operation aborted during FIXED record parsing at line 1"
      );
    });
  });

  describe("parseLine", () => {
    test("returns the record for a valid line", () => {
      const parser = new FixedWidthParser({ layout });
      expect(parser.parseLine("ABCD 01234")).toEqual({
        success: true,
        value: { code: "ABCD", amount: "1234" },
      });
    });

    test("attaches the line number to failures", () => {
      const parser = new FixedWidthParser({ layout });
      const result = parser.parseLine("ABC", 3);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InsufficientBufferError);
        expect(result.error.lineNumber).toBe(3);
      }
    });
  });

  describe("parseLines", () => {
    test("reads an async iterable of lines", async () => {
      async function* lines(): AsyncGenerator<string> {
        yield "ABCD 01234";
        yield "WXYZ 00007";
      }
      const parser = new FixedWidthParser({ layout });

      expect(await collect(parser.parseLines(lines()))).toHaveLength(2);
    });
  });

  describe("parse (stream)", () => {
    test("decodes characters split across chunks", async () => {
      const jp = new LayoutBuilder().field("jp").width(3).append().build();
      const bytes = new TextEncoder().encode("あいう\nかきく\n");
      const parser = new FixedWidthParser({ layout: jp });

      const records = await collect(parser.parse(streamOf([bytes.slice(0, 1), bytes.slice(1)])));

      expect(records).toEqual([{ jp: "あいう" }, { jp: "かきく" }]);
    });

    test("decodes latin1 when the encoding is binary", async () => {
      const single = new LayoutBuilder().field("name").width(4).append().build();
      const parser = new FixedWidthParser({ layout: single, encoding: "binary" });

      const records = await collect(parser.parse(streamOf([new Uint8Array([0x63, 0x61, 0x66, 0xe9])])));

      expect(records).toEqual([{ name: "café" }]);
    });
  });

  describe("parseFile", () => {
    let directory: string;
    let ledgerPath: string;

    beforeAll(() => {
      directory = mkdtempSync(join(tmpdir(), "fixedline-parser-"));
      ledgerPath = join(directory, "ledger.dat");
      writeFileSync(ledgerPath, "ABCD 01234\nWXYZ 00007\nQRST 00100\n");
    });

    afterAll(() => {
      rmSync(directory, { recursive: true, force: true });
    });

    test("reads records from a file", async () => {
      const parser = new FixedWidthParser({ layout });
      const records = await collect(parser.parseFile(ledgerPath));

      expect(records.map((r) => r.amount)).toEqual(["1234", "7", "100"]);
    });

    test("decodes with the encoding given to parseFile", async () => {
      const latin1Path = join(directory, "latin1.dat");
      writeFileSync(latin1Path, Buffer.from([0xe9, 0x41, 0x42, 0x0a]));
      const single = new LayoutBuilder().field("x").width(3).append().build();
      const parser = new FixedWidthParser({ layout: single });

      expect(await collect(parser.parseFile(latin1Path, { encoding: "binary" }))).toEqual([
        { x: "éAB" },
      ]);
    });

    test("rejects a missing file with a FileError", async () => {
      const parser = new FixedWidthParser({ layout });

      await expect(collect(parser.parseFile(join(directory, "missing.dat")))).rejects.toThrow(
        FileError
      );
    });
  });

  describe("Options", () => {
    test("rejects a non-positive maxLineLength", () => {
      expect(() => new FixedWidthParser({ layout, maxLineLength: 0 })).toThrow(ValidationError);
    });
  });

  describe("parseFixedWidth", () => {
    test("collects every record of a string", async () => {
      expect(await parseFixedWidth("ABCD 01234", { layout })).toEqual([
        { code: "ABCD", amount: "1234" },
      ]);
    });
  });
});
