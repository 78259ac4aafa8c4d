import { describe, expect, test } from "vitest";
import { Alignment, type FixedRecord, FixedWidthParser, FixedWidthWriter, LayoutBuilder } from "../src";

describe("Public API", () => {
  test("builds, writes and reads through the package entry point", async () => {
    const layout = new LayoutBuilder()
      .field("test-1").width(5).append()
      .field("test-2").width(5).alignment(Alignment.Right).padding("0").append()
      .build();

    const text = new FixedWidthWriter({ layout }).formatRecords([
      { "test-1": "ABCD", "test-2": "1234" },
    ]);
    expect(text).toBe("ABCD 01234");

    const records: FixedRecord[] = [];
    for await (const record of new FixedWidthParser({ layout }).parseString(text)) {
      records.push(record);
    }
    expect(records).toEqual([{ "test-1": "ABCD", "test-2": "1234" }]);
  });
});
