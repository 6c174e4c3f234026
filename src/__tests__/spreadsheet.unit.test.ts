import { describe, expect, it } from "vitest";
import { selectSheetName } from "../data/spreadsheet";

describe("selectSheetName", () => {
  it("should prefer the requested sheet", () => {
    expect(selectSheetName(["notes", "title.basics"], "title.basics")).toBe(
      "title.basics",
    );
  });

  it("should fall back to the only sheet of a workbook", () => {
    expect(selectSheetName(["Sheet1"], "title.basics")).toBe("Sheet1");
  });

  it("should give up when several sheets exist and none matches", () => {
    expect(selectSheetName(["a", "b"], "title.basics")).toBeNull();
  });
});
