import { describe, expect, it } from "vitest";
import { ResultShapes } from "../../../src/command/result-shapes";
import type { StatementResult } from "../../../src/contracts/database-client.contract";
import { CardinalityViolationError } from "../../../src/errors/cardinality-violation.error";

const twoRows: StatementResult = {
  rows: [
    { code: "GBP", rate: 0.63 },
    { code: "EUR", rate: 0.91 },
  ],
  rowCount: 2,
  columns: ["code", "rate"],
};

const oneRow: StatementResult = {
  rows: [{ code: "GBP", rate: 0.63 }],
  rowCount: 1,
  columns: ["code", "rate"],
};

const noRows: StatementResult = { rows: [], rowCount: 0, columns: ["code", "rate"] };

describe("ResultShapes", () => {
  it("rowsAffected should return the row count", () => {
    expect(ResultShapes.rowsAffected().read({ rows: [], rowCount: 4, columns: [] })).toBe(4);
  });

  it("records should return every row", () => {
    expect(ResultShapes.records().read(twoRows).toArray()).toEqual(twoRows.rows);
  });

  it("records should map rows", () => {
    const codes = ResultShapes.records((row) => String(row.code)).read(twoRows);

    expect(codes.toArray()).toEqual(["GBP", "EUR"]);
  });

  it("tuples should follow the column order", () => {
    const result: StatementResult = { ...twoRows, columns: ["rate", "code"] };

    expect(ResultShapes.tuples().read(result).toArray()).toEqual([
      [0.63, "GBP"],
      [0.91, "EUR"],
    ]);
  });

  describe("singleRecord()", () => {
    it("should be present for exactly one row", () => {
      expect(ResultShapes.singleRecord().read(oneRow)).toEqual({
        kind: "some",
        value: { code: "GBP", rate: 0.63 },
      });
    });

    it("should be absent for zero rows", () => {
      expect(ResultShapes.singleRecord().read(noRows)).toEqual({ kind: "none" });
    });

    it("should throw for two rows", () => {
      expect(() => ResultShapes.singleRecord().read(twoRows)).toThrow(
        new CardinalityViolationError(2),
      );
    });
  });

  it("singleTuple should return the values in column order", () => {
    expect(ResultShapes.singleTuple().read(oneRow)).toEqual({
      kind: "some",
      value: ["GBP", 0.63],
    });
  });

  describe("scalar()", () => {
    it("should read the first column", () => {
      const result: StatementResult = { rows: [{ total: "3" }], rowCount: 1, columns: ["total"] };

      expect(ResultShapes.scalar(Number).read(result)).toEqual({ kind: "some", value: 3 });
    });

    it("should throw for two rows", () => {
      expect(() => ResultShapes.scalar().read(twoRows)).toThrow(CardinalityViolationError);
    });
  });
});
