/**
 * @file Specs: projection, filtering and combined queries
 */
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join as joinPath } from "node:path";
import * as fc from "fast-check";
import { createMemoryBlockFile } from "../storage/memory";
import { createWriter } from "../util/bin";
import { resolveEngineOptions } from "../constants/format";
import { encodeTrailer } from "./trailer";
import { filter, filterFile, project, projectAndFilter, projectAndFilterFile, projectFile } from "./query";
import { COLUMN_TYPE, type EngineOptions, type GroupDescriptor, type Metadata } from "./types";

/** Lay out `rows` (full width) over groups of the given column names, back to back. */
function buildFile(layout: string[][], rows: number[][]): { bytes: Uint8Array; metadata: Metadata } {
  const w = createWriter("little");
  const groups = layout.map((names, gi): GroupDescriptor => {
    const start = layout.slice(0, gi).reduce((n, g) => n + g.length, 0);
    const offset = w.byteLength();
    rows.forEach((row) => row.slice(start, start + names.length).forEach((v) => w.pushF32(v)));
    return { offset, numColumns: names.length, columns: names.map((name) => ({ name, type: COLUMN_TYPE })) };
  });
  const metadata: Metadata = { numRows: rows.length, numGroups: groups.length, groups };
  w.pushBytes(encodeTrailer(metadata, "little"));
  return { bytes: w.concat(), metadata };
}

const opts = (o?: Partial<EngineOptions>): EngineOptions => resolveEngineOptions({ byteOrder: "little", ...o });

describe("hty/query", () => {
  const single = buildFile([["a", "b"]], [
    [1, 2],
    [3, 4],
    [5, 6],
  ]);
  const file = createMemoryBlockFile(single.bytes);

  describe("single group", () => {
    it("projects a column", () => {
      expect(projectFile(file, single.metadata, ["a"], opts())).toEqual([{ name: "a", values: [1, 3, 5] }]);
    });

    it("filters a column", () => {
      expect(filterFile(file, single.metadata, { column: "b", op: ">", value: 3 }, opts())).toEqual([4, 6]);
    });

    it("projects one column while filtering on another", () => {
      const out = projectAndFilterFile(file, single.metadata, ["a"], { column: "b", op: ">", value: 3 }, opts());
      expect(out).toEqual([{ name: "a", values: [3, 5] }]);
    });

    it("keeps requested order and repeats", () => {
      const out = projectFile(file, single.metadata, ["b", "a", "b"], opts());
      expect(out.map((c) => c.values)).toEqual([
        [2, 4, 6],
        [1, 3, 5],
        [2, 4, 6],
      ]);
    });

    it("returns every row for an always-true filter", () => {
      const out = projectAndFilterFile(file, single.metadata, ["a", "b"], { column: "a", op: ">=", value: -1 }, opts());
      expect(out).toEqual(projectFile(file, single.metadata, ["a", "b"], opts()));
    });

    it("filtering with >= -Infinity returns the projected column", () => {
      for (const column of ["a", "b"]) {
        const where = { column, op: ">=", value: Number.NEGATIVE_INFINITY };
        expect(filterFile(file, single.metadata, where, opts())).toEqual(
          projectFile(file, single.metadata, [column], opts())[0].values,
        );
      }
    });

    it("scans every row when given an unusable batch size", () => {
      for (const scanBatchRows of [Number.NaN, 0, -1]) {
        expect(projectFile(file, single.metadata, ["a"], { ...opts(), scanBatchRows })).toEqual([
          { name: "a", values: [1, 3, 5] },
        ]);
      }
    });

    it("matches = within tolerance and accepts ==", () => {
      const where = { column: "a", op: "==", value: 3.0000001 };
      expect(filterFile(file, single.metadata, where, opts())).toEqual([3]);
      expect(filterFile(file, single.metadata, { ...where, op: "!=" }, opts())).toEqual([1, 5]);
    });

    it("gives empty sequences for a file without rows", () => {
      const empty = buildFile([["a"]], []);
      const f = createMemoryBlockFile(empty.bytes);
      expect(projectFile(f, empty.metadata, ["a"], opts())).toEqual([{ name: "a", values: [] }]);
      expect(filterFile(f, empty.metadata, { column: "a", op: ">", value: 0 }, opts())).toEqual([]);
    });
  });

  describe("several groups", () => {
    const multi = buildFile(
      [["a", "b"], ["c"]],
      [
        [1, 2, 10],
        [3, 4, 20],
        [5, 6, 30],
      ],
    );
    const mf = createMemoryBlockFile(multi.bytes);

    it("reads columns of a later group", () => {
      expect(projectFile(mf, multi.metadata, ["c"], opts())).toEqual([{ name: "c", values: [10, 20, 30] }]);
    });

    it("rejects projections across groups", () => {
      expect(() => projectFile(mf, multi.metadata, ["a", "c"], opts())).toThrow(
        "columns span more than one group: a@0, c@1",
      );
    });

    it("includes the filter column in the same-group check", () => {
      expect(() =>
        projectAndFilterFile(mf, multi.metadata, ["a"], { column: "c", op: ">", value: 15 }, opts()),
      ).toThrow("columns span more than one group: a@0, c@1");
    });

    it("fails for unknown columns and empty requests", () => {
      expect(() => projectFile(mf, multi.metadata, ["zz"], opts())).toThrow("column not found: zz");
      expect(() => projectFile(mf, multi.metadata, [], opts())).toThrow("no columns requested");
      expect(() =>
        projectAndFilterFile(mf, multi.metadata, [], { column: "a", op: ">", value: 0 }, opts()),
      ).toThrow("no columns requested");
    });
  });

  it("returns the same result for every scan batch size", () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.integer({ min: -50, max: 50 }), fc.integer({ min: -50, max: 50 })), { maxLength: 30 }),
        fc.integer({ min: 1, max: 40 }),
        fc.integer({ min: -50, max: 50 }),
        (pairs, batch, threshold) => {
          const built = buildFile([["x", "y"]], pairs.map(([x, y]) => [x, y]));
          const f = createMemoryBlockFile(built.bytes);
          const where = { column: "y", op: "<=", value: threshold };
          const expected = pairs.filter(([, y]) => y <= threshold).map(([x]) => x);
          const out = projectAndFilterFile(f, built.metadata, ["x"], where, opts({ scanBatchRows: batch }));
          expect(out).toEqual([{ name: "x", values: expected }]);
        },
      ),
    );
  });

  describe("path wrappers", () => {
    it("open, query and close a file on disk", async () => {
      const dir = await mkdtemp(joinPath(tmpdir(), "hty-query-"));
      try {
        const p = joinPath(dir, "t.hty");
        await writeFile(p, single.bytes);
        expect(project(p, ["b"], opts())).toEqual([{ name: "b", values: [2, 4, 6] }]);
        expect(filter(p, { column: "a", op: "<", value: 3 }, opts())).toEqual([1]);
        expect(projectAndFilter(p, ["b"], { column: "a", op: "=", value: 5 }, opts())).toEqual([
          { name: "b", values: [6] },
        ]);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it("rejects a bad operator before touching the file", () => {
      const missing = joinPath(tmpdir(), "hty-query-missing", "none.hty");
      expect(() => filter(missing, { column: "a", op: "=>", value: 1 })).toThrow("invalid predicate operator: =>");
      expect(() => projectAndFilter(missing, ["a"], { column: "a", op: "~", value: 1 })).toThrow(
        "invalid predicate operator: ~",
      );
    });

    it("reports a missing file as IOUnavailable", () => {
      const missing = joinPath(tmpdir(), "hty-query-missing", "none.hty");
      expect(() => project(missing, ["a"])).toThrow(/^cannot open /);
    });
  });
});
