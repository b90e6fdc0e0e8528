/**
 * @file Specs: trailer codec (encode, decode, validation)
 */
import * as fc from "fast-check";
import { createMemoryBlockFile } from "../storage/memory";
import { createWriter, type ByteOrder } from "../util/bin";
import { CorruptTrailerError } from "./errors";
import { decodeMetadata, encodeMetadata, encodeTrailer, groupBlockSize, parseMetadata, readTrailer } from "./trailer";
import { COLUMN_TYPE, type ColumnDescriptor, type GroupDescriptor, type Metadata } from "./types";

function col(name: string): ColumnDescriptor {
  return { name, type: COLUMN_TYPE };
}

/** Zero-filled data region big enough for every group, followed by the trailer. */
function fileFor(m: Metadata, order: ByteOrder): Uint8Array {
  const dataEnd = m.groups.reduce((end, g) => Math.max(end, g.offset + groupBlockSize(g, m.numRows)), 0);
  const w = createWriter(order);
  w.pushBytes(new Uint8Array(dataEnd));
  w.pushBytes(encodeTrailer(m, order));
  return w.concat();
}

function rawTrailer(json: string, order: ByteOrder = "little"): Uint8Array {
  const body = new TextEncoder().encode(json);
  const w = createWriter(order);
  w.pushBytes(body);
  w.pushI32(body.length);
  return w.concat();
}

const metadataArb = fc
  .record({
    numRows: fc.nat({ max: 40 }),
    layout: fc.array(fc.array(fc.fullUnicodeString({ maxLength: 8 }), { maxLength: 4 }), { maxLength: 4 }),
  })
  .map(({ numRows, layout }): Metadata => {
    const groups = layout.reduce<{ next: number; out: GroupDescriptor[] }>(
      (acc, names) => {
        const g = { offset: acc.next, numColumns: names.length, columns: names.map(col) };
        return { next: acc.next + groupBlockSize(g, numRows), out: [...acc.out, g] };
      },
      { next: 0, out: [] },
    ).out;
    return { numRows, numGroups: groups.length, groups };
  });

const sample: Metadata = {
  numRows: 2,
  numGroups: 1,
  groups: [{ offset: 0, numColumns: 1, columns: [col("a")] }],
};

describe("hty/trailer", () => {
  it("encodes metadata as JSON with sorted keys", () => {
    expect(new TextDecoder().decode(encodeMetadata(sample))).toBe(
      '{"groups":[{"columns":[{"column_name":"a","column_type":"float"}],"num_columns":1,"offset":0}],"num_groups":1,"num_rows":2}',
    );
  });

  it("ends the trailer with the metadata length", () => {
    const json = encodeMetadata(sample);
    const trailer = encodeTrailer(sample, "big");
    expect(trailer.length).toBe(json.length + 4);
    expect(Array.from(trailer.subarray(json.length))).toEqual([0, 0, 0, json.length]);
  });

  it("reads back any well-formed layout in either byte order", () => {
    fc.assert(
      fc.property(metadataArb, fc.constantFrom<ByteOrder>("little", "big"), (m, order) => {
        expect(readTrailer(createMemoryBlockFile(fileFor(m, order)), order)).toEqual(m);
      }),
    );
  });

  it("accepts an empty file layout", () => {
    const empty: Metadata = { numRows: 0, numGroups: 0, groups: [] };
    expect(readTrailer(createMemoryBlockFile(fileFor(empty, "little")), "little")).toEqual(empty);
  });

  it("accepts columns: null for a zero-column group", () => {
    const m = decodeMetadata(
      new TextEncoder().encode('{"groups":[{"columns":null,"num_columns":0,"offset":0}],"num_groups":1,"num_rows":0}'),
    );
    expect(m.groups).toEqual([{ offset: 0, numColumns: 0, columns: [] }]);
  });

  describe("corrupt files", () => {
    const read = (bytes: Uint8Array, order: ByteOrder = "little") => () =>
      readTrailer(createMemoryBlockFile(bytes), order);

    it("rejects files shorter than the length field", () => {
      expect(read(new Uint8Array(3))).toThrow("corrupt trailer: file is 3 bytes, shorter than the length field");
    });

    it("rejects a negative length", () => {
      expect(read(new Uint8Array([0xff, 0xff, 0xff, 0xff]))).toThrow("corrupt trailer: negative metadata length -1");
    });

    it("rejects a length larger than the file", () => {
      const w = createWriter("little");
      w.pushI32(100);
      expect(read(w.concat())).toThrow("corrupt trailer: metadata length 100 exceeds file size 4");
    });

    it("rejects malformed JSON", () => {
      expect(read(rawTrailer("{oops"))).toThrow("corrupt trailer: metadata is not valid UTF-8 JSON");
    });

    it("rejects a group block that runs past the data region", () => {
      const json = '{"groups":[{"columns":[{"column_name":"a","column_type":"float"}],"num_columns":1,"offset":0}],"num_groups":1,"num_rows":2}';
      expect(read(rawTrailer(json))).toThrow(
        "corrupt trailer: groups[0] block ends at 8, past the data region end 0",
      );
    });

    it("rejects a file read with the wrong byte order", () => {
      expect(read(fileFor(sample, "big"), "little")).toThrow(CorruptTrailerError);
    });
  });

  describe("parseMetadata", () => {
    it("rejects mismatched counts", () => {
      expect(() => parseMetadata({ num_rows: 0, num_groups: 2, groups: [] })).toThrow(
        "corrupt trailer: num_groups is 2 but 0 groups are listed",
      );
      expect(() =>
        parseMetadata({ num_rows: 0, num_groups: 1, groups: [{ offset: 0, num_columns: 1, columns: [] }] }),
      ).toThrow("corrupt trailer: groups[0].num_columns is 1 but 0 columns are listed");
    });

    it("rejects unsupported column types", () => {
      const raw = {
        num_rows: 0,
        num_groups: 1,
        groups: [{ offset: 0, num_columns: 1, columns: [{ column_name: "a", column_type: "int" }] }],
      };
      expect(() => parseMetadata(raw)).toThrow('corrupt trailer: groups[0].columns[0].column_type "int" is not supported');
    });

    it("rejects negative or fractional counts", () => {
      expect(() => parseMetadata({ num_rows: -1, num_groups: 0, groups: [] })).toThrow(
        "corrupt trailer: num_rows is not a non-negative integer",
      );
      expect(() => parseMetadata({ num_rows: 1.5, num_groups: 0, groups: [] })).toThrow(
        "corrupt trailer: num_rows is not a non-negative integer",
      );
    });
  });
});
