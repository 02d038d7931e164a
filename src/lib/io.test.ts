import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, mkdtemp, readFile, rm, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { discoverCsvFiles, loadCsvDataset, parseCsvText, tableNameOf, writeCsvTable } from "./io";
import { RawPathNotFoundError } from "./errors";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "eda-io-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("discoverCsvFiles", () => {
  it("lists CSV files in name order", async () => {
    await writeFile(path.join(dir, "b.csv"), "a\n1\n");
    await writeFile(path.join(dir, "a.CSV"), "a\n1\n");
    await writeFile(path.join(dir, "notes.txt"), "hello");
    await mkdir(path.join(dir, "c.csv"));
    expect(await discoverCsvFiles(dir)).toEqual([path.join(dir, "a.CSV"), path.join(dir, "b.csv")]);
  });

  it("fails when the directory is missing", async () => {
    await expect(discoverCsvFiles(path.join(dir, "nope"))).rejects.toBeInstanceOf(RawPathNotFoundError);
  });
});

describe("parseCsvText", () => {
  it("trims headers, skips blank lines and infers column kinds", () => {
    const { dataset, warnings } = parseCsvText("t", "id, name ,score\n1,a,1.5\n2,,\n\n3,c,NA\n");
    expect(warnings).toEqual([]);
    expect(dataset.columns).toEqual([
      { name: "id", kind: "numeric", values: [1, 2, 3] },
      { name: "name", kind: "text", values: ["a", null, "c"] },
      { name: "score", kind: "numeric", values: [1.5, null, null] },
    ]);
  });

  it("fills short rows with nulls and reports a warning", () => {
    const { dataset, warnings } = parseCsvText("t", "a,b\n1,2\n3\n");
    expect(warnings).toHaveLength(1);
    expect(dataset.columns[1]).toEqual({ name: "b", kind: "numeric", values: [2, null] });
  });

  it("keeps the columns of a header-only file", () => {
    const { dataset } = parseCsvText("t", "a,b\n");
    expect(dataset.columns.map((c) => c.name)).toEqual(["a", "b"]);
    expect(dataset.columns[0].values).toEqual([]);
  });
});

describe("loadCsvDataset", () => {
  it("names the dataset after the file and reads its mtime", async () => {
    const file = path.join(dir, "sales.csv");
    await writeFile(file, "\uFEFFcustomer_id,value\n1,10\n2,20\n");
    const mtime = new Date("2026-01-08T12:34:56Z");
    await utimes(file, mtime, mtime);

    const { dataset, updatedAt } = await loadCsvDataset(file);
    expect(tableNameOf(file)).toBe("sales");
    expect(dataset.name).toBe("sales");
    expect(dataset.columns.map((c) => c.name)).toEqual(["customer_id", "value"]);
    expect(updatedAt.getTime()).toBe(mtime.getTime());
  });
});

describe("writeCsvTable", () => {
  it("creates the directory and quotes cells that need it", async () => {
    const out = await writeCsvTable(path.join(dir, "processed"), "out.csv", {
      columns: ["A", "B"],
      rows: [{ A: 1, B: "x, y" }, { A: 2.5, B: "undefined" }],
    });
    expect(out).toBe(path.join(dir, "processed", "out.csv"));
    expect(await readFile(out, "utf8")).toBe('A,B\n1,"x, y"\n2.5,undefined\n');
  });

  it("writes the header for an empty table", async () => {
    const out = await writeCsvTable(dir, "empty.csv", { columns: ["A", "B"], rows: [] });
    expect(await readFile(out, "utf8")).toBe("A,B\n");
  });
});
