import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { loadTable, saveTable } from "../csv";
import { FileError } from "../../errors";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "menu-csv-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("loadTable", () => {
  test("strips the BOM and unquotes fields", () => {
    const file = path.join(dir, "in.csv");
    fs.writeFileSync(file, '\uFEFFid,name\n1,"Kebap, acılı"\n', "utf8");
    expect(loadTable(file)).toEqual([
      ["id", "name"],
      ["1", "Kebap, acılı"],
    ]);
  });

  test("rows of different lengths are allowed", () => {
    const file = path.join(dir, "in.csv");
    fs.writeFileSync(file, "a,b,c\n1,2\n", "utf8");
    expect(loadTable(file)).toEqual([
      ["a", "b", "c"],
      ["1", "2"],
    ]);
  });

  test("stray quotes inside an unquoted field are kept", () => {
    const file = path.join(dir, "in.csv");
    fs.writeFileSync(file, '1,Ali 12" Pide,X\n', "utf8");
    expect(loadTable(file)).toEqual([["1", 'Ali 12" Pide', "X"]]);
  });

  test("missing file is a FileError", () => {
    const file = path.join(dir, "nope.csv");
    expect(() => loadTable(file)).toThrow(FileError);
    try {
      loadTable(file);
    } catch (err) {
      expect(err).toBeInstanceOf(FileError);
      if (err instanceof FileError) {
        expect(err.operation).toBe("read");
        expect(err.path).toBe(file);
      }
    }
  });
});

describe("saveTable", () => {
  test("quotes only where needed, no BOM, unix newlines", () => {
    const file = path.join(dir, "out.csv");
    saveTable(file, [
      ["id", "name"],
      ["1", "Kebap, acılı"],
      ["2", 'say "hi"'],
    ]);
    expect(fs.readFileSync(file, "utf8")).toBe(
      'id,name\n1,"Kebap, acılı"\n2,"say ""hi"""\n'
    );
  });

  test("a carriage return inside a field is quoted and reads back", () => {
    const file = path.join(dir, "out.csv");
    const rows = [
      ["a\rb", "c"],
      ["d", "e"],
    ];
    saveTable(file, rows);
    expect(fs.readFileSync(file, "utf8")).toBe('"a\rb",c\nd,e\n');
    expect(loadTable(file)).toEqual(rows);
  });

  test("creates missing parent directories", () => {
    const file = path.join(dir, "nested", "deeper", "out.csv");
    saveTable(file, [["a"]]);
    expect(fs.readFileSync(file, "utf8")).toBe("a\n");
  });

  test("overwrites an existing file and leaves no temp file", () => {
    const file = path.join(dir, "menu.csv");
    fs.writeFileSync(file, "old,content\n", "utf8");
    saveTable(file, [["new"]]);
    expect(fs.readFileSync(file, "utf8")).toBe("new\n");
    expect(fs.readdirSync(dir)).toEqual(["menu.csv"]);
  });

  test("failed write leaves the destination untouched", () => {
    const target = path.join(dir, "taken");
    fs.mkdirSync(target);
    fs.writeFileSync(path.join(target, "keep.txt"), "keep", "utf8");

    expect(() => saveTable(target, [["a"]])).toThrow(FileError);
    expect(fs.readdirSync(target)).toEqual(["keep.txt"]);
    expect(fs.readdirSync(dir)).toEqual(["taken"]);
  });
});
