/**
 * Tests for known-type file loading
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { coreDecl } from "@sigbridge/frontend";
import {
  loadDefaultKnownTypes,
  loadKnownTypeFile,
  validateKnownTypeEntries,
} from "./loader.js";

describe("Known-type loader", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "sigbridge-known-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const writeTable = (content: string): string => {
    const filePath = path.join(tempDir, "types.json");
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  describe("loadDefaultKnownTypes", () => {
    it("should load the shipped table", () => {
      const result = loadDefaultKnownTypes();
      expect(result.ok).to.equal(true);
      if (!result.ok) return;

      const registry = result.value;
      expect(registry.lookup(coreDecl("Int32"), "c")?.name).to.equal(
        "int32_t"
      );
      expect(registry.lookup(coreDecl("Bool"), "objc")?.name).to.equal("BOOL");
      expect(registry.lookup(coreDecl("CInt"), "cxx")?.name).to.equal("int");
      expect(
        registry.lookup(coreDecl("UnsafeMutableRawPointer"), "c")
      ).to.deep.equal({ name: "void *", canBeNullable: true });
      expect(registry.lookup(coreDecl("String"), "c")).to.equal(undefined);
    });
  });

  describe("loadKnownTypeFile", () => {
    it("should load a valid table", () => {
      const filePath = writeTable(
        JSON.stringify({
          version: 1,
          types: [
            { module: "geo", name: "Point", canBeNullable: false, c: "Point" },
          ],
        })
      );

      const result = loadKnownTypeFile(filePath);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.size).to.equal(1);
    });

    it("should report a missing file", () => {
      const result = loadKnownTypeFile(path.join(tempDir, "absent.json"));
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("SGB9001");
    });

    it("should report invalid JSON", () => {
      const result = loadKnownTypeFile(writeTable("{ not json"));
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("SGB9003");
    });

    it("should reject a non-object document", () => {
      const result = loadKnownTypeFile(writeTable("[]"));
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.message).to.equal(
        "Known-type file must be an object: types.json"
      );
    });

    it("should reject an unknown version", () => {
      const result = loadKnownTypeFile(
        writeTable(JSON.stringify({ version: 2, types: [] }))
      );
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("SGB9005");
      expect(result.error[0]?.message).to.equal(
        "Unsupported known-type file version in types.json: 2"
      );
    });

    it("should reject a missing types field", () => {
      const result = loadKnownTypeFile(
        writeTable(JSON.stringify({ version: 1 }))
      );
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("SGB9006");
    });
  });

  describe("validateKnownTypeEntries", () => {
    it("should report every problem in an entry", () => {
      const result = validateKnownTypeEntries(
        [{ module: "", name: "Point", canBeNullable: "no", c: "" }],
        "sigbridge.json"
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.message)).to.deep.equal([
        "sigbridge.json types[0]: missing or invalid 'module'",
        "sigbridge.json types[0]: 'canBeNullable' must be a boolean",
        "sigbridge.json types[0]: 'c' must be a non-empty string",
      ]);
      expect(result.error.every((d) => d.code === "SGB9007")).to.equal(true);
    });

    it("should keep only the spellings that are given", () => {
      const result = validateKnownTypeEntries(
        [{ module: "geo", name: "Point", canBeNullable: false, cxx: "geo::Point" }],
        "test"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value).to.deep.equal([
        {
          module: "geo",
          name: "Point",
          canBeNullable: false,
          cxx: "geo::Point",
        },
      ]);
    });

    it("should reject entries that are not objects", () => {
      const result = validateKnownTypeEntries(["Point"], "test");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.message).to.equal(
        "test types[0]: must be an object"
      );
    });
  });
});
