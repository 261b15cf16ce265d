/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  findConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";
import type { SigbridgeConfig } from "./types.js";

describe("Config", () => {
  describe("validateConfig", () => {
    it("should accept a complete config", () => {
      const result = validateConfig({
        entryPoints: ["src/api.ts"],
        outputDirectory: "include",
        headerName: "api",
        languages: ["objc", "cxx"],
        namespace: "api",
        unsupported: "error",
        reportDroppedOptionality: true,
        includeGuard: true,
        knownTypes: [
          { module: "api", name: "Point", canBeNullable: false, c: "Point" },
        ],
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.entryPoints).to.deep.equal(["src/api.ts"]);
      expect(result.value.languages).to.deep.equal(["objc", "cxx"]);
      expect(result.value.unsupported).to.equal("error");
      expect(result.value.reportDroppedOptionality).to.equal(true);
      expect(result.value.includeGuard).to.equal(true);
      expect(result.value.knownTypes).to.deep.equal([
        { module: "api", name: "Point", canBeNullable: false, c: "Point" },
      ]);
    });

    it("should accept an empty object", () => {
      expect(validateConfig({}).ok).to.equal(true);
    });

    it("should reject a non-object", () => {
      expect(validateConfig([])).to.deep.equal({
        ok: false,
        error: "sigbridge.json: must be a JSON object",
      });
    });

    it("should reject bad entry points", () => {
      expect(validateConfig({ entryPoints: "src/api.ts" })).to.deep.equal({
        ok: false,
        error: "sigbridge.json: 'entryPoints' must be an array of file paths",
      });
    });

    it("should reject an unknown language", () => {
      expect(validateConfig({ languages: ["c", "swift"] })).to.deep.equal({
        ok: false,
        error:
          "sigbridge.json: unknown language 'swift' (expected c, objc or cxx)",
      });
    });

    it("should reject an empty language list", () => {
      expect(validateConfig({ languages: [] }).ok).to.equal(false);
    });

    it("should reject a non-string namespace", () => {
      expect(validateConfig({ namespace: 3 })).to.deep.equal({
        ok: false,
        error: "sigbridge.json: 'namespace' must be a non-empty string",
      });
    });

    it("should reject a namespace that is not a C++ name", () => {
      expect(validateConfig({ namespace: "acme::class" })).to.deep.equal({
        ok: false,
        error: "sigbridge.json: 'namespace' must be C++ identifiers joined by '::'",
      });
    });

    it("should reject a non-boolean includeGuard", () => {
      expect(validateConfig({ includeGuard: "yes" })).to.deep.equal({
        ok: false,
        error: "sigbridge.json: 'includeGuard' must be a boolean",
      });
    });

    it("should report bad known-type entries", () => {
      expect(
        validateConfig({ knownTypes: [{ module: "api", name: "Point" }] })
      ).to.deep.equal({
        ok: false,
        error:
          "sigbridge.json types[0]: 'canBeNullable' must be a boolean",
      });
    });
  });

  describe("loadConfig and findConfig", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "sigbridge-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should report a missing file", () => {
      const configPath = path.join(tempDir, "sigbridge.json");
      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${configPath}`,
      });
    });

    it("should report invalid JSON", () => {
      const configPath = path.join(tempDir, "sigbridge.json");
      fs.writeFileSync(configPath, "{ entryPoints: ");
      const result = loadConfig(configPath);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.match(/^Failed to parse sigbridge\.json: /);
    });

    it("should find the config in a parent directory", () => {
      const configPath = path.join(tempDir, "sigbridge.json");
      fs.writeFileSync(configPath, "{}");
      const nested = path.join(tempDir, "src", "deep");
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfig(nested)).to.equal(configPath);
    });
  });

  describe("resolveConfig", () => {
    const projectRoot = path.resolve("/work/project");

    it("should apply defaults", () => {
      const config: SigbridgeConfig = { entryPoints: ["src/geometry.ts"] };

      const result = resolveConfig(config, {}, projectRoot);
      expect(result.entryPoints).to.deep.equal([
        path.join(projectRoot, "src", "geometry.ts"),
      ]);
      expect(result.outputDirectory).to.equal(
        path.join(projectRoot, "generated")
      );
      expect(result.headerName).to.equal("geometry");
      expect(result.languages).to.deep.equal(["c", "cxx"]);
      expect(result.namespace).to.equal(undefined);
      expect(result.unsupported).to.equal("omit");
      expect(result.reportDroppedOptionality).to.equal(false);
      expect(result.includeGuard).to.equal(false);
      expect(result.knownTypes).to.deep.equal([]);
      expect(result.verbose).to.equal(false);
      expect(result.quiet).to.equal(false);
    });

    it("should use config values", () => {
      const config: SigbridgeConfig = {
        entryPoints: ["src/api.ts"],
        outputDirectory: "include",
        headerName: "bridge",
        languages: ["objc"],
        namespace: "bridge",
        unsupported: "emit",
        reportDroppedOptionality: true,
      };

      const result = resolveConfig(config, {}, projectRoot);
      expect(result.outputDirectory).to.equal(
        path.join(projectRoot, "include")
      );
      expect(result.headerName).to.equal("bridge");
      expect(result.languages).to.deep.equal(["objc"]);
      expect(result.namespace).to.equal("bridge");
      expect(result.unsupported).to.equal("emit");
      expect(result.reportDroppedOptionality).to.equal(true);
    });

    it("should override config with CLI options", () => {
      const config: SigbridgeConfig = {
        entryPoints: ["src/api.ts"],
        languages: ["objc"],
        namespace: "bridge",
        unsupported: "emit",
      };

      const result = resolveConfig(
        config,
        {
          out: path.resolve("/tmp/headers"),
          languages: ["cxx", "c", "cxx"],
          namespace: "geo",
          unsupported: "error",
          name: "geo",
          verbose: true,
        },
        projectRoot
      );

      expect(result.outputDirectory).to.equal(path.resolve("/tmp/headers"));
      expect(result.languages).to.deep.equal(["cxx", "c"]);
      expect(result.namespace).to.equal("geo");
      expect(result.unsupported).to.equal("error");
      expect(result.headerName).to.equal("geo");
      expect(result.verbose).to.equal(true);
    });

    it("should use entry files from the command line over config", () => {
      const entry = path.resolve("/elsewhere/shapes.d.ts");
      const result = resolveConfig(
        { entryPoints: ["src/api.ts"] },
        {},
        projectRoot,
        [entry]
      );

      expect(result.entryPoints).to.deep.equal([entry]);
      expect(result.headerName).to.equal("shapes");
    });

    it("should fall back to a fixed header name without entries", () => {
      const result = resolveConfig({}, {}, projectRoot);
      expect(result.entryPoints).to.deep.equal([]);
      expect(result.headerName).to.equal("declarations");
    });
  });
});
