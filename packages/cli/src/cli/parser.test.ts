/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse generate command", () => {
        const result = parseArgs(["generate"]);
        expect(result.command).to.equal("generate");
        expect(result.entries).to.deep.equal([]);
      });

      it("should parse help command from -h", () => {
        expect(parseArgs(["-h"]).command).to.equal("help");
        expect(parseArgs(["print", "--help"]).command).to.equal("help");
      });

      it("should parse version command from -v", () => {
        expect(parseArgs(["-v"]).command).to.equal("version");
        expect(parseArgs(["--version"]).command).to.equal("version");
      });

      it("should leave the command empty without arguments", () => {
        expect(parseArgs([]).command).to.equal("");
      });
    });

    describe("Entry Files", () => {
      it("should collect every positional argument after the command", () => {
        const result = parseArgs(["print", "src/a.ts", "-q", "src/b.ts"]);
        expect(result.command).to.equal("print");
        expect(result.entries).to.deep.equal(["src/a.ts", "src/b.ts"]);
      });
    });

    describe("Options", () => {
      it("should parse value options", () => {
        const result = parseArgs([
          "generate",
          "-c",
          "conf/sigbridge.json",
          "--out",
          "include",
          "-n",
          "geo",
          "--name",
          "geometry",
          "--unsupported",
          "emit",
        ]);

        expect(result.error).to.equal(undefined);
        expect(result.options).to.deep.equal({
          config: "conf/sigbridge.json",
          out: "include",
          namespace: "geo",
          name: "geometry",
          unsupported: "emit",
        });
      });

      it("should collect repeated languages", () => {
        const result = parseArgs(["generate", "-l", "objc", "--lang", "cxx"]);
        expect(result.options.languages).to.deep.equal(["objc", "cxx"]);
      });

      it("should parse verbose and quiet flags", () => {
        const result = parseArgs(["generate", "-V", "--quiet"]);
        expect(result.options.verbose).to.equal(true);
        expect(result.options.quiet).to.equal(true);
      });
    });

    describe("Errors", () => {
      it("should reject an unknown language", () => {
        expect(parseArgs(["generate", "-l", "rust"]).error).to.equal(
          "Invalid language 'rust' (expected c, objc or cxx)"
        );
      });

      it("should reject an unknown unsupported policy", () => {
        expect(
          parseArgs(["generate", "--unsupported", "ignore"]).error
        ).to.equal(
          "Invalid --unsupported value 'ignore' (expected omit, emit or error)"
        );
      });

      it("should reject a namespace that is not a C++ name", () => {
        expect(parseArgs(["generate", "-n", "a b"]).error).to.equal(
          "Invalid namespace 'a b' (expected identifiers joined by '::')"
        );
      });

      it("should reject a missing value", () => {
        expect(parseArgs(["generate", "-o"]).error).to.equal(
          "Option '-o' requires a value"
        );
      });

      it("should reject an unknown option", () => {
        expect(parseArgs(["generate", "--fast"]).error).to.equal(
          "Unknown option '--fast'"
        );
      });
    });
  });
});
