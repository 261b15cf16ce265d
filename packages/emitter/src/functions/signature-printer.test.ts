/**
 * Tests for function signature printing
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type FunctionSignatureModel,
  type ParameterModel,
  coreDecl,
  nominalType,
  voidType,
} from "@sigbridge/frontend";
import { KnownTypeRegistry } from "../known-types/index.js";
import { createDialectPolicy } from "../dialects/index.js";
import {
  printAsCCompatibleDeclaration,
  printAsCxxDeclaration,
  printFunctionSignature,
} from "./signature-printer.js";

const registry = new KnownTypeRegistry([
  {
    module: "core",
    name: "Int32",
    canBeNullable: false,
    c: "int32_t",
    objc: "int32_t",
    cxx: "int32_t",
  },
  {
    module: "core",
    name: "Bool",
    canBeNullable: false,
    c: "bool",
    objc: "BOOL",
    cxx: "bool",
  },
  {
    module: "core",
    name: "UnsafeMutableRawPointer",
    canBeNullable: true,
    c: "void *",
    objc: "void *",
    cxx: "void *",
  },
]);

const int32 = nominalType(coreDecl("Int32"));
const bool = nominalType(coreDecl("Bool"));
const pointer = nominalType(coreDecl("UnsafeMutableRawPointer"));

const param = (
  name: string | undefined,
  type: ParameterModel["type"],
  optionality: ParameterModel["optionality"] = "none"
): ParameterModel =>
  name !== undefined ? { name, type, optionality } : { type, optionality };

const signature = (
  name: string,
  parameters: readonly ParameterModel[],
  returnType: FunctionSignatureModel["returnType"] = voidType
): FunctionSignatureModel => ({
  name,
  returnType,
  returnOptionality: "none",
  parameters,
});

describe("Function signature printer", () => {
  describe("Declarations from the type model", () => {
    it("prints foo(x: Int32) -> Bool the same way in both dialects", () => {
      const foo = signature("foo", [param("x", int32)], bool);
      expect(printAsCCompatibleDeclaration(foo, registry)).to.equal(
        "bool foo(int32_t x)"
      );
      expect(printAsCxxDeclaration(foo, registry)).to.equal(
        "bool foo(int32_t x)"
      );
    });

    it("prints an empty parameter list per dialect", () => {
      const bar = signature("bar", []);
      expect(printAsCCompatibleDeclaration(bar, registry)).to.equal(
        "void bar(void)"
      );
      expect(printAsCxxDeclaration(bar, registry)).to.equal("void bar()");
    });

    it("names anonymous parameters only in C++", () => {
      const baz = signature("baz", [param(undefined, int32)]);
      expect(printAsCCompatibleDeclaration(baz, registry)).to.equal(
        "void baz(int32_t)"
      );
      expect(printAsCxxDeclaration(baz, registry)).to.equal(
        "void baz(int32_t _1)"
      );
    });

    it("drops optionality on non-nullable types", () => {
      const qux = signature("qux", [param("x", int32, "optional")]);
      expect(printAsCCompatibleDeclaration(qux, registry)).to.equal(
        "void qux(int32_t x)"
      );
      expect(printAsCxxDeclaration(qux, registry)).to.equal(
        "void qux(int32_t x)"
      );
      expect(
        printFunctionSignature(qux, createDialectPolicy("c", registry))
          .droppedOptionality
      ).to.equal(true);
    });

    it("prints a placeholder for an unmapped type", () => {
      const quux = signature("quux", [
        param("x", nominalType({ module: "api", name: "UnmappedStruct" })),
      ]);
      const report = printFunctionSignature(
        quux,
        createDialectPolicy("c", registry)
      );

      expect(report.text).to.equal("void quux(/* UnmappedStruct */ x)");
      expect(report.unrepresentable).to.deep.equal(["UnmappedStruct"]);
      expect(printAsCxxDeclaration(quux, registry)).to.equal(
        "void quux(/* UnmappedStruct */ x)"
      );
    });
  });

  describe("Parameters", () => {
    it("numbers anonymous parameters by their position among all parameters", () => {
      const mixed = signature("mixed", [
        param("count", int32),
        param(undefined, bool),
        param(undefined, int32),
      ]);
      expect(printAsCxxDeclaration(mixed, registry)).to.equal(
        "void mixed(int32_t count, bool _2, int32_t _3)"
      );
      expect(printAsCCompatibleDeclaration(mixed, registry)).to.equal(
        "void mixed(int32_t count, bool, int32_t)"
      );
    });

    it("legalizes declared parameter names", () => {
      const make = signature("make", [param("int", int32), param("$ptr", pointer)]);
      expect(printAsCCompatibleDeclaration(make, registry)).to.equal(
        "void make(int32_t int_, void * _ptr)"
      );
    });

    it("annotates nullable parameters in C only", () => {
      const render = signature("render", [
        param("ptr", pointer, "optional"),
        param("ctx", pointer, "implicitlyUnwrapped"),
      ]);
      expect(printAsCCompatibleDeclaration(render, registry)).to.equal(
        "void render(void * _Nullable ptr, void * _Null_unspecified ctx)"
      );
      expect(printAsCxxDeclaration(render, registry)).to.equal(
        "void render(void * ptr, void * ctx)"
      );
    });
  });

  describe("Return types", () => {
    it("annotates an optional nullable return", () => {
      const find: FunctionSignatureModel = {
        name: "find",
        returnType: pointer,
        returnOptionality: "optional",
        parameters: [param("key", int32)],
      };
      expect(printAsCCompatibleDeclaration(find, registry)).to.equal(
        "void * _Nullable find(int32_t key)"
      );
    });

    it("lists the return placeholder first", () => {
      const convert = signature(
        "convert",
        [param("value", nominalType({ module: "api", name: "Source" }))],
        nominalType({ module: "api", name: "Target" })
      );
      const report = printFunctionSignature(
        convert,
        createDialectPolicy("cxx", registry)
      );
      expect(report.text).to.equal(
        "/* Target */ convert(/* Source */ value)"
      );
      expect(report.unrepresentable).to.deep.equal(["Target", "Source"]);
      expect(report.droppedOptionality).to.equal(false);
    });
  });

  describe("Objective-C", () => {
    it("reads the Objective-C spelling", () => {
      const flag = signature("flag", [param("on", bool)], bool);
      expect(
        printAsCCompatibleDeclaration(flag, registry, { language: "objc" })
      ).to.equal("BOOL flag(BOOL on)");
      expect(printAsCCompatibleDeclaration(flag, registry)).to.equal(
        "bool flag(bool on)"
      );
    });
  });

  it("does not legalize the function name", () => {
    const keyword = signature("int", []);
    expect(printAsCxxDeclaration(keyword, registry)).to.equal("void int()");
  });
});
