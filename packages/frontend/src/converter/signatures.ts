/**
 * Function signature collection
 *
 * Reads the exported function declarations of a source file into
 * FunctionSignatureModels. Declarations that cannot be expressed as a
 * single C-family prototype are skipped with a diagnostic.
 */

import ts from "typescript";
import type {
  FunctionSignatureModel,
  ParameterModel,
  TypeNode,
} from "../model/index.js";
import { describeType, unwrapAliases, voidType } from "../model/index.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { getNodeLocation } from "./locations.js";
import { getObjectTypeAndOptionality } from "./optionality.js";

export type SignatureCollection = {
  readonly signatures: readonly FunctionSignatureModel[];
  readonly diagnostics: readonly Diagnostic[];
};

type ConvertedSignature =
  | { readonly ok: true; readonly signature: FunctionSignatureModel }
  | { readonly ok: false; readonly diagnostic: Diagnostic };

const isExported = (node: ts.FunctionDeclaration): boolean =>
  (ts.getCombinedModifierFlags(node) & ts.ModifierFlags.Export) !== 0;

const isEmptyTuple = (type: TypeNode): boolean =>
  type.kind === "tupleType" && type.elementTypes.length === 0;

const isThisParameter = (param: ts.ParameterDeclaration): boolean =>
  ts.isIdentifier(param.name) && param.name.text === "this";

/**
 * `_`, `__` and destructuring patterns have no usable name
 */
const getParameterName = (
  param: ts.ParameterDeclaration
): string | undefined =>
  ts.isIdentifier(param.name) && !/^_+$/.test(param.name.text)
    ? param.name.text
    : undefined;

const convertParameter = (
  param: ts.ParameterDeclaration,
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker
): ParameterModel => {
  const [type, optionality] = getObjectTypeAndOptionality(
    param.type,
    param.questionToken !== undefined,
    checker
  );
  const name = getParameterName(param);
  const location = getNodeLocation(param, sourceFile);
  return name !== undefined
    ? { name, type, optionality, location }
    : { type, optionality, location };
};

const convertFunctionDeclaration = (
  decl: ts.FunctionDeclaration,
  name: string,
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker
): ConvertedSignature => {
  const location = getNodeLocation(decl.name ?? decl, sourceFile);

  if (decl.typeParameters && decl.typeParameters.length > 0) {
    return {
      ok: false,
      diagnostic: createDiagnostic(
        "SGB2001",
        "warning",
        `Generic function '${name}' cannot be projected`,
        location,
        "Export a wrapper with concrete types"
      ),
    };
  }

  const params = decl.parameters.filter((p) => !isThisParameter(p));

  const rest = params.find((p) => p.dotDotDotToken !== undefined);
  if (rest) {
    return {
      ok: false,
      diagnostic: createDiagnostic(
        "SGB2002",
        "warning",
        `Function '${name}' has a rest parameter and cannot be projected`,
        getNodeLocation(rest, sourceFile)
      ),
    };
  }

  const untyped = params.find((p) => p.type === undefined);
  if (untyped) {
    return {
      ok: false,
      diagnostic: createDiagnostic(
        "SGB2003",
        "warning",
        `Parameter '${untyped.name.getText(sourceFile)}' of '${name}' has no type annotation`,
        getNodeLocation(untyped, sourceFile)
      ),
    };
  }

  const [returnType, returnOptionality] = decl.type
    ? getObjectTypeAndOptionality(decl.type, false, checker)
    : [voidType, "none" as const];
  const parameters = params.map((p) =>
    convertParameter(p, sourceFile, checker)
  );

  // A C prototype has one return value and one value per parameter
  const multiValue = [returnType, ...parameters.map((p) => p.type)]
    .map(unwrapAliases)
    .find((t) => t.kind === "tupleType" && t.elementTypes.length > 0);
  if (multiValue) {
    return {
      ok: false,
      diagnostic: createDiagnostic(
        "SGB2006",
        "warning",
        `Function '${name}' uses the multi-value type '${describeType(multiValue)}' and cannot be projected`,
        location,
        "Pass or return the values separately"
      ),
    };
  }

  const valueless = params.find((_, index) => {
    const type = parameters[index]?.type;
    return type !== undefined && isEmptyTuple(unwrapAliases(type));
  });
  if (valueless) {
    return {
      ok: false,
      diagnostic: createDiagnostic(
        "SGB2007",
        "warning",
        `Parameter '${valueless.name.getText(sourceFile)}' of '${name}' has no value type and cannot be projected`,
        getNodeLocation(valueless, sourceFile)
      ),
    };
  }

  return {
    ok: true,
    signature: {
      name,
      returnType,
      returnOptionality,
      parameters,
      location,
    },
  };
};

/**
 * Collect the exported function signatures declared in a source file
 */
export const collectFunctionSignatures = (
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker
): SignatureCollection => {
  const signatures: FunctionSignatureModel[] = [];
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();

  for (const statement of sourceFile.statements) {
    if (
      !ts.isFunctionDeclaration(statement) ||
      !statement.name ||
      !isExported(statement)
    ) {
      continue;
    }

    const name = statement.name.text;
    if (seen.has(name)) {
      diagnostics.push(
        createDiagnostic(
          "SGB2004",
          "warning",
          `Overload of '${name}' ignored; only its first declaration is projected`,
          getNodeLocation(statement.name, sourceFile)
        )
      );
      continue;
    }
    seen.add(name);

    const converted = convertFunctionDeclaration(
      statement,
      name,
      sourceFile,
      checker
    );
    if (!converted.ok) {
      diagnostics.push(converted.diagnostic);
      continue;
    }

    if (!statement.type) {
      diagnostics.push(
        createDiagnostic(
          "SGB2005",
          "info",
          `Function '${name}' has no return type annotation; printed as void`,
          converted.signature.location
        )
      );
    }
    signatures.push(converted.signature);
  }

  return { signatures, diagnostics };
};
