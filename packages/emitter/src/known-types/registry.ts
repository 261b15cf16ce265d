/**
 * Known-type registry
 *
 * Read-only lookup from (declaration, output language) to the target
 * spelling. Built once per session; lookups never mutate it.
 */

import { type DeclarationId, declarationKey } from "@sigbridge/frontend";
import type { OutputLanguage } from "../languages.js";
import type { KnownTypeEntry, KnownTypeInfo } from "./types.js";

export class KnownTypeRegistry {
  private readonly entries: ReadonlyMap<string, KnownTypeEntry>;

  constructor(entries: readonly KnownTypeEntry[] = []) {
    // Later entries win over earlier ones with the same identity
    this.entries = new Map(
      entries.map((entry) => [
        declarationKey({ module: entry.module, name: entry.name }),
        entry,
      ])
    );
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(
    decl: DeclarationId,
    language: OutputLanguage
  ): KnownTypeInfo | undefined {
    const entry = this.entries.get(declarationKey(decl));
    const name = entry?.[language];
    if (!entry || name === undefined) {
      return undefined;
    }
    return { name, canBeNullable: entry.canBeNullable };
  }

  /**
   * A new registry where the given entries replace rows with the same identity
   */
  withEntries(entries: readonly KnownTypeEntry[]): KnownTypeRegistry {
    return new KnownTypeRegistry([...this.entries.values(), ...entries]);
  }
}
