import {
  absentField,
  malformedField,
  presentField,
  unwrapField,
  type DependencyMap,
  type MetadataField,
  type PackageMetadata,
  type UserVarEntry,
} from "@zkgmeta/types";

import { DEPENDENCY_FIELDS, type DependencyField } from "./constants.js";
import { findSentenceEnd } from "./text.js";
import { UserVar } from "./user-var.js";
import { logger } from "./utils/logger.js";

/** The field's own string value; inherited and non-string values count as absent. */
function readField(metadata: PackageMetadata, field: string): string | undefined {
  if (!Object.hasOwn(metadata, field)) {
    return undefined;
  }

  const value = metadata[field];
  return typeof value === "string" ? value : undefined;
}

function splitList(value: string, separator: RegExp): string[] {
  return value.split(separator).filter((item) => item.length > 0);
}

/** Package name aliases from the `aliases` field, canonical one first. */
export function aliases(metadata: PackageMetadata): string[] {
  const value = readField(metadata, "aliases");
  if (value === undefined) {
    return [];
  }

  return splitList(value, /,\s*|\s+/);
}

/** Keyword tags from the `tags` field. */
export function tags(metadata: PackageMetadata): string[] {
  const value = readField(metadata, "tags");
  if (value === undefined) {
    return [];
  }

  return splitList(value, /,\s*/);
}

/**
 * The first sentence of the `description` field, with line breaks folded
 * into single spaces. The whole description when no sentence ends.
 */
export function shortDescription(metadata: PackageMetadata): string {
  const description = readField(metadata, "description");
  if (description === undefined) {
    return "";
  }

  let result = "";
  for (const rawLine of description.split("\n")) {
    const line = rawLine.trimStart();
    result += " ";

    const end = findSentenceEnd(line);
    if (end === -1) {
      result += line;
      continue;
    }

    result += line.slice(0, end + 1);
    break;
  }

  return result.trimStart();
}

/**
 * Reads a dependency field: whitespace separated `<name> <version-spec>` pairs.
 * The names `zeek` and `zkg` denote the Zeek and zkg versions themselves.
 */
export function readDependencies(
  metadata: PackageMetadata,
  field = "depends",
): MetadataField<DependencyMap> {
  const value = readField(metadata, field);
  if (value === undefined) {
    return absentField();
  }

  const tokens = splitList(value, /\s+/);
  if (tokens.length % 2 !== 0) {
    const reason = `"${field}" has ${tokens.length} tokens, expected name/spec pairs`;
    logger.debug("malformed dependency field", { field, value });
    return malformedField(reason);
  }

  const pairs: Array<[string, string]> = [];
  for (let index = 0; index < tokens.length; index += 2) {
    const name = tokens[index];
    const spec = tokens[index + 1];
    if (name !== undefined && spec !== undefined) {
      pairs.push([name, spec]);
    }
  }

  return presentField(Object.fromEntries(pairs));
}

/**
 * Dependency name to version spec. Empty when the field is absent,
 * null when it is malformed.
 */
export function dependencies(metadata: PackageMetadata, field = "depends"): DependencyMap | null {
  return unwrapField(readDependencies(metadata, field), {});
}

/** Reads every dependency class field (`depends`, `suggests`, `external_depends`). */
export function readAllDependencies(
  metadata: PackageMetadata,
): Record<DependencyField, MetadataField<DependencyMap>> {
  return {
    depends: readDependencies(metadata, "depends"),
    suggests: readDependencies(metadata, "suggests"),
    external_depends: readDependencies(metadata, "external_depends"),
  };
}

export function isDependencyField(value: string): value is DependencyField {
  return DEPENDENCY_FIELDS.some((field) => field === value);
}

export function readUserVars(metadata: PackageMetadata): MetadataField<UserVarEntry[]> {
  const value = readField(metadata, "user_vars");
  if (value === undefined) {
    return absentField();
  }

  const vars = UserVar.parseField(value);
  if (vars === null) {
    logger.debug("malformed user_vars field", { value });
    return malformedField(`"user_vars" is not a list of NAME [default] "description" entries`);
  }

  return presentField(vars.map((userVar) => userVar.toEntry()));
}

/**
 * Variables the package asks the user for. Empty when the field is absent,
 * null when it is malformed.
 */
export function userVars(metadata: PackageMetadata): UserVarEntry[] | null {
  return unwrapField(readUserVars(metadata), []);
}
