import { isPlainObject, isString } from "./guards.js";

/**
 * Field names a package manifest (`zkg.meta`) may declare under its
 * `[package]` section. None of them is required.
 */
export const KNOWN_METADATA_FIELDS = [
  "description",
  "summary",
  "aliases",
  "tags",
  "depends",
  "suggests",
  "external_depends",
  "user_vars",
  "script_dir",
  "plugin_dir",
  "build_command",
  "test_command",
  "config_files",
  "version",
  "credits",
  "url",
] as const;

export type KnownMetadataField = (typeof KNOWN_METADATA_FIELDS)[number];

/**
 * Parsed key/value contents of a package manifest.
 * Values may span several lines. Unknown keys are carried along untouched.
 */
export type PackageMetadata = {
  readonly [Field in KnownMetadataField]?: string;
} & {
  readonly [field: string]: string | undefined;
};

/** Dependency name (shorthand, git URL, `zeek` or `zkg`) to version spec. */
export type DependencyMap = Record<string, string>;

/**
 * Result of reading one metadata field.
 * - absent: the manifest does not declare the field
 * - malformed: the field is declared but cannot be parsed
 * - present: the parsed value
 */
export type MetadataField<T> =
  | { status: "absent" }
  | { status: "malformed"; reason: string }
  | { status: "present"; value: T };

export function absentField<T>(): MetadataField<T> {
  return { status: "absent" };
}

export function malformedField<T>(reason: string): MetadataField<T> {
  return { status: "malformed", reason };
}

export function presentField<T>(value: T): MetadataField<T> {
  return { status: "present", value };
}

/**
 * Collapses a field result: absent yields `absentValue`, malformed yields `null`.
 */
export function unwrapField<T>(field: MetadataField<T>, absentValue: T): T | null {
  switch (field.status) {
    case "absent":
      return absentValue;
    case "malformed":
      return null;
    case "present":
      return field.value;
  }
}

function isKnownMetadataField(value: string): value is KnownMetadataField {
  return KNOWN_METADATA_FIELDS.some((field) => field === value);
}

/**
 * Validates an untyped record as package metadata.
 * Returns null when the value is not a plain object or a known field holds a
 * non-string value. Unknown fields holding non-strings are dropped.
 */
export function toPackageMetadata(value: unknown): PackageMetadata | null {
  if (!isPlainObject(value)) {
    return null;
  }

  const metadata: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isString(entry)) {
      metadata[key] = entry;
      continue;
    }

    if (isKnownMetadataField(key) && entry !== undefined) {
      return null;
    }
  }

  return metadata;
}
