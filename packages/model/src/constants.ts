import type { TrackingMethod } from "@zkgmeta/types";

/** Manifest file a package stores its metadata in. */
export const METADATA_FILENAME = "zkg.meta";
export const LEGACY_METADATA_FILENAME = "bro-pkg.meta";
/** Lookup order when reading a package checkout. */
export const METADATA_FILENAMES: readonly string[] = [METADATA_FILENAME, LEGACY_METADATA_FILENAME];

export const TRACKING_METHOD_VERSION: TrackingMethod = "version";
export const TRACKING_METHOD_BRANCH: TrackingMethod = "branch";
export const TRACKING_METHOD_COMMIT: TrackingMethod = "commit";
export const TRACKING_METHOD_BUILTIN: TrackingMethod = "builtin";

/** Source label and locator scheme of packages shipped inside Zeek. */
export const BUILTIN_SOURCE = "zeek-builtin";
export const BUILTIN_SCHEME = "zeek-builtin://";

/** Manifest fields using the `<name> <version-spec>` pair grammar. */
export const DEPENDENCY_FIELDS = ["depends", "suggests", "external_depends"] as const;

export type DependencyField = (typeof DEPENDENCY_FIELDS)[number];

export const WILDCARD_SPEC = "*";
export const BRANCH_SPEC_PREFIX = "branch=";

export const RESERVED_PACKAGE_NAMES: readonly string[] = ["package", "packages"];
