/**
 * How upgrades of an installed package are governed.
 * - version: follow git version tags
 * - branch: follow a git branch
 * - commit: stay on one commit hash
 * - builtin: shipped with Zeek itself, never upgraded
 */
export type TrackingMethod = "version" | "branch" | "commit" | "builtin";

/** Where the metadata of a PackageInfo was read from. */
export type MetadataVersionType = "version" | "branch" | "commit";

const TRACKING_METHODS: readonly TrackingMethod[] = ["version", "branch", "commit", "builtin"];

export function isTrackingMethod(value: unknown): value is TrackingMethod {
  return typeof value === "string" && TRACKING_METHODS.some((method) => method === value);
}

export function isMetadataVersionType(value: unknown): value is MetadataVersionType {
  return value === "version" || value === "branch" || value === "commit";
}
