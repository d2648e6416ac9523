import type { TrackingMethod } from "./tracking.js";

export interface PackageStatusInit {
  isLoaded?: boolean;
  isPinned?: boolean;
  isOutdated?: boolean;
  trackingMethod?: TrackingMethod;
  /** A git branch name or version tag. */
  currentVersion?: string;
  /** The git commit hash of the current version. */
  currentHash?: string;
}

/** Outcome of checking a version against a version spec. */
export interface VersionVerdict {
  ok: boolean;
  /** Empty when ok, otherwise the reason the spec is not satisfied. */
  message: string;
}

/** One entry of a manifest's `user_vars` field. */
export interface UserVarEntry {
  name: string;
  value?: string;
  description?: string;
}
