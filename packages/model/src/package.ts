import { existsSync } from "node:fs";
import path from "node:path";

import type {
  DependencyMap,
  MetadataField,
  MetadataVersionType,
  PackageMetadata,
  PackageStatusInit,
  TrackingMethod,
  UserVarEntry,
  VersionVerdict,
} from "@zkgmeta/types";

import { BUILTIN_SCHEME } from "./constants.js";
import { stateError, usageError } from "./errors.js";
import {
  canonicalUrl,
  compareKeys,
  lastPathSegment,
  nameFromPath,
  resolveRealPath,
  type IdentityOptions,
} from "./identity.js";
import {
  aliases,
  dependencies,
  readDependencies,
  shortDescription,
  tags,
  userVars,
} from "./metadata.js";
import { PackageVersion } from "./version.js";

export interface PackageInit {
  /** Git URL or local path of the package repository. */
  gitUrl: string;
  /** Package source the package was found through, empty for direct URLs. */
  source?: string;
  /** Directory within the source whose index declares the package. */
  directory?: string;
  metadata?: PackageMetadata;
  name?: string;
  /** Trust `gitUrl` and `name` as given instead of canonicalizing them. */
  canonical?: boolean;
}

/**
 * A Zeek package as defined by its repository and the source it came from.
 *
 * Identity is the qualified name: two packages are equal, and sort, by that
 * string alone.
 */
export class Package {
  readonly gitUrl: string;

  readonly name: string;

  readonly source: string;

  readonly directory: string;

  /**
   * The package's own manifest once installed. Before that it may come from
   * the source's aggregated metadata and lag behind the repository.
   */
  metadata: PackageMetadata;

  constructor(init: PackageInit, options: IdentityOptions = {}) {
    if (init.gitUrl.length === 0) {
      throw usageError("A package needs a git URL or local path.");
    }

    this.source = init.source ?? "";
    this.directory = init.directory ?? "";
    this.metadata = init.metadata ?? {};

    const explicitName = init.name !== undefined && init.name.length > 0 ? init.name : undefined;

    if (init.canonical) {
      this.gitUrl = init.gitUrl;
      this.name = explicitName ?? lastPathSegment(init.gitUrl);
      return;
    }

    let gitUrl = canonicalUrl(init.gitUrl, options);
    // canonicalUrl only resolves "./foo", not "foo"
    if (this.source.length === 0 && existsSync(path.resolve(options.cwd ?? process.cwd(), init.gitUrl))) {
      gitUrl = resolveRealPath(gitUrl, options);
    }

    this.gitUrl = gitUrl;
    this.name = explicitName ?? nameFromPath(init.gitUrl, options);
  }

  static compare(left: Package, right: Package): number {
    return compareKeys(left.key(), right.key());
  }

  /**
   * The package's name within its source, e.g. "alice/foo" for a package
   * "foo" declared in the source's alice/zkg.index.
   */
  nameWithSourceDirectory(): string {
    if (this.directory.length > 0) {
      return `${this.directory}/${this.name}`;
    }

    return this.name;
  }

  /** "source/directory/name" for packages of a source, else the git URL. */
  qualifiedName(): string {
    if (this.source.length > 0) {
      return `${this.source}/${this.nameWithSourceDirectory()}`;
    }

    return this.gitUrl;
  }

  key(): string {
    return this.qualifiedName();
  }

  toString(): string {
    return this.qualifiedName();
  }

  equals(other: Package): boolean {
    return this.key() === other.key();
  }

  isBuiltin(): boolean {
    return this.gitUrl.startsWith(BUILTIN_SCHEME);
  }

  /**
   * For a package "zeek/alice/foo" the paths "foo", "alice/foo" and
   * "zeek/alice/foo" match. Packages without a source match their name or
   * their exact git URL.
   */
  matchesPath(candidate: string): boolean {
    const candidateParts = candidate.split("/");

    if (this.source.length > 0) {
      const packageParts = this.qualifiedName().split("/");
      const offset = packageParts.length - candidateParts.length;
      if (offset < 0) {
        return false;
      }

      return candidateParts.every((part, index) => part === packageParts[offset + index]);
    }

    if (candidateParts.length === 1 && candidate === this.name) {
      return true;
    }

    return candidate === this.gitUrl;
  }

  aliases(): string[] {
    return aliases(this.metadata);
  }

  tags(): string[] {
    return tags(this.metadata);
  }

  shortDescription(): string {
    return shortDescription(this.metadata);
  }

  dependencies(field = "depends"): DependencyMap | null {
    return dependencies(this.metadata, field);
  }

  readDependencies(field = "depends"): MetadataField<DependencyMap> {
    return readDependencies(this.metadata, field);
  }

  userVars(): UserVarEntry[] | null {
    return userVars(this.metadata);
  }
}

/** How the package manager treats an installed package. */
export class PackageStatus {
  isLoaded: boolean;

  isPinned: boolean;

  isOutdated: boolean;

  trackingMethod?: TrackingMethod;

  currentVersion?: string;

  currentHash?: string;

  constructor(init: PackageStatusInit = {}) {
    this.isLoaded = init.isLoaded ?? false;
    this.isPinned = init.isPinned ?? false;
    this.isOutdated = init.isOutdated ?? false;
    this.trackingMethod = init.trackingMethod;
    this.currentVersion = init.currentVersion;
    this.currentHash = init.currentHash;
  }
}

export interface PackageInfoInit {
  package: Package;
  /** Set for installed packages. */
  status?: PackageStatus;
  metadata?: PackageMetadata;
  /** Version tags, ascending. */
  versions?: string[];
  /** The version the metadata was read at. */
  metadataVersion?: string;
  versionType?: MetadataVersionType;
  /** Why gathering information on the package failed. */
  invalidReason?: string;
  /** Absolute path of the manifest the metadata was read from. */
  metadataFile?: string;
  defaultBranch?: string;
}

/** Everything known about a package, installed or not. */
export class PackageInfo {
  readonly package: Package;

  status?: PackageStatus;

  metadata: PackageMetadata;

  versions: string[];

  metadataVersion: string;

  versionType?: MetadataVersionType;

  invalidReason: string;

  metadataFile?: string;

  defaultBranch?: string;

  constructor(init: PackageInfoInit) {
    this.package = init.package;
    this.status = init.status;
    this.metadata = init.metadata ?? {};
    this.versions = init.versions ?? [];
    this.metadataVersion = init.metadataVersion ?? "";
    this.versionType = init.versionType;
    this.invalidReason = init.invalidReason ?? "";
    this.metadataFile = init.metadataFile;
    this.defaultBranch = init.defaultBranch;
  }

  aliases(): string[] {
    return aliases(this.metadata);
  }

  tags(): string[] {
    return tags(this.metadata);
  }

  shortDescription(): string {
    return shortDescription(this.metadata);
  }

  dependencies(field = "depends"): DependencyMap | null {
    return dependencies(this.metadata, field);
  }

  readDependencies(field = "depends"): MetadataField<DependencyMap> {
    return readDependencies(this.metadata, field);
  }

  userVars(): UserVarEntry[] | null {
    return userVars(this.metadata);
  }

  /**
   * The last version tag, or the default branch when the package has no
   * tags. Tags are expected in ascending order.
   */
  bestVersion(): string {
    const latest = this.versions[this.versions.length - 1];
    if (latest !== undefined) {
      return latest;
    }

    if (this.defaultBranch === undefined || this.defaultBranch.length === 0) {
      throw stateError(
        "NO_BEST_VERSION",
        `Package ${this.package.qualifiedName()} has neither version tags nor a default branch.`,
        "Provide the default branch when building the PackageInfo.",
      );
    }

    return this.defaultBranch;
  }

  isBuiltin(): boolean {
    return this.package.isBuiltin();
  }
}

/**
 * An installed package with its status. Equality and ordering look at the
 * package identity only, so two records with different status are equal.
 */
export class InstalledPackage {
  readonly package: Package;

  readonly status: PackageStatus;

  constructor(pkg: Package, status: PackageStatus) {
    this.package = pkg;
    this.status = status;
  }

  static compare(left: InstalledPackage, right: InstalledPackage): number {
    return compareKeys(left.key(), right.key());
  }

  key(): string {
    return this.package.key();
  }

  equals(other: InstalledPackage): boolean {
    return this.key() === other.key();
  }

  isBuiltin(): boolean {
    return this.package.isBuiltin();
  }

  /** Whether the current version satisfies `spec`. */
  fulfills(spec: string): VersionVerdict {
    return new PackageVersion(this.status.trackingMethod, this.status.currentVersion).fulfills(spec);
  }
}
