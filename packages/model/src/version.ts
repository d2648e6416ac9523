import * as semver from "semver";
import type { TrackingMethod, VersionVerdict } from "@zkgmeta/types";

import {
  BRANCH_SPEC_PREFIX,
  TRACKING_METHOD_BRANCH,
  TRACKING_METHOD_COMMIT,
  WILDCARD_SPEC,
} from "./constants.js";
import { normalizeVersionTag } from "./text.js";
import { logger } from "./utils/logger.js";

const CLAUSE_PATTERN =
  /^(<=|>=|==|!=|~=|<|>|=|\^|~)?\s*(v?(?:\d+|[xX*])(?:\.(?:\d+|[xX*])){0,2}(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)$/;

// Tags must start with a numeric version; "release-7" is not one.
const LEADING_VERSION_PATTERN = /^\d+(?:\.\d+){0,2}/;

// Pre-release tags like "2.0.0-rc1" take part in comparisons.
const PRERELEASE_OPTIONS = { includePrerelease: true };

interface SpecClause {
  range: semver.Range;
  negate: boolean;
}

/** A parsed version spec: every clause must hold. */
export interface VersionSpec {
  readonly source: string;
  test(version: semver.SemVer): boolean;
}

function toRangeOperator(operator: string | undefined): string {
  switch (operator) {
    case undefined:
    case "!=":
      return "";
    case "==":
      return "=";
    case "~=":
      return "~";
    default:
      return operator;
  }
}

function parseClause(clause: string): SpecClause | null {
  const match = CLAUSE_PATTERN.exec(clause.trim());
  if (match === null) {
    return null;
  }

  const operator = match[1];
  const version = match[2];
  if (version === undefined) {
    return null;
  }

  const range = semver.validRange(`${toRangeOperator(operator)}${version}`, PRERELEASE_OPTIONS);
  if (range === null) {
    return null;
  }

  return {
    range: new semver.Range(range, PRERELEASE_OPTIONS),
    negate: operator === "!=",
  };
}

/**
 * Parses a comma separated list of comparator clauses such as
 * ">=1.0.0,<2.0.0". Returns null when any clause is malformed.
 */
export function parseVersionSpec(spec: string): VersionSpec | null {
  const clauses: SpecClause[] = [];
  for (const part of spec.split(",")) {
    const clause = parseClause(part);
    if (clause === null) {
      return null;
    }
    clauses.push(clause);
  }

  return {
    source: spec,
    test(version: semver.SemVer): boolean {
      return clauses.every((clause) => clause.range.test(version) !== clause.negate);
    },
  };
}

/**
 * Lenient semantic version of a tag: "v" is stripped, missing minor and patch
 * components become 0, a pre-release part is kept. null unless the tag starts
 * with a numeric version.
 */
export function coerceVersionTag(tag: string): semver.SemVer | null {
  const normalized = normalizeVersionTag(tag);
  if (!LEADING_VERSION_PATTERN.test(normalized)) {
    return null;
  }

  return semver.coerce(normalized, PRERELEASE_OPTIONS);
}

/**
 * Compares the version a package is at, given its tracking method, against
 * version specs.
 */
export class PackageVersion {
  /**
   * Lenient semantic version of `version`, computed on first use.
   * undefined until then, null when the tag cannot be coerced.
   * Recomputing it gives the same value, so it needs no guarding.
   */
  private coerced: semver.SemVer | null | undefined = undefined;

  constructor(
    readonly trackingMethod: TrackingMethod | undefined,
    readonly version: string | undefined,
  ) {}

  coercedVersion(): semver.SemVer | null {
    if (this.coerced === undefined) {
      this.coerced = this.version === undefined ? null : coerceVersionTag(this.version);
      if (this.coerced === null) {
        logger.debug("version cannot be coerced to semver", { version: this.version });
      }
    }

    return this.coerced;
  }

  fulfills(spec: string): VersionVerdict {
    if (spec === WILDCARD_SPEC) {
      return { ok: true, message: "" };
    }

    if (this.trackingMethod === TRACKING_METHOD_COMMIT) {
      return { ok: false, message: `tracking method commit not compatible with "${spec}"` };
    }

    // Also covers "branch=<name>" specs, even for the branch being tracked.
    if (this.trackingMethod === TRACKING_METHOD_BRANCH) {
      return { ok: false, message: `tracking method branch not compatible with "${spec}"` };
    }

    if (spec.startsWith(BRANCH_SPEC_PREFIX)) {
      const branch = spec.slice(BRANCH_SPEC_PREFIX.length);
      return {
        ok: false,
        message: `branch ${branch} requested, but using method ${this.trackingMethod ?? "none"}`,
      };
    }

    const parsed = parseVersionSpec(spec);
    if (parsed === null) {
      logger.debug("invalid semver spec", { spec });
      return { ok: false, message: `invalid semver spec: ${spec}` };
    }

    const current = this.coercedVersion();
    if (current === null) {
      return { ok: false, message: `cannot compare "${this.version ?? ""}" against ${spec}` };
    }

    if (parsed.test(current)) {
      return { ok: true, message: "" };
    }

    return { ok: false, message: `${this.version ?? ""} not in ${spec}` };
  }
}
