import { BUILTIN_SCHEME, BUILTIN_SOURCE, TRACKING_METHOD_BUILTIN } from "./constants.js";
import { usageError } from "./errors.js";
import { Package, PackageInfo, PackageStatus } from "./package.js";

export interface BuiltinPackageInit {
  name: string;
  currentVersion: string;
  currentHash?: string;
}

/**
 * Record for a package compiled into Zeek, as listed in Zeek's
 * `zkg.provides` entries. It is never fetched through git.
 */
export function makeBuiltinPackage(init: BuiltinPackageInit): PackageInfo {
  if (init.name.length === 0) {
    throw usageError("A builtin package needs a name.");
  }

  const pkg = new Package({
    gitUrl: `${BUILTIN_SCHEME}${init.name}`,
    name: init.name,
    source: BUILTIN_SOURCE,
    canonical: true,
  });

  const status = new PackageStatus({
    isLoaded: true,
    isPinned: true,
    isOutdated: false,
    trackingMethod: TRACKING_METHOD_BUILTIN,
    currentVersion: init.currentVersion,
    currentHash: init.currentHash,
  });

  return new PackageInfo({
    package: pkg,
    status,
    versions: [init.currentVersion],
  });
}
