import { execFile } from "child_process";
import { promisify } from "util";
import { PIPDEPTREE_COMMAND } from "./constants";
import {
  PackageNotInstalledError,
  UnknownPackageKeyError,
  UnsupportedFormatError,
} from "./errors";
import { dependencySnapshotCache } from "./globals";
import {
  buildNestedDependencies,
  collectDependencies,
  normalizeDependencyTree,
  normalizePackageKey,
} from "./graph";
import {
  DependencyDetail,
  DependencyDetailsReport,
  DependencyFailure,
  DependencyQueryOptions,
  DependencySnapshot,
  DependencyTuple,
  NestedDependencyTree,
  OUTPUT_FORMATS,
  OutputFormat,
  PackageInfo,
  PackageKey,
} from "./types";
import { firstClause, isUnconstrained, satisfies } from "./version";

/**
 * Runs a command and resolves with its output.
 */
export type CommandRunner = (
  file: string,
  args: string[],
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = (file, args) =>
  execFileAsync(file, args, { encoding: "utf8", maxBuffer: 64 * 1024 * 1024 });

export interface FetchDependencyTreeOptions {
  // Resolve with null instead of throwing when the package is not installed.
  returnNullIfNotInstalled?: boolean;
  // Runs the dependency tree command.
  run?: CommandRunner;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Fetches the raw dependency tree of an installed Python package, by running
 * `pipdeptree --packages <name> --json`.
 * @param packageName Name of the installed package to inspect.
 * @returns Promise of the raw records, or null if the package is not
 * installed and `returnNullIfNotInstalled` is set.
 * @throws PackageNotInstalledError if the package is not installed.
 * @throws Error if pipdeptree is missing, fails, or prints invalid JSON.
 */
export async function fetchDependencyTree(
  packageName: string,
  options: FetchDependencyTreeOptions = {},
): Promise<unknown[] | null> {
  const run = options.run ?? runCommand;

  let stdout: string;
  try {
    ({ stdout } = await run(PIPDEPTREE_COMMAND, [
      "--packages",
      packageName,
      "--json",
    ]));
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new Error(
        "pipdeptree is not installed. " +
          "Please install it using 'pip install pipdeptree'.",
      );
    }
    console.error(`Error running pipdeptree: ${error}`);
    throw error;
  }

  if (stdout.trim() === "") {
    if (options.returnNullIfNotInstalled) {
      return null;
    }
    throw new PackageNotInstalledError(packageName);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    console.error(`Error decoding pipdeptree output: ${error}`);
    console.error(`Raw output: ${stdout}`);
    throw error;
  }
  if (!Array.isArray(parsed)) {
    throw new Error(
      `Expected a list of records from pipdeptree, got: ${stdout}`,
    );
  }
  return parsed;
}

export interface LoadSnapshotOptions {
  // Runs the dependency tree command.
  run?: CommandRunner;
  // Reuse (and store) the snapshot of a previous call. Defaults to true.
  useCache?: boolean;
}

/**
 * Fetches and normalizes the dependency tree of an installed package.
 * @param packageName Name of the installed package to inspect.
 * @throws PackageNotInstalledError if the package is not installed.
 */
export async function loadDependencySnapshot(
  packageName: string,
  options: LoadSnapshotOptions = {},
): Promise<DependencySnapshot> {
  const useCache = options.useCache ?? true;
  const cacheKey = normalizePackageKey(packageName);
  const cached = useCache ? dependencySnapshotCache.get(cacheKey) : undefined;
  if (cached) {
    return cached;
  }

  const records = await fetchDependencyTree(packageName, { run: options.run });
  if (records === null) {
    throw new PackageNotInstalledError(packageName);
  }
  const snapshot = normalizeDependencyTree(records);
  if (useCache) {
    dependencySnapshotCache.set(cacheKey, snapshot);
  }
  return snapshot;
}

function isOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((known) => known === format);
}

function lookupInfo(
  snapshot: DependencySnapshot,
  packageKey: PackageKey,
): PackageInfo {
  const info = snapshot.infoByKey.get(packageKey);
  if (!info) {
    throw new UnknownPackageKeyError(packageKey);
  }
  return info;
}

/**
 * Lists the dependencies of a package with their details, optionally only
 * those whose installed version violates the requirement. A dependency whose
 * requirement or installed version cannot be parsed is reported in
 * `failures` without stopping the others.
 */
function dependencyDetails(
  snapshot: DependencySnapshot,
  dependencies: Map<PackageKey, string>,
  onlyIncludeProblematicVersions: boolean,
): DependencyDetailsReport {
  const report: DependencyDetailsReport = { details: [], failures: [] };
  for (const [depKey, requiredVersion] of dependencies) {
    const info = lookupInfo(snapshot, depKey);
    const detail: DependencyDetail = {
      package_name: info.package_name,
      required_version: requiredVersion,
      installed_version: info.installed_version,
    };

    if (!onlyIncludeProblematicVersions) {
      report.details.push(detail);
      continue;
    }
    if (isUnconstrained(requiredVersion)) {
      continue;
    }
    try {
      if (!satisfies(info.installed_version, requiredVersion)) {
        report.details.push(detail);
      }
    } catch (error) {
      const failure: DependencyFailure = {
        ...detail,
        error: error instanceof Error ? error : new Error(String(error)),
      };
      report.failures.push(failure);
    }
  }
  return report;
}

export type PackageDependenciesOptions = DependencyQueryOptions & {
  format?: string;
};

/**
 * Returns the dependencies of a package of a snapshot in one of these
 * formats:
 *
 * - "names" (default): ["dep1", "dep2", ...]
 * - "names_with_req": ["dep1>=1.2.0", "dep2<0.5", "dep3", ...]
 * - "tuples": [["dep1", ">=", "1.2.0"], ["dep3", "", ""], ...], using
 *   the first clause of each requirement
 * - "details": { details: [{ package_name, required_version,
 *   installed_version }, ...], failures: [...] }
 *
 * With `includeTransitive` (the default), dependencies of dependencies are
 * included, each with the requirement of the first parent met in a depth
 * first walk. `onlyIncludeProblematicVersions` keeps, in the "details"
 * format, only the dependencies whose installed version does not satisfy
 * the requirement.
 *
 * @param snapshot The normalized dependency tree.
 * @param packageName Name or key of the package.
 * @throws UnsupportedFormatError for an unknown format, before any work.
 * @throws UnknownPackageKeyError if the package, or one of its
 * dependencies, is missing from the snapshot.
 * @throws InvalidSpecifierError with the "tuples" format, if a requirement
 * cannot be parsed.
 */
export function packageDependencies(
  snapshot: DependencySnapshot,
  packageName: string,
  options?: DependencyQueryOptions & { format?: "names" | "names_with_req" },
): string[];
export function packageDependencies(
  snapshot: DependencySnapshot,
  packageName: string,
  options: DependencyQueryOptions & { format: "tuples" },
): DependencyTuple[];
export function packageDependencies(
  snapshot: DependencySnapshot,
  packageName: string,
  options: DependencyQueryOptions & { format: "details" },
): DependencyDetailsReport;
export function packageDependencies(
  snapshot: DependencySnapshot,
  packageName: string,
  options: PackageDependenciesOptions,
): string[] | DependencyTuple[] | DependencyDetailsReport;
export function packageDependencies(
  snapshot: DependencySnapshot,
  packageName: string,
  options: PackageDependenciesOptions = {},
): string[] | DependencyTuple[] | DependencyDetailsReport {
  const format = options.format ?? "names";
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  const packageKey = normalizePackageKey(packageName);
  lookupInfo(snapshot, packageKey);

  const dependencies = collectDependencies(
    snapshot.adjacency,
    packageKey,
    options.includeTransitive ?? true,
  );

  switch (format) {
    case "details":
      return dependencyDetails(
        snapshot,
        dependencies,
        options.onlyIncludeProblematicVersions ?? false,
      );
    case "names":
      return Array.from(
        dependencies.keys(),
        (depKey) => lookupInfo(snapshot, depKey).package_name,
      );
    case "names_with_req":
      return Array.from(dependencies, ([depKey, requiredVersion]) => {
        const { package_name } = lookupInfo(snapshot, depKey);
        return isUnconstrained(requiredVersion)
          ? package_name
          : `${package_name}${requiredVersion}`;
      });
    case "tuples":
      return Array.from(dependencies, ([depKey, requiredVersion]) => {
        const { package_name } = lookupInfo(snapshot, depKey);
        const { operator, version } = firstClause(requiredVersion);
        const tuple: DependencyTuple = [package_name, operator, version];
        return tuple;
      });
  }
}

/**
 * Builds the nested dependency tree of a package of a snapshot.
 * @param snapshot The normalized dependency tree.
 * @param packageName Name or key of the package.
 * @throws UnknownPackageKeyError if the package is missing from the snapshot.
 */
export function nestedDependencies(
  snapshot: DependencySnapshot,
  packageName: string,
): NestedDependencyTree {
  const packageKey = normalizePackageKey(packageName);
  lookupInfo(snapshot, packageKey);
  return buildNestedDependencies(snapshot.adjacency, packageKey);
}

/**
 * Like `packageDependencies`, for an installed package whose dependency
 * tree is fetched first.
 */
export async function installedPackageDependencies(
  packageName: string,
  options: PackageDependenciesOptions & LoadSnapshotOptions = {},
): Promise<string[] | DependencyTuple[] | DependencyDetailsReport> {
  const format = options.format ?? "names";
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  const snapshot = await loadDependencySnapshot(packageName, options);
  return packageDependencies(snapshot, packageName, { ...options, format });
}

/**
 * Like `nestedDependencies`, for an installed package whose dependency tree
 * is fetched first.
 */
export async function nestedDependenciesOf(
  packageName: string,
  options: LoadSnapshotOptions = {},
): Promise<NestedDependencyTree> {
  const snapshot = await loadDependencySnapshot(packageName, options);
  return nestedDependencies(snapshot, packageName);
}
