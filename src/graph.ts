import { MalformedRecordError } from "./errors";
import {
  AdjacencyMap,
  DependencySnapshot,
  NestedDependencyTree,
  PackageInfo,
  PackageKey,
} from "./types";

/**
 * Normalizes a package name or key: lower case, with every run of "-", "_"
 * and "." replaced by a single "-". "Typing_Extensions" and
 * "typing.extensions" both become "typing-extensions".
 * @param name The package name or key to normalize.
 * @returns The normalized package key.
 */
export function normalizePackageKey(name: string): PackageKey {
  return name.trim().toLowerCase().replace(/[-_.]+/g, "-");
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Reads the key and package info of a package (or dependency) description.
 * @param description The raw description.
 * @param where Where the description sits, for error messages.
 * @returns Tuple of the normalized key, the package info and the
 * description's fields.
 * @throws MalformedRecordError if the description has no usable key.
 */
function readPackage(
  description: unknown,
  where: string,
): [PackageKey, PackageInfo, Record<string, unknown>] {
  if (!isObject(description)) {
    throw new MalformedRecordError(`${where} is not an object.`);
  }
  const key = description.key;
  if (typeof key !== "string" || key.trim() === "") {
    throw new MalformedRecordError(`${where} lacks a 'key' field.`);
  }
  return [
    normalizePackageKey(key),
    {
      package_name: optionalString(description.package_name) ?? key,
      installed_version: optionalString(description.installed_version) ?? "",
    },
    description,
  ];
}

/**
 * Turns raw dependency tree records (the output of `pipdeptree --json`) into
 * a snapshot made of:
 * 1. `infoByKey`: { packageKey: { package_name, installed_version } } for
 *    every package mentioned anywhere, whether as a record or a dependency.
 * 2. `adjacency`: { packageKey: { dependencyKey: required_version } } for
 *    every record, with an empty map for records without dependencies.
 * A package's own record is authoritative for its info; a package only seen
 * as a dependency takes the info of its first mention. All keys are
 * normalized here, once.
 * @param records Raw records, e.g. freshly parsed JSON.
 * @returns The snapshot. Nothing mutates it afterwards.
 * @throws MalformedRecordError if a record or dependency lacks its key.
 */
export function normalizeDependencyTree(
  records: Iterable<unknown>,
): DependencySnapshot {
  const infoByKey = new Map<PackageKey, PackageInfo>();
  const adjacency = new Map<PackageKey, Map<PackageKey, string>>();

  let index = 0;
  for (const record of records) {
    const where = `Record ${index}`;
    if (!isObject(record)) {
      throw new MalformedRecordError(`${where} is not an object.`);
    }
    const [key, info] = readPackage(record.package, `${where} package`);
    infoByKey.set(key, info);

    const rawDependencies = record.dependencies ?? [];
    if (!Array.isArray(rawDependencies)) {
      throw new MalformedRecordError(`${where} has non-array 'dependencies'.`);
    }

    const dependencies = new Map<PackageKey, string>();
    rawDependencies.forEach((dependency: unknown, depIndex: number) => {
      const [depKey, depInfo, fields] = readPackage(
        dependency,
        `${where} dependency ${depIndex}`,
      );
      // Only a record of its own may override the first mention.
      if (!infoByKey.has(depKey)) {
        infoByKey.set(depKey, depInfo);
      }
      dependencies.set(depKey, optionalString(fields.required_version) ?? "");
    });
    adjacency.set(key, dependencies);
    index++;
  }

  return { infoByKey, adjacency };
}

/**
 * Collects the dependencies of a package from the adjacency map.
 *
 * With `includeTransitive`, walks the graph depth first, following each
 * package's dependencies in the order they are listed. A package already
 * collected is never expanded again, so cycles terminate. The root itself
 * only appears when a cycle leads back to it.
 *
 * Each collected key maps to the required version of the edge that first
 * reached it; a package required by several parents keeps the requirement
 * of the first one met in that walk. Without `includeTransitive`, the
 * result is the root's own edges.
 * @param adjacency The adjacency map of a snapshot.
 * @param root Key of the package whose dependencies to collect.
 * @param includeTransitive Whether to follow dependencies of dependencies.
 * @returns Map of dependency key to required version, in discovery order.
 */
export function collectDependencies(
  adjacency: AdjacencyMap,
  root: PackageKey,
  includeTransitive: boolean = true,
): Map<PackageKey, string> {
  const direct = adjacency.get(root) ?? new Map<PackageKey, string>();
  if (!includeTransitive) {
    return new Map(direct);
  }

  const collected = new Map<PackageKey, string>();
  const visit = (packageKey: PackageKey): void => {
    const dependencies = adjacency.get(packageKey);
    if (!dependencies) {
      return;
    }
    for (const [depKey, requiredVersion] of dependencies) {
      if (!collected.has(depKey)) {
        collected.set(depKey, requiredVersion);
        visit(depKey);
      }
    }
  };
  visit(root);
  return collected;
}

/**
 * Builds the nested tree of dependencies of a package, e.g.
 * { "b": { required_version: ">1.2", dependencies: { "c": {...} } } }.
 * Packages missing from the adjacency map are leaves. When a dependency is
 * already on the path from the root, its branch is cut: it is listed with
 * an empty `dependencies` object.
 * @param adjacency The adjacency map of a snapshot.
 * @param root Key of the package at the root of the tree.
 */
export function buildNestedDependencies(
  adjacency: AdjacencyMap,
  root: PackageKey,
): NestedDependencyTree {
  const expand = (
    packageKey: PackageKey,
    path: ReadonlySet<PackageKey>,
  ): NestedDependencyTree => {
    const nested: NestedDependencyTree = {};
    const onPath = new Set(path).add(packageKey);
    for (const [depKey, requiredVersion] of adjacency.get(packageKey) ?? []) {
      nested[depKey] = {
        required_version: requiredVersion,
        dependencies: onPath.has(depKey) ? {} : expand(depKey, onPath),
      };
    }
    return nested;
  };
  return expand(root, new Set());
}
