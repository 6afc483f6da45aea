/**
 * Normalized identity of a package: lower case, with every run of "-", "_"
 * and "." collapsed to a single "-". For example, "Typing_Extensions"
 * becomes "typing-extensions".
 */
export type PackageKey = string;

/**
 * What is known about one installed package.
 */
export interface PackageInfo {
  // Display name, which may keep underscores and mixed case.
  package_name: string;
  // Installed version, e.g. "4.12.2".
  installed_version: string;
}

/**
 * Package description of a raw dependency tree record.
 */
export interface RawPackage {
  key: string;
  package_name?: string;
  installed_version?: string;
}

/**
 * A dependency entry of a raw dependency tree record. `required_version` is
 * the raw specifier, e.g. ">=4.0.0", or "Any" / "" when unconstrained.
 */
export interface RawDependency extends RawPackage {
  required_version?: string;
}

/**
 * One record of the raw dependency tree, as printed by
 * `pipdeptree --json`.
 */
export interface RawDependencyRecord {
  package: RawPackage;
  dependencies: RawDependency[];
}

/**
 * Maps every package key to its package info.
 */
export type InfoIndex = ReadonlyMap<PackageKey, PackageInfo>;

/**
 * Maps every package key to its immediate dependencies, each with the
 * required version declared by that package.
 */
export type AdjacencyMap = ReadonlyMap<
  PackageKey,
  ReadonlyMap<PackageKey, string>
>;

/**
 * A point-in-time dependency graph. Never mutated once built, so a snapshot
 * can be shared between queries.
 */
export interface DependencySnapshot {
  infoByKey: InfoIndex;
  adjacency: AdjacencyMap;
}

export interface NestedDependencyNode {
  required_version: string;
  dependencies: NestedDependencyTree;
}

/**
 * Tree of dependencies keyed by package key. A branch that loops back to a
 * package on its own path is cut with an empty `dependencies` object.
 */
export interface NestedDependencyTree {
  [packageKey: PackageKey]: NestedDependencyNode;
}

/**
 * A dependency in the "tuples" output format: name, operator and version of
 * the first clause of the requirement, the last two empty if unconstrained.
 */
export type DependencyTuple = [name: string, operator: string, version: string];

export interface DependencyDetail {
  package_name: string;
  required_version: string;
  installed_version: string;
}

/**
 * A dependency whose requirement could not be evaluated.
 */
export interface DependencyFailure extends DependencyDetail {
  error: Error;
}

export interface DependencyDetailsReport {
  details: DependencyDetail[];
  failures: DependencyFailure[];
}

export const OUTPUT_FORMATS = [
  "names",
  "names_with_req",
  "tuples",
  "details",
] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface DependencyQueryOptions {
  // Whether to follow dependencies of dependencies. Defaults to true.
  includeTransitive?: boolean;
  // With the "details" format, list only the dependencies whose installed
  // version violates their requirement. Defaults to false.
  onlyIncludeProblematicVersions?: boolean;
}

/**
 * A release file of a project, as listed by the PyPI JSON API.
 */
export interface ReleaseFile {
  filename: string;
  packagetype: string;
  size: number;
  upload_time: string;
  upload_time_iso_8601: string;
  url: string;
  [field: string]: unknown;
}

/**
 * The "info" section of the PyPI JSON API.
 */
export interface ProjectMetadata {
  name: string;
  version: string;
  summary?: string | null;
  home_page?: string | null;
  project_url?: string | null;
  license?: string | null;
  description?: string | null;
  requires_dist?: string[] | null;
  [field: string]: unknown;
}

/**
 * Everything the PyPI JSON API returns for a project.
 */
export interface ProjectInfo {
  info: ProjectMetadata;
  last_serial?: number;
  releases?: Record<string, ReleaseFile[]>;
  urls?: ReleaseFile[];
  vulnerabilities?: unknown[];
}

/**
 * A project listed on a PyPI user page.
 */
export interface UserProject {
  name: string;
  href: string;
  // Date of the last release.
  date: string;
}
