// A read-only view of PyPI, and of the dependency trees of installed packages.

export {
  Pypi,
  PypiOptions,
  InfoExtractor,
  infoOfPackageFromWeb,
  slurpUserProjectsInfo,
} from "./pypi";
export {
  PackageNameStub,
  PackageNameFetcher,
  getUpdatedPackageNameStub,
} from "./package-names";
export {
  CommandRunner,
  fetchDependencyTree,
  installedPackageDependencies,
  loadDependencySnapshot,
  nestedDependencies,
  nestedDependenciesOf,
  packageDependencies,
} from "./deps";
export {
  buildNestedDependencies,
  collectDependencies,
  normalizeDependencyTree,
  normalizePackageKey,
} from "./graph";
export {
  compareVersions,
  firstClause,
  isUnconstrained,
  isValidVersion,
  parseSpecifierSet,
  satisfies,
} from "./version";
export {
  DownloadOutcome,
  JsonDirectoryStore,
  KeyValueStore,
  MainInfo,
  downloadPackagesInfo,
  extractMainInfo,
  latestReleaseUploadDatetime,
} from "./tools";
export { parseSimpleIndex, parseUserProjects } from "./scrape";
export * from "./errors";
export * from "./types";
