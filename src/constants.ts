import path from "path";

// Base URL of the PyPI "simple" index listing every project.
export const PYPI_SIMPLE_URL = "https://pypi.org/simple";
// Pattern of the links found on the simple index, e.g. "/simple/numpy/".
export const SIMPLE_INDEX_HREF_PATTERN = /\/simple\/([^/]+)\//;

/**
 * URL of the JSON metadata of a project.
 * @param packageName Name of the project on PyPI.
 */
export function projectJsonUrl(packageName: string): string {
  return `https://pypi.python.org/pypi/${packageName}/json`;
}

/**
 * URL of a project's page on pypi.org.
 * @param packageName Name of the project on PyPI.
 */
export function projectPageUrl(packageName: string): string {
  return `https://pypi.org/project/${packageName}`;
}

/**
 * URL of the page listing every project of a PyPI user.
 * @param user PyPI username.
 */
export function userPageUrl(user: string): string {
  return `https://pypi.org/user/${user}/`;
}

// Environment variable overriding the root directory for local data.
export const ROOTDIR_ENV_VAR = "PYPI_LENS_ROOTDIR";
// Default root directory: the project directory.
export const DEFAULT_ROOTDIR = path.resolve(__dirname, "..");

/**
 * Root directory for local data, honouring the environment override.
 * @param env Environment to read the override from.
 */
export function rootDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[ROOTDIR_ENV_VAR] || DEFAULT_ROOTDIR;
}

/**
 * Path of a file inside the data directory.
 * @param relativePath Path relative to the data directory.
 * @param env Environment to read the root directory override from.
 */
export function dataPath(
  relativePath: string = "",
  env: NodeJS.ProcessEnv = process.env,
): string {
  return path.join(rootDir(env), "data", relativePath);
}

// Default file holding the { lowercased name: stub } map of PyPI projects.
export const PACKAGE_NAMES_FILENAME = "package-names.json";

// Command producing the installed dependency tree as JSON.
export const PIPDEPTREE_COMMAND = "pipdeptree";

// Max entries of the in-memory caches.
export const PROJECT_INFO_CACHE_SIZE = 500;
export const SNAPSHOT_CACHE_SIZE = 50;
