import fs from "fs/promises";
import path from "path";
import { Pypi } from "./pypi";
import { ProjectInfo, ReleaseFile } from "./types";
import { checkPathExists, readJsonFile, writeJsonFile } from "./utils";
import { compareVersions, isValidVersion } from "./version";

/**
 * Minimal asynchronous key-value store.
 */
export interface KeyValueStore<V> {
  has(key: string): Promise<boolean>;
  get(key: string): Promise<V>;
  set(key: string, value: V): Promise<void>;
}

/**
 * Stores each value as "<key>.json" in a directory.
 */
export class JsonDirectoryStore implements KeyValueStore<unknown> {
  constructor(public readonly directory: string) {}

  private pathOf(key: string): string {
    if (key === "" || key === "." || key === ".." || /[/\\]/.test(key)) {
      throw new Error(`Invalid store key: '${key}'`);
    }
    return path.join(this.directory, `${key}.json`);
  }

  async has(key: string): Promise<boolean> {
    return checkPathExists(this.pathOf(key));
  }

  async get(key: string): Promise<unknown> {
    return readJsonFile(this.pathOf(key));
  }

  async set(key: string, value: unknown): Promise<void> {
    await writeJsonFile(this.pathOf(key), value);
  }
}

/**
 * Anything able to fetch the info of a project by name, such as `Pypi`.
 */
export interface ProjectInfoSource {
  get(name: string): Promise<ProjectInfo>;
}

export type DownloadOutcome =
  | { name: string; status: "saved" }
  | { name: string; status: "skipped" }
  | { name: string; status: "failed"; error: Error };

export interface DownloadOptions {
  // Log progress every 100 packages, and failures. Defaults to true.
  verbose?: boolean;
  // Where to fetch project info from. Defaults to live PyPI.
  source?: ProjectInfoSource;
}

/**
 * Resolves a list of package names given either as an array, as the path of
 * a file with one name per line, or as a whitespace separated string.
 */
export async function readPackageNames(
  names: string | string[],
): Promise<string[]> {
  let list: string[];
  if (Array.isArray(names)) {
    list = names;
  } else if (await checkPathExists(names)) {
    list = (await fs.readFile(names, "utf-8")).split(/\r?\n/);
  } else {
    list = names.split(/\s+/);
  }
  return list.map((name) => name.trim()).filter((name) => name !== "");
}

/**
 * Downloads the PyPI info of packages into a store, skipping those the store
 * already has. One package failing does not stop the others: every package
 * gets an outcome, and the caller decides what to do with the failures.
 * @param packageNames Names, see `readPackageNames`.
 * @param store Store to save into, or the path of a directory of JSON files.
 * @returns Promise of one outcome per package, in order.
 */
export async function downloadPackagesInfo(
  packageNames: string | string[],
  store: KeyValueStore<ProjectInfo> | KeyValueStore<unknown> | string,
  options: DownloadOptions = {},
): Promise<DownloadOutcome[]> {
  const verbose = options.verbose ?? true;
  const log = (message: string): void => {
    if (verbose) {
      console.log(message);
    }
  };
  const target =
    typeof store === "string" ? new JsonDirectoryStore(store) : store;
  const source = options.source ?? Pypi.of();
  const names = await readPackageNames(packageNames);

  const outcomes: DownloadOutcome[] = [];
  for (const [index, name] of names.entries()) {
    const position = index + 1;
    if (position % 100 === 0) {
      log(`----- ${position}/${names.length} -----`);
    }
    try {
      if (await target.has(name)) {
        outcomes.push({ name, status: "skipped" });
        continue;
      }
      await target.set(name, await source.get(name));
      outcomes.push({ name, status: "saved" });
    } catch (error) {
      log(`Error with item (${position}/${names.length}): ${name}`);
      outcomes.push({
        name,
        status: "failed",
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
  return outcomes;
}

/**
 * The main fields of a project's info, plus the size and upload time of the
 * latest release's sdist (or first wheel, when there is no sdist).
 */
export interface MainInfo {
  version: string | null;
  summary: string | null;
  home_page: string | null;
  project_url: string | null;
  license: string | null;
  description: string | null;
  requires_dist: string[] | null;
  size?: number;
  upload_time_iso_8601?: string;
}

/**
 * Extracts the main fields of the info of a project.
 */
export function extractMainInfo(projectInfo: ProjectInfo): MainInfo {
  const info = projectInfo.info;
  const mainInfo: MainInfo = {
    version: info.version ?? null,
    summary: info.summary ?? null,
    home_page: info.home_page ?? null,
    project_url: info.project_url ?? null,
    license: info.license ?? null,
    description: info.description ?? null,
    requires_dist: info.requires_dist ?? null,
  };

  if (mainInfo.version) {
    const files = projectInfo.releases?.[mainInfo.version] ?? [];
    const lastRelease =
      files.find((file) => file.packagetype === "sdist") ??
      files.find((file) => file.packagetype === "bdist_wheel");
    if (lastRelease) {
      mainInfo.size = lastRelease.size;
      mainInfo.upload_time_iso_8601 = lastRelease.upload_time_iso_8601;
    }
  }
  return mainInfo;
}

/**
 * Gets the upload time of the first file of the latest release. Release
 * names that are not valid versions are ignored.
 * @param releases The "releases" section of a project's info.
 * @returns The upload time, or null if there is no release with files.
 */
export function latestReleaseUploadDatetime(
  releases: Record<string, ReleaseFile[]> | undefined,
): string | null {
  let latest: string | null = null;
  for (const name of Object.keys(releases ?? {})) {
    if (
      isValidVersion(name) &&
      (latest === null || compareVersions(name, latest) > 0)
    ) {
      latest = name;
    }
  }
  if (latest === null || !releases) {
    return null;
  }
  const [firstFile] = releases[latest] ?? [];
  return firstFile?.upload_time ?? null;
}
