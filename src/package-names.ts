import { PACKAGE_NAMES_FILENAME, PYPI_SIMPLE_URL, dataPath } from "./constants";
import { parseSimpleIndex } from "./scrape";
import {
  checkPathExists,
  readJsonFile,
  requestOrThrow,
  writeJsonFile,
} from "./utils";

/**
 * Fetches a fresh { lowercased project name: stub } map.
 */
export type PackageNameFetcher = () => Promise<Record<string, string>>;

/**
 * Gets the { lowercased project name: stub } map of every project from the
 * PyPI simple index.
 */
export async function getUpdatedPackageNameStub(): Promise<
  Record<string, string>
> {
  const response = await requestOrThrow<string>(PYPI_SIMPLE_URL, {
    responseType: "text",
  });
  return parseSimpleIndex(response.data);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((entry) => typeof entry === "string")
  );
}

/**
 * Local copy of the names of all PyPI projects, stored as JSON. Listing
 * every project live is slow, so the copy is refreshed explicitly (but not
 * TOO often) with `refresh`.
 */
export class PackageNameStub {
  private stubs: Map<string, string>;

  constructor(
    stubs: Record<string, string> = {},
    public readonly filePath: string = dataPath(PACKAGE_NAMES_FILENAME),
  ) {
    this.stubs = new Map(Object.entries(stubs));
  }

  /**
   * Loads the stub saved at `filePath`. A missing or unreadable file gives
   * an empty stub and a warning, since only listing all projects needs it.
   * @param filePath JSON file to load.
   */
  static async load(
    filePath: string = dataPath(PACKAGE_NAMES_FILENAME),
  ): Promise<PackageNameStub> {
    if (!(await checkPathExists(filePath))) {
      console.warn(
        `Couldn't find ${filePath}. Some functionality might not work ` +
          "until the package names are refreshed.",
      );
      return new PackageNameStub({}, filePath);
    }

    let contents: unknown;
    try {
      contents = await readJsonFile(filePath);
    } catch (error) {
      console.warn(
        `Couldn't read ${filePath}: ${error}. ` +
          "Some functionality might not work.",
      );
      return new PackageNameStub({}, filePath);
    }
    if (!isStringRecord(contents)) {
      console.warn(
        `${filePath} is not a { name: stub } object. ` +
          "Some functionality might not work.",
      );
      return new PackageNameStub({}, filePath);
    }
    return new PackageNameStub(contents, filePath);
  }

  get size(): number {
    return this.stubs.size;
  }

  names(): string[] {
    return Array.from(this.stubs.keys());
  }

  has(name: string): boolean {
    return this.stubs.has(name.toLowerCase());
  }

  stubOf(name: string): string | undefined {
    return this.stubs.get(name.toLowerCase());
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.stubs);
  }

  async save(): Promise<void> {
    await writeJsonFile(this.filePath, this.toJSON());
  }

  /**
   * Replaces the names with a fresh copy and saves them.
   * @param fetcher Source of the fresh copy, the PyPI simple index by default.
   * @param verbose Whether to log the before and after counts.
   * @returns Promise of the number of names before and after.
   */
  async refresh(
    fetcher: PackageNameFetcher = getUpdatedPackageNameStub,
    verbose: boolean = true,
  ): Promise<{ before: number; after: number }> {
    const before = this.size;
    this.stubs = new Map(Object.entries(await fetcher()));
    await this.save();
    if (verbose) {
      console.log(
        `Updated the package names. Had ${before} items; ` +
          `now has ${this.size}. They are saved here: ${this.filePath}`,
      );
    }
    return { before, after: this.size };
  }
}
