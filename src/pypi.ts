import axios from "axios";
import { projectJsonUrl, projectPageUrl, userPageUrl } from "./constants";
import { UnknownPackageKeyError } from "./errors";
import { projectInfoCache } from "./globals";
import { PackageNameStub } from "./package-names";
import { parseUserProjects } from "./scrape";
import { ProjectInfo, UserProject } from "./types";
import { requestOrThrow } from "./utils";

/**
 * Retrieves the JSON metadata of a project from PyPI. Results are kept in an
 * in-memory cache for the lifetime of the process.
 * @param packageName Name of the project.
 * @returns Promise of the project's info, releases, urls and vulnerabilities.
 * @throws RegistryRequestError if PyPI does not answer with 200.
 */
export async function infoOfPackageFromWeb(
  packageName: string,
): Promise<ProjectInfo> {
  const cached = projectInfoCache.get(packageName);
  if (cached) {
    return cached;
  }
  const response = await requestOrThrow<ProjectInfo>(
    projectJsonUrl(packageName),
  );
  projectInfoCache.set(packageName, response.data);
  return response.data;
}

/**
 * Fetches the projects of a PyPI user from their user page, along with the
 * date of each project's last release, which saves a request per project
 * when that is all you need.
 * @param user PyPI username.
 * @throws RegistryRequestError if PyPI does not answer with 200.
 */
export async function slurpUserProjectsInfo(
  user: string,
): Promise<UserProject[]> {
  const response = await requestOrThrow<string>(userPageUrl(user), {
    responseType: "text",
  });
  return parseUserProjects(response.data);
}

/**
 * Turns the info of a project into the value the mapping exposes.
 */
export type InfoExtractor<T> = (info: ProjectInfo) => T;

export interface PypiOptions {
  // Explicit collection of project names.
  projectNames?: Iterable<string>;
  // User the `projectNames` belong to, for display.
  user?: string;
  // Names of all PyPI projects, used when no `projectNames` are given.
  nameStub?: PackageNameStub;
  // Whether `get` refuses names outside the collection. By default any
  // project on PyPI can be fetched.
  strictGetItem?: boolean;
}

type ProjectSource =
  | { kind: "all" }
  | { kind: "user"; user: string }
  | { kind: "collection" };

const identity: InfoExtractor<ProjectInfo> = (info) => info;

/**
 * A read-only mapping of PyPI projects: project names to project info.
 *
 * The names come from a local copy of the PyPI index (`PackageNameStub`),
 * from the projects of a user, or from an explicit collection; the info is
 * fetched live from the PyPI JSON API.
 *
 * ```ts
 * const pypi = Pypi.of({ projectNames: ["numpy", "pandas"] });
 * pypi.size; // 2
 * pypi.has("numpy"); // true
 * const versions = pypi.withExtractor((info) => info.info.version);
 * await versions.get("numpy"); // e.g. "2.1.2"
 * ```
 */
export class Pypi<T = ProjectInfo> implements Iterable<string> {
  private readonly projectNames: ReadonlySet<string>;
  private readonly source: ProjectSource;

  constructor(
    private readonly infoExtractor: InfoExtractor<T>,
    private readonly options: PypiOptions = {},
  ) {
    if (options.projectNames) {
      this.projectNames = new Set(options.projectNames);
      this.source = options.user
        ? { kind: "user", user: options.user }
        : { kind: "collection" };
    } else {
      this.projectNames = new Set(options.nameStub?.names() ?? []);
      this.source = { kind: "all" };
    }
  }

  /**
   * A mapping whose values are the raw project info.
   */
  static of(options: PypiOptions = {}): Pypi<ProjectInfo> {
    return new Pypi(identity, options);
  }

  /**
   * A mapping of every PyPI project listed in the local name stub.
   * @param nameStub The stub to use, loaded from the data directory if absent.
   */
  static async all(
    nameStub?: PackageNameStub,
    options: Omit<PypiOptions, "projectNames" | "user" | "nameStub"> = {},
  ): Promise<Pypi<ProjectInfo>> {
    return Pypi.of({
      ...options,
      nameStub: nameStub ?? (await PackageNameStub.load()),
    });
  }

  /**
   * A mapping of the projects of a PyPI user.
   * @param user PyPI username.
   */
  static async forUser(
    user: string,
    options: Omit<PypiOptions, "projectNames" | "user" | "nameStub"> = {},
  ): Promise<Pypi<ProjectInfo>> {
    const projects = await slurpUserProjectsInfo(user);
    return Pypi.of({
      ...options,
      user,
      projectNames: projects.map((project) => project.name),
    });
  }

  /**
   * Downloads and saves a fresh copy of the names of all PyPI projects.
   * Mappings built before keep the names they were built with.
   */
  static async refreshCachedPackageNames(
    nameStub?: PackageNameStub,
  ): Promise<{ before: number; after: number }> {
    const stub = nameStub ?? (await PackageNameStub.load());
    return stub.refresh();
  }

  /**
   * The same collection of projects, exposing other values.
   * @param infoExtractor Turns project info into the exposed value.
   */
  withExtractor<U>(infoExtractor: InfoExtractor<U>): Pypi<U> {
    return new Pypi(infoExtractor, {
      ...this.options,
      projectNames: this.source.kind === "all" ? undefined : this.projectNames,
    });
  }

  [Symbol.iterator](): Iterator<string> {
    return this.projectNames.values();
  }

  keys(): IterableIterator<string> {
    return this.projectNames.values();
  }

  has(name: string): boolean {
    return this.projectNames.has(name);
  }

  get size(): number {
    return this.projectNames.size;
  }

  /**
   * Fetches the info of a project. Any project on PyPI can be fetched, not
   * just those of this mapping, unless `strictGetItem` is set.
   * @throws UnknownPackageKeyError if `strictGetItem` is set and the
   * project is not in this mapping.
   */
  async get(name: string): Promise<T> {
    if (this.options.strictGetItem && !this.has(name)) {
      throw new UnknownPackageKeyError(name);
    }
    return this.infoExtractor(await this.livePackageInfo(name));
  }

  livePackageInfo(name: string): Promise<ProjectInfo> {
    return infoOfPackageFromWeb(name);
  }

  async hasPypiPage(name: string): Promise<boolean> {
    const response = await axios.get(projectPageUrl(name), {
      validateStatus: () => true,
    });
    return response.status === 200;
  }

  toString(): string {
    switch (this.source.kind) {
      case "all":
        return "Pypi()";
      case "user":
        return `Pypi(user=${this.source.user})`;
      case "collection":
        return `Pypi(<a collection of length ${this.size}>)`;
    }
  }
}
