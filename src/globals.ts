import { LRUCache } from "lru-cache";
import { PROJECT_INFO_CACHE_SIZE, SNAPSHOT_CACHE_SIZE } from "./constants";
import { DependencySnapshot, ProjectInfo } from "./types";

// Use in-memory caches to store results of network requests and
// subprocess calls.

// Cache results of requests to the PyPI JSON API, keyed by project name.
export const projectInfoCache = new LRUCache<string, ProjectInfo>({
  max: PROJECT_INFO_CACHE_SIZE,
});

// Cache normalized dependency snapshots, keyed by the inspected package's
// key. Snapshots are read-only, so handing out the cached one is safe.
export const dependencySnapshotCache = new LRUCache<
  string,
  DependencySnapshot
>({
  max: SNAPSHOT_CACHE_SIZE,
});
