import { MalformedRecordError } from "./errors";
import {
  buildNestedDependencies,
  collectDependencies,
  normalizeDependencyTree,
  normalizePackageKey,
} from "./graph";
import { AdjacencyMap } from "./types";

// A depends on B (">1.2", installed 1.3), which depends on C ("==0.1").
const records = [
  {
    package: { key: "a", package_name: "A", installed_version: "1.0" },
    dependencies: [
      {
        key: "b",
        package_name: "B",
        installed_version: "1.3",
        required_version: ">1.2",
      },
    ],
  },
  {
    package: { key: "b", package_name: "B", installed_version: "1.3" },
    dependencies: [
      {
        key: "c",
        package_name: "C",
        installed_version: "0.1",
        required_version: "==0.1",
      },
    ],
  },
  {
    package: { key: "c", package_name: "C", installed_version: "0.1" },
    dependencies: [],
  },
];

function adjacencyOf(
  edges: Record<string, Record<string, string>>,
): AdjacencyMap {
  return new Map(
    Object.entries(edges).map(([key, dependencies]) => [
      key,
      new Map(Object.entries(dependencies)),
    ]),
  );
}

describe("normalizePackageKey", () => {
  test.each([
    ["Typing_Extensions", "typing-extensions"],
    ["zope.interface", "zope-interface"],
    ["a--_b", "a-b"],
    ["numpy", "numpy"],
  ])("%s -> %s", (name, key) => {
    expect(normalizePackageKey(name)).toBe(key);
  });
});

describe("normalizeDependencyTree", () => {
  test("indexes packages and their immediate dependencies", () => {
    const { infoByKey, adjacency } = normalizeDependencyTree(records);

    expect(infoByKey).toEqual(
      new Map([
        ["a", { package_name: "A", installed_version: "1.0" }],
        ["b", { package_name: "B", installed_version: "1.3" }],
        ["c", { package_name: "C", installed_version: "0.1" }],
      ]),
    );
    expect(adjacency).toEqual(
      new Map([
        ["a", new Map([["b", ">1.2"]])],
        ["b", new Map([["c", "==0.1"]])],
        ["c", new Map()],
      ]),
    );
  });

  test("tells a known leaf from an unknown package", () => {
    const { adjacency } = normalizeDependencyTree(records);
    expect(adjacency.get("c")?.size).toBe(0);
    expect(adjacency.has("d")).toBe(false);
  });

  test("indexes packages only seen as dependencies", () => {
    const { infoByKey, adjacency } = normalizeDependencyTree([
      {
        package: { key: "a", package_name: "A", installed_version: "1.0" },
        dependencies: [
          {
            key: "d",
            package_name: "D",
            installed_version: "2.0",
            required_version: "",
          },
        ],
      },
    ]);
    expect(infoByKey.get("d")).toEqual({
      package_name: "D",
      installed_version: "2.0",
    });
    expect(adjacency.has("d")).toBe(false);
  });

  test("prefers a package's own record over mentions as a dependency", () => {
    const mention = {
      package: { key: "a", package_name: "A", installed_version: "1.0" },
      dependencies: [
        { key: "b", package_name: "b_from_mention", installed_version: "9" },
      ],
    };
    const own = {
      package: { key: "b", package_name: "B", installed_version: "1.3" },
      dependencies: [],
    };
    const expected = { package_name: "B", installed_version: "1.3" };

    expect(
      normalizeDependencyTree([mention, own]).infoByKey.get("b"),
    ).toEqual(expected);
    expect(
      normalizeDependencyTree([own, mention]).infoByKey.get("b"),
    ).toEqual(expected);
  });

  test("normalizes keys of records and dependencies", () => {
    const { infoByKey, adjacency } = normalizeDependencyTree([
      {
        package: {
          key: "Beautiful_Soup",
          package_name: "Beautiful_Soup",
          installed_version: "4.0",
        },
        dependencies: [
          {
            key: "Typing.Extensions",
            installed_version: "4.12.2",
            required_version: ">=4.0.0",
          },
        ],
      },
    ]);
    expect(Array.from(infoByKey.keys())).toEqual([
      "beautiful-soup",
      "typing-extensions",
    ]);
    expect(adjacency.get("beautiful-soup")).toEqual(
      new Map([["typing-extensions", ">=4.0.0"]]),
    );
    expect(infoByKey.get("beautiful-soup")?.package_name).toBe(
      "Beautiful_Soup",
    );
  });

  test("fills in missing optional fields", () => {
    const { infoByKey, adjacency } = normalizeDependencyTree([
      { package: { key: "a" }, dependencies: [{ key: "x" }] },
      { package: { key: "y" } },
    ]);
    expect(infoByKey.get("a")).toEqual({
      package_name: "a",
      installed_version: "",
    });
    expect(infoByKey.get("x")).toEqual({
      package_name: "x",
      installed_version: "",
    });
    expect(adjacency.get("a")).toEqual(new Map([["x", ""]]));
    expect(adjacency.get("y")).toEqual(new Map());
  });

  test("keeps the last requirement listed for the same dependency", () => {
    const { adjacency } = normalizeDependencyTree([
      {
        package: { key: "a" },
        dependencies: [
          { key: "b", required_version: ">=1" },
          { key: "B", required_version: ">=2" },
        ],
      },
    ]);
    expect(adjacency.get("a")).toEqual(new Map([["b", ">=2"]]));
  });

  test("accepts any iterable of records", () => {
    function* generate() {
      yield* records;
    }
    expect(normalizeDependencyTree(generate())).toEqual(
      normalizeDependencyTree(records),
    );
  });

  test("gives equal snapshots for the same input", () => {
    expect(normalizeDependencyTree(records)).toEqual(
      normalizeDependencyTree(records),
    );
  });

  test.each([
    ["a record that is not an object", [null]],
    [
      "a record without package key",
      [{ package: { package_name: "a" }, dependencies: [] }],
    ],
    ["a record without package", [{ dependencies: [] }]],
    ["an empty key", [{ package: { key: "  " }, dependencies: [] }]],
    ["non-array dependencies", [{ package: { key: "a" }, dependencies: "b" }]],
    [
      "a dependency without key",
      [{ package: { key: "a" }, dependencies: [{ package_name: "b" }] }],
    ],
  ])("rejects %s", (_, input) => {
    expect(() => normalizeDependencyTree(input)).toThrow(MalformedRecordError);
  });
});

describe("collectDependencies", () => {
  const { adjacency } = normalizeDependencyTree(records);

  test("collects the transitive closure with each edge's requirement", () => {
    expect(Array.from(collectDependencies(adjacency, "a"))).toEqual([
      ["b", ">1.2"],
      ["c", "==0.1"],
    ]);
  });

  test("collects only immediate dependencies when not transitive", () => {
    expect(Array.from(collectDependencies(adjacency, "a", false))).toEqual([
      ["b", ">1.2"],
    ]);
  });

  test("returns a copy of the immediate dependencies", () => {
    const direct = collectDependencies(adjacency, "a", false);
    direct.set("z", "");
    expect(adjacency.get("a")).toEqual(new Map([["b", ">1.2"]]));
  });

  test("excludes the root of an acyclic graph", () => {
    expect(collectDependencies(adjacency, "a").has("a")).toBe(false);
  });

  test("terminates on cycles and includes a root it leads back to", () => {
    const cyclic = adjacencyOf({ a: { b: "" }, b: { a: ">=1" } });
    expect(Array.from(collectDependencies(cyclic, "a"))).toEqual([
      ["b", ""],
      ["a", ">=1"],
    ]);
  });

  test("keeps the requirement of the first parent met depth first", () => {
    const diamond = adjacencyOf({
      a: { b: ">=1", c: ">=2" },
      b: { d: "<5" },
      c: { d: ">=3" },
      d: {},
    });
    expect(Array.from(collectDependencies(diamond, "a"))).toEqual([
      ["b", ">=1"],
      ["d", "<5"],
      ["c", ">=2"],
    ]);
  });

  test("returns nothing for a package missing from the map", () => {
    expect(collectDependencies(adjacency, "zzz").size).toBe(0);
  });
});

describe("buildNestedDependencies", () => {
  test("nests dependencies of dependencies", () => {
    const { adjacency } = normalizeDependencyTree(records);
    expect(buildNestedDependencies(adjacency, "a")).toEqual({
      b: {
        required_version: ">1.2",
        dependencies: {
          c: { required_version: "==0.1", dependencies: {} },
        },
      },
    });
  });

  test("cuts branches that loop back onto their path", () => {
    const cyclic = adjacencyOf({ a: { b: "" }, b: { a: ">=1" } });
    expect(buildNestedDependencies(cyclic, "a")).toEqual({
      b: {
        required_version: "",
        dependencies: {
          a: { required_version: ">=1", dependencies: {} },
        },
      },
    });
  });

  test("cuts a longer cycle only where it closes", () => {
    const cyclic = adjacencyOf({ a: { b: "" }, b: { c: "" }, c: { a: "" } });
    expect(buildNestedDependencies(cyclic, "b")).toEqual({
      c: {
        required_version: "",
        dependencies: {
          a: {
            required_version: "",
            dependencies: { b: { required_version: "", dependencies: {} } },
          },
        },
      },
    });
  });

  test("cuts a package depending on itself", () => {
    const selfLoop = adjacencyOf({ a: { a: "" } });
    expect(buildNestedDependencies(selfLoop, "a")).toEqual({
      a: { required_version: "", dependencies: {} },
    });
  });

  test("expands a package shared by two branches in both", () => {
    const diamond = adjacencyOf({
      a: { b: "", c: "" },
      b: { d: "==1" },
      c: { d: "==2" },
    });
    expect(buildNestedDependencies(diamond, "a")).toEqual({
      b: {
        required_version: "",
        dependencies: { d: { required_version: "==1", dependencies: {} } },
      },
      c: {
        required_version: "",
        dependencies: { d: { required_version: "==2", dependencies: {} } },
      },
    });
  });
});
