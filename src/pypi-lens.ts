#!/usr/bin/env node
import { installedPackageDependencies, nestedDependenciesOf } from "./deps";
import { Pypi, slurpUserProjectsInfo } from "./pypi";
import { downloadPackagesInfo, extractMainInfo } from "./tools";
import { parseArgs } from "./utils";

const USAGE = `Usage: pypi-lens <command> [arguments]

Commands:
  deps <package> [--format names|names_with_req|tuples|details]
                 [--direct] [--problematic]
  tree <package>
  info <package>
  user <username>
  refresh
  download <names or file> <output directory>`;

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Entry point for the CLI. Processes the 'deps', 'tree', 'info', 'user',
 * 'refresh' and 'download' commands.
 */
async function main(): Promise<void> {
  // Extract command line arguments, ignoring the first two (node and script
  // path).
  const { positionals, flags } = parseArgs(process.argv.slice(2), ["format"]);
  const [command, target, output] = positionals;

  switch (command) {
    case "deps": {
      if (!target) {
        console.log(USAGE);
        process.exit(1);
      }
      const format = typeof flags.format === "string" ? flags.format : "names";
      const result = await installedPackageDependencies(target, {
        format,
        includeTransitive: !flags.direct,
        onlyIncludeProblematicVersions: Boolean(flags.problematic),
      });
      if (Array.isArray(result)) {
        printJson(result);
        break;
      }
      printJson(result.details);
      for (const failure of result.failures) {
        console.error(
          `Could not check ${failure.package_name} ` +
            `${failure.installed_version} against ` +
            `'${failure.required_version}': ${failure.error.message}`,
        );
      }
      break;
    }
    case "tree":
      if (!target) {
        console.log(USAGE);
        process.exit(1);
      }
      printJson(await nestedDependenciesOf(target));
      break;
    case "info":
      if (!target) {
        console.log(USAGE);
        process.exit(1);
      }
      printJson(extractMainInfo(await Pypi.of().get(target)));
      break;
    case "user":
      if (!target) {
        console.log(USAGE);
        process.exit(1);
      }
      printJson(await slurpUserProjectsInfo(target));
      break;
    case "refresh":
      await Pypi.refreshCachedPackageNames();
      break;
    case "download": {
      if (!target || !output) {
        console.log(USAGE);
        process.exit(1);
      }
      const outcomes = await downloadPackagesInfo(target, output);
      const count = (status: string): number =>
        outcomes.filter((outcome) => outcome.status === status).length;
      const failed = count("failed");
      console.log(
        `Saved ${count("saved")}, skipped ${count("skipped")}, ` +
          `failed ${failed}.`,
      );
      if (failed > 0) {
        process.exitCode = 1;
      }
      break;
    }
    default:
      console.log(USAGE);
      break;
  }
}

main().catch((error) => {
  console.error(
    "An error occurred:",
    error instanceof Error ? error.message : error,
  );
  process.exit(1);
});
