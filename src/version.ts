import {
  compare,
  satisfies as satisfiesSpecifier,
  valid,
  validRange,
} from "@renovatebot/pep440";
import { InvalidSpecifierError, InvalidVersionError } from "./errors";

export type SpecifierOperator =
  | "~="
  | "=="
  | "!="
  | "<="
  | ">="
  | "<"
  | ">"
  | "===";

/**
 * One "operator version" clause of a requirement, e.g. ">=1.2".
 */
export interface SpecifierClause {
  operator: SpecifierOperator;
  version: string;
}

const OPERATORS: readonly SpecifierOperator[] = [
  "~=",
  "==",
  "!=",
  "<=",
  ">=",
  "<",
  ">",
  "===",
];

const CLAUSE_PATTERN = /^(~=|===|==|!=|<=|>=|<|>)\s*(\S+)$/;

function isOperator(text: string): text is SpecifierOperator {
  return OPERATORS.some((operator) => operator === text);
}

/**
 * Whether a text is a valid PEP 440 version, e.g. "1!2.0.1rc2.post1.dev3".
 */
export function isValidVersion(text: string): boolean {
  return valid(text) !== null;
}

function checkVersion(text: string): string {
  if (!isValidVersion(text)) {
    throw new InvalidVersionError(text);
  }
  return text;
}

function checkSpecifier(specifier: string): string {
  if (!validRange(specifier)) {
    throw new InvalidSpecifierError(specifier);
  }
  return specifier;
}

/**
 * Orders two versions the PEP 440 way: dev releases, pre-releases, the
 * final release, then post-releases.
 * @returns A negative number if `left` comes first, a positive one if
 * `right` does, 0 if they are equal.
 * @throws InvalidVersionError if either version cannot be parsed.
 */
export function compareVersions(left: string, right: string): number {
  return compare(checkVersion(left), checkVersion(right));
}

/**
 * Whether a requirement string puts no constraint on the version. The
 * dependency tree tool writes "Any" for those.
 */
export function isUnconstrained(
  requirement: string | undefined | null,
): boolean {
  if (!requirement) {
    return true;
  }
  const trimmed = requirement.trim();
  return trimmed === "" || trimmed.toLowerCase() === "any";
}

/**
 * Splits a requirement such as ">=1.2, <2.0" into its clauses, in the order
 * they are written.
 * @throws InvalidSpecifierError if the requirement cannot be parsed.
 */
export function parseSpecifierSet(specifier: string): SpecifierClause[] {
  return checkSpecifier(specifier)
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map((part) => {
      const match = CLAUSE_PATTERN.exec(part);
      const operator = match?.[1];
      if (!match || operator === undefined || !isOperator(operator)) {
        throw new InvalidSpecifierError(specifier, `cannot parse '${part}'`);
      }
      return { operator, version: match[2] };
    });
}

/**
 * Whether an installed version satisfies a requirement. Every clause of the
 * requirement must hold. An unconstrained requirement is satisfied by
 * anything, without looking at the installed version. Installed
 * pre-releases are checked like any other version.
 * @throws InvalidSpecifierError if the requirement cannot be parsed.
 * @throws InvalidVersionError if the installed version cannot be parsed.
 */
export function satisfies(
  installedVersion: string,
  requirement: string,
): boolean {
  if (isUnconstrained(requirement)) {
    return true;
  }
  checkSpecifier(requirement);
  checkVersion(installedVersion);
  return satisfiesSpecifier(installedVersion, requirement, {
    prereleases: true,
  });
}

/**
 * The first clause of a requirement, in textual order. A requirement with
 * several clauses loses the others.
 * @throws InvalidSpecifierError if the requirement cannot be parsed.
 */
export function firstClause(requirement: string): {
  operator: SpecifierOperator | "";
  version: string;
} {
  if (isUnconstrained(requirement)) {
    return { operator: "", version: "" };
  }
  const [first] = parseSpecifierSet(requirement);
  return first ?? { operator: "", version: "" };
}
