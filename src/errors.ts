/**
 * Base class of the errors raised by this package. `code` identifies the
 * kind of failure independently of the message.
 */
export class PypiLensError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "PypiLensError";
  }
}

/**
 * A raw dependency tree record does not have the expected shape.
 */
export class MalformedRecordError extends PypiLensError {
  constructor(message: string) {
    super(message, "MALFORMED_RECORD");
    this.name = "MalformedRecordError";
  }
}

/**
 * A package key is missing from the snapshot (or from a strict collection).
 */
export class UnknownPackageKeyError extends PypiLensError {
  constructor(public packageKey: string) {
    super(`Unknown package key: ${packageKey}`, "UNKNOWN_PACKAGE_KEY");
    this.name = "UnknownPackageKeyError";
  }
}

export class InvalidSpecifierError extends PypiLensError {
  constructor(
    public specifier: string,
    reason?: string,
  ) {
    super(
      `Invalid specifier: '${specifier}'${reason ? ` (${reason})` : ""}`,
      "INVALID_SPECIFIER",
    );
    this.name = "InvalidSpecifierError";
  }
}

export class InvalidVersionError extends PypiLensError {
  constructor(public version: string) {
    super(`Invalid version: '${version}'`, "INVALID_VERSION");
    this.name = "InvalidVersionError";
  }
}

export class UnsupportedFormatError extends PypiLensError {
  constructor(public format: string) {
    super(`Unknown format '${format}'`, "UNSUPPORTED_FORMAT");
    this.name = "UnsupportedFormatError";
  }
}

/**
 * The dependency tree tool reported nothing for a package.
 */
export class PackageNotInstalledError extends PypiLensError {
  constructor(public packageName: string) {
    super(
      `It doesn't look like you have this package installed: ${packageName}`,
      "PACKAGE_NOT_INSTALLED",
    );
    this.name = "PackageNotInstalledError";
  }
}

/**
 * PyPI answered with something other than 200.
 */
export class RegistryRequestError extends PypiLensError {
  constructor(
    message: string,
    public status: number,
    public responsePath?: string,
  ) {
    super(message, "REGISTRY_REQUEST_FAILED");
    this.name = "RegistryRequestError";
  }
}
