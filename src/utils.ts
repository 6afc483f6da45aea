import fs from "fs/promises";
import os from "os";
import path from "path";
import axios, { AxiosRequestConfig, AxiosResponse } from "axios";
import { RegistryRequestError } from "./errors";

/**
 * Checks if a path exists in the file system.
 * @param filePath The file or directory path to check.
 * @returns Promise of true if path exists, or false otherwise.
 */
export async function checkPathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    // We successfully accessed the file, so it exists.
    return true;
  } catch {
    // We failed to access, so it doesn't exist.
    return false;
  }
}

/**
 * Reads and parses a JSON file.
 * @param filePath Path of the JSON file.
 * @returns Promise of the parsed contents.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const fileContents = await fs.readFile(filePath, "utf-8");
  return JSON.parse(fileContents);
}

/**
 * Writes a value to a JSON file, creating its directory if needed.
 * @param filePath Path of the JSON file.
 * @param value Value to serialize.
 */
export async function writeJsonFile(
  filePath: string,
  value: unknown,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2));
}

/**
 * Saves a failed response to a temporary file so it can be inspected later.
 * @param url URL that was requested.
 * @param response The response that came back.
 * @returns Promise of the path of the saved file.
 */
async function saveFailedResponse(
  url: string,
  response: AxiosResponse<unknown>,
): Promise<string> {
  const directory = await fs.mkdtemp(path.join(os.tmpdir(), "pypi-lens-"));
  const responsePath = path.join(directory, "response.json");
  await writeJsonFile(responsePath, {
    url,
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
    data: response.data,
  });
  return responsePath;
}

/**
 * GETs a URL, accepting only a 200 response. Any other status is saved to a
 * temporary file and reported as an error naming that file.
 * @param url URL to request.
 * @param config Extra axios configuration, e.g. the response type.
 * @returns Promise of the response.
 * @throws RegistryRequestError if the status is not 200.
 */
export async function requestOrThrow<T>(
  url: string,
  config: AxiosRequestConfig = {},
): Promise<AxiosResponse<T>> {
  const response = await axios.get<T>(url, {
    ...config,
    validateStatus: () => true,
  });
  if (response.status === 200) {
    return response;
  }

  const responsePath = await saveFailedResponse(url, response);
  throw new RegistryRequestError(
    `Request to ${url} came back with status code: ${response.status}. ` +
      `The response was saved in ${responsePath}.`,
    response.status,
    responsePath,
  );
}

/**
 * Command line arguments split into positionals and "--flag" options.
 */
export interface ParsedArgs {
  positionals: string[];
  flags: Record<string, string | boolean>;
}

/**
 * Splits command line arguments. "--name value" and "--name=value" set a
 * string for the flags listed in `valueFlags`; any other "--name" is a
 * boolean switch.
 * @param args Arguments, without the node and script paths.
 * @param valueFlags Names of the flags taking a value.
 * @throws Error if a value flag comes last without its value.
 */
export function parseArgs(
  args: string[],
  valueFlags: readonly string[] = [],
): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], flags: {} };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      parsed.positionals.push(arg);
      continue;
    }
    const [name, inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
    if (!valueFlags.includes(name)) {
      parsed.flags[name] = true;
    } else if (inlineValue !== undefined) {
      parsed.flags[name] = inlineValue;
    } else if (i + 1 < args.length) {
      parsed.flags[name] = args[++i];
    } else {
      throw new Error(`Missing value for --${name}`);
    }
  }
  return parsed;
}
