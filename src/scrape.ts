import { JSDOM } from "jsdom";
import { SIMPLE_INDEX_HREF_PATTERN } from "./constants";
import { UserProject } from "./types";

/**
 * Parses the PyPI simple index into { lowercased project name: stub }, the
 * stub being the path segment of the project's link, e.g.
 * `<a href="/simple/typing-extensions/">typing_extensions</a>` gives
 * { "typing_extensions": "typing-extensions" }. Links that do not point to
 * a project are skipped.
 */
export function parseSimpleIndex(html: string): Record<string, string> {
  const doc = new JSDOM(html).window.document;
  const stubs: Record<string, string> = {};
  for (const anchor of Array.from(doc.querySelectorAll("a"))) {
    const href = anchor.getAttribute("href") ?? "";
    const match = SIMPLE_INDEX_HREF_PATTERN.exec(href);
    const name = anchor.textContent?.trim();
    if (match && name) {
      stubs[name.toLowerCase()] = match[1];
    }
  }
  return stubs;
}

/**
 * Parses a PyPI user page into the list of the user's projects, with the
 * date of their last release.
 * @throws Error if the number of projects announced in the page heading
 * differs from the number of projects listed.
 */
export function parseUserProjects(html: string): UserProject[] {
  const doc = new JSDOM(html).window.document;
  const heading = doc.querySelector("h2")?.textContent ?? "";
  const announced = /\d+/.exec(heading);
  if (!announced) {
    throw new Error(
      `Could not find the number of projects in '${heading.trim()}'`,
    );
  }
  const expected = Number(announced[0]);

  const snippets = Array.from(doc.querySelectorAll("a.package-snippet"));
  if (snippets.length !== expected) {
    throw new Error(
      `I expected ${expected} projects but found ${snippets.length} listed`,
    );
  }
  return snippets.map((snippet) => ({
    name: snippet.querySelector("h3")?.textContent?.trim() ?? "",
    href: snippet.getAttribute("href") ?? "",
    date: snippet.querySelector("time")?.getAttribute("datetime") ?? "",
  }));
}
