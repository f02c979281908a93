import { isValid, parseISO } from "date-fns";
import { XMLValidator } from "fast-xml-parser";
import { DOMParser } from "linkedom";
import type {
  ClassInfo,
  ClassResultList,
  CompetitorResult,
  ProgressCallback,
  SplitTime,
} from "./types";

export interface XmlElement {
  readonly tagName: string;
  readonly textContent: string | null;
  readonly children: ArrayLike<XmlElement>;
}

export interface LoadedClassResult {
  classInfo: ClassInfo;
  element: XmlElement;
}

interface ParseOptions {
  onProgress?: ProgressCallback;
}

/**
 * Parse an IOF XML 3.0 ResultList and return the first ClassResult element
 */
export function loadClassResult(
  xml: string,
  options: ParseOptions = {},
): LoadedClassResult {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new Error(`Invalid XML: ${msg} (line ${line}, column ${col})`);
  }

  const document = new DOMParser().parseFromString(xml, "text/xml");
  const root: XmlElement | null = document.documentElement;
  const element = root ? findDescendant(root, "ClassResult") : undefined;
  if (!element) {
    throw new Error("No ClassResult element found");
  }

  const classInfo = parseClassInfo(element);
  options.onProgress?.(`Class id: ${classInfo.id}`);
  options.onProgress?.(`Class name: ${classInfo.name}`);
  options.onProgress?.(`Course name: ${classInfo.courseName}`);

  return { classInfo, element };
}

/**
 * Map a ClassResult element to competitors in placement order
 */
export function mapClassResult(
  classResult: XmlElement,
  options: ParseOptions = {},
): CompetitorResult[] {
  const competitors = childElements(classResult, "PersonResult").map(
    (personResult) => parsePersonResult(personResult, options),
  );
  return sortByPosition(competitors);
}

export function parseClassResultList(
  xml: string,
  options: ParseOptions = {},
): ClassResultList {
  const { classInfo, element } = loadClassResult(xml, options);
  return { classInfo, competitors: mapClassResult(element, options) };
}

export function parsePersonResult(
  personResult: XmlElement,
  options: ParseOptions = {},
): CompetitorResult {
  const person = child(personResult, "Person");
  const name = parseName(person ? child(person, "Name") : undefined);

  let team = "";
  const organisation = child(personResult, "Organisation");
  if (organisation) {
    options.onProgress?.(`${name} has org`);
    team = textOf(child(organisation, "Name")).trim();
  }

  const result = child(personResult, "Result");
  const field = (tag: string) => textOf(result && child(result, tag));

  return {
    name,
    team,
    time: parseOptionalInt(field("Time")),
    startTime: parseOptionalTimestamp(field("StartTime"), options),
    finishTime: parseOptionalTimestamp(field("FinishTime"), options),
    position: parseOptionalInt(field("Position")),
    status: field("Status"),
    splitTimes: result ? parseSplitTimes(result) : [],
  };
}

/**
 * Stable sort by position; unplaced competitors go after the highest placement
 */
export function sortByPosition(
  competitors: readonly CompetitorResult[],
): CompetitorResult[] {
  const maxPosition = competitors.reduce(
    (max, c) => Math.max(max, c.position ?? 0),
    0,
  );
  const key = (c: CompetitorResult) => c.position ?? maxPosition + 1;
  return [...competitors].sort((a, b) => key(a) - key(b));
}

/**
 * Stable sort by elapsed time; splits without a time come first
 */
export function sortSplitTimes(splitTimes: readonly SplitTime[]): SplitTime[] {
  const key = (s: SplitTime) => s.time ?? Number.NEGATIVE_INFINITY;
  return [...splitTimes].sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    return ka === kb ? 0 : ka < kb ? -1 : 1;
  });
}

export function parseOptionalInt(text: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === "") {
    return undefined;
  }
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new Error(`Invalid integer value "${text}"`);
  }
  return parseInt(trimmed, 10);
}

export function parseOptionalTimestamp(
  text: string,
  options: ParseOptions = {},
): Date | undefined {
  options.onProgress?.(`iso time: ${text}`);
  if (text === "") {
    return undefined;
  }
  const date = parseISO(text.trim());
  if (!isValid(date)) {
    throw new Error(`Invalid ISO-8601 timestamp "${text}"`);
  }
  return date;
}

// Helper functions

function parseClassInfo(classResult: XmlElement): ClassInfo {
  const cls = child(classResult, "Class");
  const course = child(classResult, "Course");
  return {
    id: textOf(cls && child(cls, "Id")),
    name: textOf(cls && child(cls, "Name")),
    courseName: textOf(course && child(course, "Name")),
  };
}

function parseName(name: XmlElement | undefined): string {
  if (!name) return "";
  return ["Given", "Family"]
    .map((tag) => textOf(child(name, tag)).trim())
    .filter(Boolean)
    .join(" ");
}

function parseSplitTimes(result: XmlElement): SplitTime[] {
  const splitTimes = childElements(result, "SplitTime").map((split) => ({
    time: parseOptionalInt(textOf(child(split, "Time"))),
    controlCode: parseOptionalInt(textOf(child(split, "ControlCode"))),
  }));
  return sortSplitTimes(splitTimes);
}

function localName(element: XmlElement): string {
  return element.tagName.replace(/^.*:/, "").toLowerCase();
}

function childElements(parent: XmlElement, tag: string): XmlElement[] {
  const wanted = tag.toLowerCase();
  return Array.from(parent.children).filter((el) => localName(el) === wanted);
}

function child(parent: XmlElement, tag: string): XmlElement | undefined {
  return childElements(parent, tag)[0];
}

function findDescendant(
  root: XmlElement,
  tag: string,
): XmlElement | undefined {
  if (localName(root) === tag.toLowerCase()) return root;
  for (const el of Array.from(root.children)) {
    const found = findDescendant(el, tag);
    if (found) return found;
  }
  return undefined;
}

function textOf(element: XmlElement | undefined): string {
  return element?.textContent ?? "";
}
