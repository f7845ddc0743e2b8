import { ParseError } from "../errors.js";
import { CrateRecord, CrateVersion, JsonValue } from "../types.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeBody(crateName: string, body: Uint8Array): string {
  try {
    return utf8.decode(body);
  } catch (error) {
    throw new ParseError(`Index entry for ${crateName} is not valid UTF-8`, { package: crateName }, error);
  }
}

function parseLine(crateName: string, line: string, lineNumber: number): CrateVersion {
  let value: JsonValue;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new ParseError(`Malformed index line ${lineNumber} for ${crateName}`, { package: crateName }, error);
  }
  if (!isRecord(value) || typeof value.vers !== "string") {
    throw new ParseError(`Index line ${lineNumber} for ${crateName} has no "vers" field`, { package: crateName });
  }
  return {
    version: value.vers,
    yanked: value.yanked === true,
    checksum: typeof value.cksum === "string" ? value.cksum : undefined
  };
}

/**
 * Parse a newline-delimited index file into a crate record.
 *
 * @param crateName - Crate the body belongs to.
 * @param body - Raw bytes of the index file.
 * @returns Record listing every version line.
 * @throws ParseError if the bytes are not UTF-8 or a line is not a version entry.
 */
export function parseCrateRecord(crateName: string, body: Uint8Array): CrateRecord {
  const text = decodeBody(crateName, body);
  const versions: CrateVersion[] = [];
  text.split("\n").forEach((raw, index) => {
    const line = raw.trim();
    if (line.length > 0) {
      versions.push(parseLine(crateName, line, index + 1));
    }
  });
  return { name: crateName, versions };
}

/**
 * Test membership of an exact version string. No range matching is applied.
 *
 * @param record - Parsed record, or undefined when the crate is unknown.
 * @param version - Canonical version string.
 */
export function isVersionPresent(record: CrateRecord | undefined, version: string): boolean {
  return record?.versions.some(entry => entry.version === version) ?? false;
}
