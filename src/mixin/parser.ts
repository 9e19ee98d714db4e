/**
 * Toolchain file parser.
 *
 * A toolchain file is an optional YAML metadata block between two `---`
 * lines, followed by a shell script:
 *
 *   ---
 *   base: ubuntu:22.04
 *   install: [curl, git]
 *   ---
 *   echo hello
 *
 * Without a leading `---` the whole file is script.
 */

import { METADATA_DELIMITER } from "../constants.js";
import { MixinFormatError } from "../errors.js";
import { formatZodIssues, MixinYamlSchema, parseYamlText, type MixinYaml } from "../schemas.js";

/** One parsed toolchain file. Identity is its normalized path. */
export interface MixinNode {
  readonly path: string;
  readonly config: MixinYaml;
  readonly script?: string;
}

function parseMetadata(path: string, text: string): MixinYaml {
  let raw: unknown;
  try {
    raw = parseYamlText(text);
  } catch (error) {
    throw new MixinFormatError(path, `invalid config yaml: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = MixinYamlSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new MixinFormatError(path, `invalid config yaml: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

function toScript(lines: string[]): string | undefined {
  const script = lines.join("\n");
  return script === "" ? undefined : script;
}

function isDelimiter(line: string): boolean {
  return line.trim() === METADATA_DELIMITER;
}

/**
 * Parse toolchain file content.
 *
 * @param path - Origin path, stored on the node and used in error messages.
 * @param content - Raw file text; CRLF line endings are accepted.
 * @throws MixinFormatError if the file is empty, the metadata block is not
 *   closed, or the metadata is not a valid MixinYaml document.
 */
export function parseMixin(path: string, content: string): MixinNode {
  const normalized = content.replace(/\r\n/g, "\n");
  if (normalized === "") {
    throw new MixinFormatError(path, "config was empty");
  }

  // A trailing newline terminates the last line, it does not start a new one
  const lines = normalized.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  const [first, ...rest] = lines;
  if (first === undefined || !isDelimiter(first)) {
    return { path, config: parseMetadata(path, ""), script: toScript(lines) };
  }

  const closing = rest.findIndex(isDelimiter);
  if (closing < 0) {
    throw new MixinFormatError(path, "config section started with --- but missing closing ---");
  }

  return {
    path,
    config: parseMetadata(path, rest.slice(0, closing).join("\n")),
    script: toScript(rest.slice(closing + 1)),
  };
}
