/**
 * Zod schemas for every YAML document mini-cross reads.
 *
 * - MixinYamlSchema: metadata block of a toolchain file
 * - UserConfigSchema: ~/.mc2config.yaml and friends
 * - AliasFileSchema: .mc2aliases.yaml
 *
 * Absent or null fields default to empty; unknown keys are stripped.
 * Publish and volume strings are parsed into structured values here, so a
 * malformed spec fails validation with the parser's message.
 *
 * Documents are read with parseYamlText, which keeps number and boolean
 * scalars as their source text: `PYTHON_VERSION: 3.10` stays "3.10".
 */

import { parseDocument, visit } from "yaml";
import { z } from "zod";

import { parsePublish, parseVolume } from "./runtime-params.js";

/**
 * Parse YAML text to plain data, with number and boolean scalars replaced by
 * the text they were written as. Null stays null.
 *
 * @throws YAMLParseError on the first syntax error.
 */
export function parseYamlText(text: string): unknown {
  const doc = parseDocument(text);
  const [error] = doc.errors;
  if (error) {
    throw error;
  }

  visit(doc, {
    Scalar(_key, node) {
      if ((typeof node.value === "number" || typeof node.value === "boolean") && node.source !== undefined) {
        node.value = node.source;
      }
    },
  });
  return doc.toJS();
}

/** YAML scalars as strings (`PORT: 8080` is a valid env entry). */
const ScalarString = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);
}

function parsedFrom<T>(parse: (text: string) => T) {
  return z.string().transform((text, ctx): T => {
    try {
      return parse(text);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  });
}

export const PublishSchema = parsedFrom(parsePublish);
export const VolumeSchema = parsedFrom(parseVolume);

const EnvMapSchema = z
  .record(ScalarString)
  .nullish()
  .transform((value) => value ?? {});

export const MixinYamlSchema = z.object({
  base: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
  install: listOf(ScalarString),
  mixin: listOf(z.string()),
  publish: listOf(PublishSchema),
  volume: listOf(VolumeSchema),
  env: EnvMapSchema,
});

export type MixinYaml = z.output<typeof MixinYamlSchema>;

export const UserConfigSchema = z.object({
  publish: listOf(PublishSchema),
  volume: listOf(VolumeSchema),
  env: EnvMapSchema,
});

export type UserConfig = z.output<typeof UserConfigSchema>;

export const AliasFileSchema = z
  .record(z.string())
  .nullish()
  .transform((value) => value ?? {});

/** One line per issue: `publish.0: Invalid publish format ...`. */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
