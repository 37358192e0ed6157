import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { InputRow } from "../dataset/types.js";

export type PromptRole = "system" | "user";

export type PromptMessage = Readonly<{
  role: PromptRole;
  content: string;
}>;

export type Prompt = ReadonlyArray<PromptMessage>;

export const TemplateKindSchema = z.enum(["homonyms", "simple_terms", "abbreviations"]);

export type TemplateKind = z.infer<typeof TemplateKindSchema>;

export type PromptTemplate = {
  kind: TemplateKind;
  /** Dataset column holding the candidate translations for this template. */
  options_column: string;
  build: (row: InputRow) => Prompt;
};

const TRANSLATOR_PREAMBLE =
  "You are a German translator based in South-Tyrol and this is a translation task. " +
  "You are tasked to translate a legal sentence from Italian into South-Tyrolean German. " +
  "South-Tyrolean German is a standard variety of German. ";

const OUTPUT_INSTRUCTION =
  "You must output only the translated text without any explanation, enclosing it in '<>' symbols. " +
  "This is the text to be translated into German:";

function formatOptions(options: readonly string[]): string {
  return options.join(", ");
}

function translationPrompt(constraint: string, row: InputRow): Prompt {
  return Object.freeze([
    Object.freeze({
      role: "system" as const,
      content: `${TRANSLATOR_PREAMBLE}There are terminological constraints you must adhere to: ${constraint} ${OUTPUT_INSTRUCTION}`,
    }),
    Object.freeze({
      role: "user" as const,
      content: `<${row.source_sentence}>. German: `,
    }),
  ]);
}

export function buildHomonymsPrompt(row: InputRow): Prompt {
  return translationPrompt(
    `${row.term} can be translated with only one of these terms: ${formatOptions(row.options)}.`,
    row
  );
}

export function buildSimpleTermsPrompt(row: InputRow): Prompt {
  return translationPrompt(`${row.term} must be translated with ${formatOptions(row.options)}.`, row);
}

export function buildAbbreviationsPrompt(row: InputRow): Prompt {
  return translationPrompt(
    `The abbreviation ${row.term} must be translated with ${formatOptions(row.options)}.`,
    row
  );
}

export const PROMPT_TEMPLATES: Readonly<Record<TemplateKind, PromptTemplate>> = {
  homonyms: {
    kind: "homonyms",
    options_column: "OPTIONS",
    build: buildHomonymsPrompt,
  },
  simple_terms: {
    kind: "simple_terms",
    options_column: "TARGET HYPOTHESIS (DE SOUTH TYROL)",
    build: buildSimpleTermsPrompt,
  },
  abbreviations: {
    kind: "abbreviations",
    options_column: "TARGET HYPOTHESIS (DE SOUTH TYROL)",
    build: buildAbbreviationsPrompt,
  },
};

/**
 * Look up the template for a dataset name. Unknown names are a configuration
 * error and must surface before any row is dispatched.
 */
export function resolvePromptTemplate(name: string): PromptTemplate {
  const parsed = TemplateKindSchema.safeParse(name);
  if (!parsed.success) {
    throw new ConfigurationError(
      `No prompt template found for source: ${name}. ` +
        `Available sources: ${TemplateKindSchema.options.join(", ")}`
    );
  }
  return PROMPT_TEMPLATES[parsed.data];
}
